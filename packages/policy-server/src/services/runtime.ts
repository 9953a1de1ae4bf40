/**
 * Runtime wiring: one host, one ledger, one policy engine, one orchestrator. Both the HTTP layer
 * and the scheduler go through `runCycle`, which adds timing, metrics and the cycle log line.
 */
import { CycleOutcome } from '@elastic-supply/dto'
import { ReasonedRejection } from '@elastic-supply/reasons'
import { AtomicHost, Clock } from '../host/AtomicHost'
import { CallContext } from '../host/CallContext'
import { logCycle } from '../utils/logger'
import { countCycle, observeCycle, setEpoch, setSupply } from '../utils/metrics'
import { CallTargetRegistry } from './CallTargetRegistry'
import { InMemoryLedger, Ledger } from './Ledger'
import { OracleHandles } from './OracleAdapter'
import { CycleReport, Orchestrator } from './Orchestrator'
import { PolicyEngine, PolicyParams } from './PolicyEngine'
import { toRejection } from './errors'

export interface RuntimeOptions {
  ownerId: string
  orchestratorId: string
  baseReferenceIndex: bigint
  initialSupply?: bigint
  params?: Partial<Omit<PolicyParams, 'orchestrator'>>
  oracles?: Partial<OracleHandles>
  targets?: CallTargetRegistry
  clock?: Clock
  gasLimit?: bigint
}

export interface Runtime {
  host: AtomicHost
  ledger: Ledger
  policy: PolicyEngine
  orchestrator: Orchestrator
  targets: CallTargetRegistry
  ownerId: string
  runCycle(sender: string): Promise<CycleReport>
  asOwner<T>(fn: (ctx: CallContext) => Promise<T> | T): Promise<T>
  /** Reads committed state; never observes a cycle that is still running. */
  view<T>(fn: () => Promise<T> | T): Promise<T>
}

export function buildRuntime(opts: RuntimeOptions): Runtime {
  const host = new AtomicHost({ clock: opts.clock, defaultGasLimit: opts.gasLimit })
  const ledger = new InMemoryLedger(opts.initialSupply ?? 0n)
  const targets = opts.targets ?? new CallTargetRegistry()
  const policy = new PolicyEngine({
    owner: opts.ownerId,
    ledger,
    baseReferenceIndex: opts.baseReferenceIndex,
    params: { ...opts.params, orchestrator: opts.orchestratorId },
    oracles: opts.oracles,
  })
  const orchestrator = new Orchestrator({ id: opts.orchestratorId, owner: opts.ownerId, policy, targets })

  host.register(policy).register(orchestrator).register(ledger)

  async function runCycle(sender: string): Promise<CycleReport> {
    const start = Date.now()
    try {
      const report = await host.execute({ sender }, ctx => orchestrator.runCycle(ctx))
      const duration_ms = Date.now() - start
      countCycle(CycleOutcome.COMMITTED)
      observeCycle(CycleOutcome.COMMITTED, duration_ms)
      setEpoch(report.rebase.epoch)
      setSupply(report.rebase.totalSupply)
      logCycle({
        cycle_id: report.cycleId,
        outcome: CycleOutcome.COMMITTED,
        sender,
        epoch: report.rebase.epoch,
        calls: report.calls.length,
        duration_ms,
      })
      return report
    } catch (err) {
      const rejected: ReasonedRejection = toRejection(err)
      const duration_ms = Date.now() - start
      countCycle(CycleOutcome.ROLLED_BACK, rejected.code)
      observeCycle(CycleOutcome.ROLLED_BACK, duration_ms)
      logCycle({ outcome: CycleOutcome.ROLLED_BACK, sender, reason_code: rejected.code, duration_ms })
      throw rejected
    }
  }

  return {
    host,
    ledger,
    policy,
    orchestrator,
    targets,
    ownerId: opts.ownerId,
    runCycle,
    asOwner: fn => host.execute({ sender: opts.ownerId }, fn),
    view: fn => host.read(fn),
  }
}
