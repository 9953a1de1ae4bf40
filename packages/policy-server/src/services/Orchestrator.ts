/**
 * Orchestrator
 * Entry point of a rebase cycle. Runs the policy rebase, then notifies every enabled downstream
 * transaction in index order. A failure whose code the record approves is journaled and
 * tolerated; any other failure aborts the cycle, and the host rolls back the rebase with it.
 */
import { CallStatus } from '@elastic-supply/dto'
import { rejection } from '@elastic-supply/reasons'
import { CallContext, nested } from '../host/CallContext'
import { Snapshotable } from '../host/AtomicHost'
import { countDownstreamCall } from '../utils/metrics'
import { Ownable, requireDirect } from './AuthorizationGuard'
import { CallTargetRegistry } from './CallTargetRegistry'
import { classifyFailure } from './FailureClassifier'
import { RebaseResult, Rebaser } from './PolicyEngine'
import { NewTransaction, TransactionList, TransactionRecord, isApprovedFailure } from './TransactionList'

export interface CallReport {
  index: number
  destination: string
  status: CallStatus
  /** return data of a successful call */
  data?: string
  message?: string
  failureCode?: string
}

export interface CycleReport {
  cycleId: string
  rebase: RebaseResult
  calls: CallReport[]
}

export interface OrchestratorOptions {
  /** identity the orchestrator presents to the policy engine and to targets */
  id: string
  owner: string
  policy: Rebaser
  targets: CallTargetRegistry
}

export interface OrchestratorSnapshot {
  owner: string
  transactions: TransactionRecord[]
}

export class Orchestrator implements Snapshotable<OrchestratorSnapshot> {
  readonly id: string
  readonly ownable: Ownable
  private readonly policy: Rebaser
  private readonly targets: CallTargetRegistry
  private readonly transactions = new TransactionList()

  constructor(opts: OrchestratorOptions) {
    this.id = opts.id
    this.ownable = new Ownable(opts.owner)
    this.policy = opts.policy
    this.targets = opts.targets
  }

  async runCycle(ctx: CallContext): Promise<CycleReport> {
    requireDirect(ctx)

    const rebase = await this.policy.rebase(nested(ctx, this.id))

    const calls: CallReport[] = []
    for (let index = 0; index < this.transactions.size(); index++) {
      const tx = this.transactions.get(index)
      if (!tx.enabled) {
        calls.push({ index, destination: tx.destination, status: CallStatus.SKIPPED })
        continue
      }
      calls.push(await this.notify(ctx, index, tx))
    }

    return { cycleId: ctx.cycleId, rebase, calls }
  }

  private async notify(ctx: CallContext, index: number, tx: TransactionRecord): Promise<CallReport> {
    const remaining = ctx.gas.remaining()
    if (remaining <= tx.computeBudget) {
      throw rejection('DOWNSTREAM_INSUFFICIENT_BUDGET', {
        context: { index, remaining: remaining.toString(), budget: tx.computeBudget.toString() },
      })
    }

    const outcome = await this.targets.dispatch(tx.destination, {
      payload: tx.payload,
      budget: tx.computeBudget,
      ctx: nested(ctx, this.id),
    })
    ctx.gas.consume(outcome.gasUsed < tx.computeBudget ? outcome.gasUsed : tx.computeBudget)

    if (outcome.ok) {
      countDownstreamCall('success')
      return { index, destination: tx.destination, status: CallStatus.SUCCESS, data: outcome.data }
    }

    const failure = classifyFailure(outcome.raw)
    if (!isApprovedFailure(tx, failure.code)) {
      countDownstreamCall('unapproved')
      throw rejection('DOWNSTREAM_UNAPPROVED_FAILURE', {
        message: `Unapproved transaction failure: ${failure.message}`,
        context: { index, destination: tx.destination, failureCode: failure.code },
      })
    }

    countDownstreamCall('tolerated')
    ctx.journal.record({ name: 'TransactionFailed', destination: tx.destination, index, payload: tx.payload, message: failure.message })
    return { index, destination: tx.destination, status: CallStatus.TOLERATED, message: failure.message, failureCode: failure.code }
  }

  // ---- owner-only list management ----

  addTransaction(ctx: CallContext, tx: NewTransaction): number {
    this.ownable.requireOwner(ctx)
    return this.transactions.append(tx)
  }

  removeTransaction(ctx: CallContext, index: number): void {
    this.ownable.requireOwner(ctx)
    this.transactions.remove(index)
  }

  setTransactionEnabled(ctx: CallContext, index: number, enabled: boolean): void {
    this.ownable.requireOwner(ctx)
    this.transactions.setEnabled(index, enabled)
  }

  transactionsSize(): number {
    return this.transactions.size()
  }

  transaction(index: number): TransactionRecord {
    return this.transactions.get(index)
  }

  listTransactions(): TransactionRecord[] {
    return this.transactions.list()
  }

  snapshot(): OrchestratorSnapshot {
    return { owner: this.ownable.snapshot(), transactions: this.transactions.snapshot() }
  }

  restore(state: OrchestratorSnapshot): void {
    this.ownable.restore(state.owner)
    this.transactions.restore(state.transactions)
  }
}
