/*
 * Application entry point for the policy service
 *
 * Responsibilities:
 *  1. Parse configuration and build the runtime (ledger, policy engine, orchestrator)
 *  2. Bind oracles and call targets: contracts when RPC_URL is set, otherwise in-memory feeds
 *  3. Start the HTTP API and, when enabled, the cycle scheduler
 *  4. Provide graceful shutdown on SIGINT / SIGTERM
 */

import http from 'http'
import { ContractRunner, JsonRpcProvider, Provider, isAddress } from 'ethers'
import { ONE } from '@elastic-supply/math'
import { ENV, Env, loadPolicySettings } from './config'
import { createApp } from './http'
import { Clock, systemClock } from './host/AtomicHost'
import { Runtime, buildRuntime } from './services/runtime'
import { CallTargetRegistry } from './services/CallTargetRegistry'
import { CycleScheduler } from './services/CycleScheduler'
import { OracleHandles } from './services/OracleAdapter'
import { contractTargetResolver } from './adapters/ContractCallTarget'
import { ContractOracle } from './adapters/ContractOracle'
import { StaticOracle } from './adapters/StaticOracle'
import { getLogger } from './utils/logger'

let server: http.Server | null = null
let scheduler: CycleScheduler | null = null
let shuttingDown = false

/** What the service needs from a JSON-RPC endpoint: a contract runner that can `eth_call`. */
export type ChainAccess = ContractRunner & Pick<Provider, 'call'>

function bindOracles(env: Env, chain: ChainAccess | null): OracleHandles {
  if (!chain) {
    getLogger().warn({ event: 'main.static_oracles' }, 'RPC_URL not set; using in-memory oracles at parity')
    return { referenceIndex: new StaticOracle(ONE), exchangeRate: new StaticOracle(ONE), auxRate: new StaticOracle(ONE) }
  }
  const feed = (address: string) => (address ? new ContractOracle(address, chain) : null)
  return {
    referenceIndex: feed(env.REFERENCE_INDEX_ORACLE),
    exchangeRate: feed(env.MARKET_ORACLE),
    auxRate: feed(env.AUX_ORACLE),
  }
}

// address destinations become contract targets; anything else must be registered in-process
function bindTargets(env: Env, chain: ChainAccess | null): CallTargetRegistry {
  if (!chain) return new CallTargetRegistry()
  const from = isAddress(env.ORCHESTRATOR_ID) ? env.ORCHESTRATOR_ID : undefined
  return new CallTargetRegistry(contractTargetResolver(chain, from))
}

export function buildServiceRuntime(env: Env, chain: ChainAccess | null, clock: Clock = systemClock): Runtime {
  const settings = loadPolicySettings(env)
  return buildRuntime({
    ownerId: env.OWNER_ID,
    orchestratorId: settings.orchestrator,
    baseReferenceIndex: settings.baseReferenceIndex,
    initialSupply: settings.initialSupply,
    params: {
      deviationThreshold: settings.deviationThreshold,
      rebaseLag: settings.rebaseLag,
      minRebaseInterval: settings.minRebaseInterval,
      rebaseWindowOffset: settings.rebaseWindowOffset,
      rebaseWindowLength: settings.rebaseWindowLength,
      auxWeight: settings.auxWeight,
    },
    oracles: bindOracles(env, chain),
    targets: bindTargets(env, chain),
    clock,
    gasLimit: settings.cycleGasLimit,
  })
}

async function start(): Promise<void> {
  const log = getLogger()
  const runtime = buildServiceRuntime(ENV, ENV.RPC_URL ? new JsonRpcProvider(ENV.RPC_URL) : null)

  const app = createApp(runtime, { adminApiKey: ENV.ADMIN_API_KEY })
  server = http.createServer(app)
  await new Promise<void>(resolve => server?.listen(ENV.PORT, resolve))
  log.info({ event: 'main.listening', port: ENV.PORT, admin: ENV.ADMIN_API_KEY !== '' })

  if (ENV.SCHEDULER_ENABLED) {
    scheduler = new CycleScheduler(
      { isRebaseDue: now => runtime.view(() => runtime.policy.isRebaseDue(now)), runCycle: sender => runtime.runCycle(sender) },
      { keeperId: ENV.KEEPER_ID, pollMs: ENV.SCHEDULER_POLL_MS, clock: systemClock },
    )
    scheduler.start()
    log.info({ event: 'main.scheduler_started', poll_ms: ENV.SCHEDULER_POLL_MS })
  }
}

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true
  getLogger().info({ event: 'main.shutdown', signal })
  scheduler?.stop()
  const current = server
  if (current) {
    await new Promise<void>((resolve, reject) => current.close(err => (err ? reject(err) : resolve())))
  }
}

function onSignal(signal: string): void {
  shutdown(signal)
    .then(() => process.exit(0))
    .catch(err => {
      getLogger().error({ event: 'main.shutdown_failed', error: String(err) })
      process.exit(1)
    })
}

if (require.main === module) {
  process.on('SIGINT', () => onSignal('SIGINT'))
  process.on('SIGTERM', () => onSignal('SIGTERM'))
  start().catch(err => {
    getLogger().fatal({ event: 'main.start_failed', error: err instanceof Error ? err.message : String(err) })
    process.exitCode = 1
  })
}

export { start, shutdown }
