import pino from 'pino'
import type { PolicyEvent } from '../host/EventJournal'

type RebasePayload = {
  cycle_id: string
  epoch: number
  exchange_rate: bigint
  ref_index: bigint
  aux_rate: bigint
  delta: bigint
  timestamp: number
}

type CyclePayload = {
  cycle_id?: string
  outcome: string
  sender: string
  epoch?: number
  calls?: number
  reason_code?: string
  duration_ms?: number
}

type TransactionFailedPayload = {
  cycle_id: string
  index: number
  destination: string
  message: string
}

type HttpPayload = {
  path: string
  method: string
  status: number
  corr_id?: string
  latency_ms?: number
}

// create default logger; tests can replace via setLogger
let logger: pino.Logger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.Logger): void {
  logger = l
}

export function getLogger(): pino.Logger {
  return logger
}

// bigint values are logged as decimal strings so they survive JSON parsing intact
export function logRebase(payload: RebasePayload): void {
  logger.info({
    event: 'policy.rebase',
    cycle_id: payload.cycle_id,
    epoch: payload.epoch,
    exchange_rate: payload.exchange_rate.toString(),
    ref_index: payload.ref_index.toString(),
    aux_rate: payload.aux_rate.toString(),
    delta: payload.delta.toString(),
    timestamp: payload.timestamp,
  })
}

export function logTransactionFailed(payload: TransactionFailedPayload): void {
  logger.warn({ event: 'orchestrator.transaction_failed', ...payload })
}

export function logCycle(payload: CyclePayload): void {
  const base = { event: 'orchestrator.cycle', ...payload }
  if (payload.outcome === 'COMMITTED') logger.info(base)
  else logger.warn(base)
}

export function logHttp(payload: HttpPayload): void {
  logger.info({
    event: 'http.request',
    path: payload.path,
    method: payload.method,
    status: payload.status,
    corr_id: payload.corr_id,
    latency_ms: payload.latency_ms,
  })
}

/** Routes a committed journal entry to its structured log line. */
export function logEvent(cycleId: string, event: PolicyEvent): void {
  switch (event.name) {
    case 'LogRebase':
      logRebase({
        cycle_id: cycleId,
        epoch: event.epoch,
        exchange_rate: event.exchangeRate,
        ref_index: event.refIndex,
        aux_rate: event.auxRate,
        delta: event.requestedSupplyAdjustment,
        timestamp: event.timestamp,
      })
      return
    case 'TransactionFailed':
      logTransactionFailed({ cycle_id: cycleId, index: event.index, destination: event.destination, message: event.message })
      return
    case 'OwnershipTransferred':
      logger.info({ event: 'auth.ownership_transferred', cycle_id: cycleId, previous_owner: event.previousOwner, new_owner: event.newOwner })
      return
  }
}
