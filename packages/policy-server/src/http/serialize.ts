/**
 * JSON views of policy state and cycle reports. Rates are 18-decimal strings, supply amounts are
 * integer strings; nothing here emits a raw bigint.
 */
import { formatFixed } from '@elastic-supply/math'
import { PolicyEngine } from '../services/PolicyEngine'
import { CycleReport } from '../services/Orchestrator'
import { TransactionRecord } from '../services/TransactionList'

export function serializePolicy(policy: PolicyEngine, totalSupply: bigint, now: number) {
  const state = policy.state()
  return {
    epoch: state.epoch,
    last_rebase_timestamp: state.lastRebaseTimestamp,
    base_reference_index: formatFixed(state.baseReferenceIndex),
    total_supply: totalSupply.toString(),
    owner: state.owner,
    config: {
      version: state.config.version,
      deviation_threshold: formatFixed(state.config.deviationThreshold),
      rebase_lag: state.config.rebaseLag.toString(),
      min_rebase_interval: state.config.minRebaseInterval,
      rebase_window_offset: state.config.rebaseWindowOffset,
      rebase_window_length: state.config.rebaseWindowLength,
      aux_weight: formatFixed(state.config.auxWeight),
      orchestrator: state.config.orchestrator,
    },
    oracles: {
      reference_index: state.oracles.referenceIndex,
      exchange_rate: state.oracles.exchangeRate,
      aux_rate: state.oracles.auxRate,
    },
    window: {
      now,
      in_window: policy.inRebaseWindow(now),
      rebase_due: policy.isRebaseDue(now),
      next_window: policy.nextRebaseWindow(now),
    },
  }
}

export function serializeReport(report: CycleReport) {
  const { rebase } = report
  return {
    cycle_id: report.cycleId,
    epoch: rebase.epoch,
    timestamp: rebase.timestamp,
    reference_index: formatFixed(rebase.referenceIndex),
    exchange_rate: formatFixed(rebase.exchangeRate),
    aux_rate: formatFixed(rebase.auxRate),
    target_rate: formatFixed(rebase.targetRate),
    combined_rate: formatFixed(rebase.combinedRate),
    supply_delta: rebase.delta.toString(),
    total_supply: rebase.totalSupply.toString(),
    suppressed: rebase.suppressed,
    clamped: rebase.clamped,
    calls: report.calls.map(call => ({
      index: call.index,
      destination: call.destination,
      status: call.status,
      data: call.data,
      message: call.message,
      failure_code: call.failureCode,
    })),
  }
}

export function serializeTransaction(record: TransactionRecord, index: number) {
  return {
    index,
    enabled: record.enabled,
    destination: record.destination,
    payload: record.payload,
    compute_budget: record.computeBudget.toString(),
    approved_failure_codes: [...record.approvedFailureCodes],
  }
}
