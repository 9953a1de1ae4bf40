/**
 * PolicyEngine
 * Owns the rebase schedule and the supply policy. Each accepted `rebase` call:
 *  1. checks the caller is the orchestrator
 *  2. checks the rebase window and the cooldown
 *  3. snaps the last rebase time to the window start and advances the epoch
 *  4. reads the oracles, computes the delta and applies it to the ledger
 *  5. journals LogRebase
 * All mutation happens inside the host's unit of work, so any later failure rolls it back.
 */
import { ONE, MAX_SUPPLY, assertSupplyEnvelope, isUint256 } from '@elastic-supply/math'
import { rejection } from '@elastic-supply/reasons'
import { CallContext } from '../host/CallContext'
import { Snapshotable } from '../host/AtomicHost'
import { Ownable } from './AuthorizationGuard'
import { Ledger } from './Ledger'
import { Oracle, OracleAdapter, OracleHandles, OracleSource } from './OracleAdapter'
import { computeSupplyDelta, computeTargetRate } from './supplyDelta'

export interface PolicyParams {
  deviationThreshold: bigint
  rebaseLag: bigint
  minRebaseInterval: number
  rebaseWindowOffset: number
  rebaseWindowLength: number
  auxWeight: bigint
  orchestrator: string
}

export type PolicyConfig = Readonly<PolicyParams & { version: number }>

export type TimingParameters = Pick<PolicyParams, 'minRebaseInterval' | 'rebaseWindowOffset' | 'rebaseWindowLength'>

export const DEFAULT_POLICY_PARAMS: Readonly<PolicyParams> = {
  deviationThreshold: (5n * ONE) / 100n,
  rebaseLag: 30n,
  minRebaseInterval: 86_400,
  rebaseWindowOffset: 72_000,
  rebaseWindowLength: 900,
  auxWeight: 0n,
  orchestrator: '',
}

export interface PolicyEngineOptions {
  owner: string
  ledger: Ledger
  baseReferenceIndex: bigint
  params?: Partial<PolicyParams>
  oracles?: Partial<OracleHandles>
}

export interface RebaseResult {
  epoch: number
  timestamp: number
  referenceIndex: bigint
  exchangeRate: bigint
  auxRate: bigint
  targetRate: bigint
  combinedRate: bigint
  delta: bigint
  suppressed: boolean
  clamped: boolean
  totalSupply: bigint
}

export interface PolicyState {
  epoch: number
  lastRebaseTimestamp: number
  baseReferenceIndex: bigint
  owner: string
  config: PolicyConfig
  oracles: Record<OracleSource, boolean>
}

export interface PolicySnapshot {
  epoch: number
  lastRebaseTimestamp: number
  config: PolicyConfig
  oracles: OracleHandles
  owner: string
}

/** Caller-facing slice of the engine the orchestrator depends on. */
export interface Rebaser {
  rebase(ctx: CallContext): Promise<RebaseResult>
}

function invalid(parameter: string, message: string): Error {
  return rejection('CONFIG_INVALID_PARAMETER', { message, context: { parameter } })
}

/** Fields left undefined in `patch` keep their current value. */
export function mergeParams(current: PolicyParams, patch: Partial<PolicyParams>): PolicyParams {
  return {
    deviationThreshold: patch.deviationThreshold ?? current.deviationThreshold,
    rebaseLag: patch.rebaseLag ?? current.rebaseLag,
    minRebaseInterval: patch.minRebaseInterval ?? current.minRebaseInterval,
    rebaseWindowOffset: patch.rebaseWindowOffset ?? current.rebaseWindowOffset,
    rebaseWindowLength: patch.rebaseWindowLength ?? current.rebaseWindowLength,
    auxWeight: patch.auxWeight ?? current.auxWeight,
    orchestrator: patch.orchestrator ?? current.orchestrator,
  }
}

export function validatePolicyParams(params: PolicyParams): PolicyParams {
  if (!isUint256(params.deviationThreshold)) throw invalid('deviationThreshold', 'deviationThreshold must be a uint256')
  if (params.rebaseLag <= 0n || !isUint256(params.rebaseLag)) throw invalid('rebaseLag', 'rebaseLag must be greater than zero')
  if (params.auxWeight < 0n || params.auxWeight > ONE) throw invalid('auxWeight', 'auxWeight must be between 0 and 1')
  if (!Number.isSafeInteger(params.minRebaseInterval) || params.minRebaseInterval <= 0) {
    throw invalid('minRebaseInterval', 'minRebaseInterval must be a positive integer')
  }
  if (!Number.isSafeInteger(params.rebaseWindowOffset) || params.rebaseWindowOffset < 0 || params.rebaseWindowOffset >= params.minRebaseInterval) {
    throw invalid('rebaseWindowOffset', 'rebaseWindowOffset must be less than minRebaseInterval')
  }
  if (!Number.isSafeInteger(params.rebaseWindowLength) || params.rebaseWindowLength < 0) {
    throw invalid('rebaseWindowLength', 'rebaseWindowLength must be a non-negative integer')
  }
  return params
}

export class PolicyEngine implements Rebaser, Snapshotable<PolicySnapshot> {
  readonly ownable: Ownable
  readonly baseReferenceIndex: bigint
  private readonly ledger: Ledger
  private readonly oracles: OracleAdapter
  private epoch = 0
  private lastRebaseTimestamp = 0
  private config: PolicyConfig

  constructor(opts: PolicyEngineOptions) {
    assertSupplyEnvelope()
    if (opts.baseReferenceIndex <= 0n || !isUint256(opts.baseReferenceIndex)) {
      throw invalid('baseReferenceIndex', 'baseReferenceIndex must be non-zero')
    }
    this.ownable = new Ownable(opts.owner)
    this.baseReferenceIndex = opts.baseReferenceIndex
    this.ledger = opts.ledger
    this.oracles = new OracleAdapter(opts.oracles)
    this.config = { ...validatePolicyParams(mergeParams(DEFAULT_POLICY_PARAMS, opts.params ?? {})), version: 1 }
  }

  // ---- views ----

  getConfig(): PolicyConfig {
    return this.config
  }

  inRebaseWindow(now: number): boolean {
    const phase = now % this.config.minRebaseInterval
    return phase >= this.config.rebaseWindowOffset && phase < this.config.rebaseWindowOffset + this.config.rebaseWindowLength
  }

  cooldownElapsed(now: number): boolean {
    return this.lastRebaseTimestamp + this.config.minRebaseInterval < now
  }

  isRebaseDue(now: number): boolean {
    return this.inRebaseWindow(now) && this.cooldownElapsed(now)
  }

  /** Earliest time >= now at which both gates pass, or null when the window has zero length. */
  nextRebaseWindow(now: number): number | null {
    const { minRebaseInterval: interval, rebaseWindowOffset: offset, rebaseWindowLength: length } = this.config
    if (length === 0) return null
    const candidate = Math.max(now, this.lastRebaseTimestamp + interval + 1)
    const periodStart = candidate - (candidate % interval)
    const phase = candidate % interval
    if (phase < offset) return periodStart + offset
    if (phase < offset + length) return candidate
    return periodStart + interval + offset
  }

  state(): PolicyState {
    return {
      epoch: this.epoch,
      lastRebaseTimestamp: this.lastRebaseTimestamp,
      baseReferenceIndex: this.baseReferenceIndex,
      owner: this.ownable.owner(),
      config: this.config,
      oracles: {
        referenceIndex: this.oracles.isConfigured('referenceIndex'),
        exchangeRate: this.oracles.isConfigured('exchangeRate'),
        auxRate: this.oracles.isConfigured('auxRate'),
      },
    }
  }

  async globalEpochAndSupply(): Promise<{ epoch: number; totalSupply: bigint }> {
    return { epoch: this.epoch, totalSupply: await this.ledger.totalSupply() }
  }

  // ---- rebase ----

  async rebase(ctx: CallContext): Promise<RebaseResult> {
    if (this.config.orchestrator === '' || ctx.sender !== this.config.orchestrator) {
      throw rejection('AUTH_NOT_ORCHESTRATOR', { context: { sender: ctx.sender } })
    }
    const now = ctx.timestamp
    if (!this.inRebaseWindow(now)) {
      throw rejection('GATING_OUTSIDE_REBASE_WINDOW', { context: { now } })
    }
    if (!this.cooldownElapsed(now)) {
      throw rejection('GATING_REBASE_TOO_SOON', { context: { now, lastRebaseTimestamp: this.lastRebaseTimestamp } })
    }

    const { minRebaseInterval, rebaseWindowOffset } = this.config
    this.lastRebaseTimestamp = now - (now % minRebaseInterval) + rebaseWindowOffset
    this.epoch += 1

    const inputs = await this.oracles.readAll()
    const targetRate = computeTargetRate(inputs.referenceIndex, this.baseReferenceIndex)
    const supplyBefore = await this.ledger.totalSupply()
    const outcome = computeSupplyDelta({
      totalSupply: supplyBefore,
      exchangeRate: inputs.exchangeRate,
      targetRate,
      auxRate: inputs.auxRate,
      auxWeight: this.config.auxWeight,
      deviationThreshold: this.config.deviationThreshold,
      rebaseLag: this.config.rebaseLag,
    })

    const totalSupply = await this.ledger.rebase(this.epoch, outcome.delta)
    if (totalSupply > MAX_SUPPLY) {
      throw rejection('LEDGER_SUPPLY_INVARIANT', { context: { totalSupply: totalSupply.toString() } })
    }

    ctx.journal.record({
      name: 'LogRebase',
      epoch: this.epoch,
      exchangeRate: inputs.exchangeRate,
      refIndex: inputs.referenceIndex,
      auxRate: inputs.auxRate,
      requestedSupplyAdjustment: outcome.delta,
      timestamp: now,
    })

    return {
      epoch: this.epoch,
      timestamp: now,
      referenceIndex: inputs.referenceIndex,
      exchangeRate: inputs.exchangeRate,
      auxRate: inputs.auxRate,
      targetRate,
      combinedRate: outcome.combinedRate,
      delta: outcome.delta,
      suppressed: outcome.suppressed,
      clamped: outcome.clamped,
      totalSupply,
    }
  }

  // ---- owner-only setters ----

  /** Applies a partial parameter update as one new config version. */
  updateParams(ctx: CallContext, patch: Partial<PolicyParams>): PolicyConfig {
    this.ownable.requireOwner(ctx)
    const next = validatePolicyParams(mergeParams(this.config, patch))
    this.config = { ...next, version: this.config.version + 1 }
    return this.config
  }

  setDeviationThreshold(ctx: CallContext, deviationThreshold: bigint): void {
    this.updateParams(ctx, { deviationThreshold })
  }

  setRebaseLag(ctx: CallContext, rebaseLag: bigint): void {
    this.updateParams(ctx, { rebaseLag })
  }

  setAuxWeight(ctx: CallContext, auxWeight: bigint): void {
    this.updateParams(ctx, { auxWeight })
  }

  setRebaseTimingParameters(ctx: CallContext, timing: TimingParameters): void {
    this.updateParams(ctx, timing)
  }

  setOrchestrator(ctx: CallContext, orchestrator: string): void {
    this.updateParams(ctx, { orchestrator })
  }

  setReferenceIndexOracle(ctx: CallContext, oracle: Oracle | null): void {
    this.setOracle(ctx, 'referenceIndex', oracle)
  }

  setMarketOracle(ctx: CallContext, oracle: Oracle | null): void {
    this.setOracle(ctx, 'exchangeRate', oracle)
  }

  setAuxOracle(ctx: CallContext, oracle: Oracle | null): void {
    this.setOracle(ctx, 'auxRate', oracle)
  }

  private setOracle(ctx: CallContext, source: OracleSource, oracle: Oracle | null): void {
    this.ownable.requireOwner(ctx)
    this.oracles.setHandle(source, oracle)
    this.config = { ...this.config, version: this.config.version + 1 }
  }

  // ---- atomic host participation ----

  snapshot(): PolicySnapshot {
    return {
      epoch: this.epoch,
      lastRebaseTimestamp: this.lastRebaseTimestamp,
      config: this.config,
      oracles: this.oracles.getHandles(),
      owner: this.ownable.snapshot(),
    }
  }

  restore(state: PolicySnapshot): void {
    this.epoch = state.epoch
    this.lastRebaseTimestamp = state.lastRebaseTimestamp
    this.config = state.config
    this.oracles.replaceHandles(state.oracles)
    this.ownable.restore(state.owner)
  }
}
