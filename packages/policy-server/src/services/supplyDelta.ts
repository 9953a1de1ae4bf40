/** supplyDelta.ts
 * Target rate, two-factor combined deviation and lag-damped supply delta; pure functions only
 */
import {
  ONE,
  MAX_SUPPLY,
  absInt,
  addInt,
  addUint,
  divInt,
  divUint,
  mulInt,
  mulUint,
  subInt,
  subUint,
  toInt256Safe,
  toUint256Safe,
} from '@elastic-supply/math'

export interface SupplyDeltaInput {
  totalSupply: bigint
  exchangeRate: bigint
  targetRate: bigint
  auxRate: bigint
  auxWeight: bigint
  deviationThreshold: bigint
  rebaseLag: bigint
  maxSupply?: bigint
}

export interface SupplyDeltaResult {
  combinedRate: bigint
  delta: bigint
  /** |combinedRate| fell inside the dead zone */
  suppressed: boolean
  /** delta was cut down to keep supply at or below maxSupply */
  clamped: boolean
}

export function computeTargetRate(referenceIndex: bigint, baseReferenceIndex: bigint): bigint {
  return divUint(mulUint(referenceIndex, ONE), baseReferenceIndex)
}

export function computeCombinedRate(exchangeRate: bigint, targetRate: bigint, auxRate: bigint, auxWeight: bigint): bigint {
  const target = toInt256Safe(targetRate)
  const weight = toInt256Safe(auxWeight)
  const auxDeviation = subInt(toInt256Safe(auxRate), ONE)
  const primaryFactor = divInt(mulInt(subInt(ONE, weight), subInt(toInt256Safe(exchangeRate), target)), target)
  const auxFactor = divInt(mulInt(weight, auxDeviation), ONE)
  return addInt(primaryFactor, auxFactor)
}

export function computeSupplyDelta(input: SupplyDeltaInput): SupplyDeltaResult {
  const maxSupply = input.maxSupply ?? MAX_SUPPLY
  const combinedRate = computeCombinedRate(input.exchangeRate, input.targetRate, input.auxRate, input.auxWeight)

  if (absInt(combinedRate) < input.deviationThreshold) {
    return { combinedRate, delta: 0n, suppressed: true, clamped: false }
  }

  const rawDelta = divInt(mulInt(toInt256Safe(input.totalSupply), combinedRate), ONE)
  let delta = divInt(rawDelta, toInt256Safe(input.rebaseLag))

  // ceiling only; contractions are bounded by checked arithmetic alone
  if (delta > 0n && addUint(input.totalSupply, toUint256Safe(delta)) > maxSupply) {
    delta = toInt256Safe(subUint(maxSupply, input.totalSupply))
    return { combinedRate, delta, suppressed: false, clamped: true }
  }
  return { combinedRate, delta, suppressed: false, clamped: false }
}
