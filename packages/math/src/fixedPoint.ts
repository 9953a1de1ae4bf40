/**
 * fixedPoint.ts
 * Checked uint256 / int256 arithmetic over bigint and the 18-decimal fixed-point constants
 * used by the supply policy; pure functions only (no I/O, no side-effects).
 */
import { ArithmeticError } from './errors'

export const DECIMALS = 18
export const ONE = 10n ** 18n

export const UINT256_MAX = (1n << 256n) - 1n
export const INT256_MAX = (1n << 255n) - 1n
export const INT256_MIN = -(1n << 255n)

/** Ceiling applied to the market exchange rate: 10^6 in 18-decimal units. */
export const MAX_RATE = 10n ** 6n * ONE
/** Largest supply for which MAX_RATE * supply still fits a signed 256-bit value. */
export const MAX_SUPPLY = INT256_MAX / MAX_RATE
/** Ceiling applied to the auxiliary delta rate (±100% around ONE). */
export const MAX_AUX_RATE = 2n * ONE

export function isUint256(x: bigint): boolean {
  return x >= 0n && x <= UINT256_MAX
}

export function isInt256(x: bigint): boolean {
  return x >= INT256_MIN && x <= INT256_MAX
}

function checkUint(x: bigint, op: string): bigint {
  if (x < 0n) throw new ArithmeticError('UNDERFLOW', op)
  if (x > UINT256_MAX) throw new ArithmeticError('OVERFLOW', op)
  return x
}

function checkInt(x: bigint, op: string): bigint {
  if (x > INT256_MAX) throw new ArithmeticError('OVERFLOW', op)
  if (x < INT256_MIN) throw new ArithmeticError('UNDERFLOW', op)
  return x
}

export function assertUint256(x: bigint, op = 'assertUint256'): bigint {
  return checkUint(x, op)
}

export function assertInt256(x: bigint, op = 'assertInt256'): bigint {
  return checkInt(x, op)
}

// ─── unsigned ──────────────────────────────────────────────────────────────

export function addUint(a: bigint, b: bigint): bigint {
  return checkUint(checkUint(a, 'addUint') + checkUint(b, 'addUint'), 'addUint')
}

export function subUint(a: bigint, b: bigint): bigint {
  return checkUint(checkUint(a, 'subUint') - checkUint(b, 'subUint'), 'subUint')
}

export function mulUint(a: bigint, b: bigint): bigint {
  return checkUint(checkUint(a, 'mulUint') * checkUint(b, 'mulUint'), 'mulUint')
}

export function divUint(a: bigint, b: bigint): bigint {
  checkUint(a, 'divUint')
  checkUint(b, 'divUint')
  if (b === 0n) throw new ArithmeticError('DIVISION_BY_ZERO', 'divUint')
  return a / b
}

// ─── signed ────────────────────────────────────────────────────────────────

export function addInt(a: bigint, b: bigint): bigint {
  return checkInt(checkInt(a, 'addInt') + checkInt(b, 'addInt'), 'addInt')
}

export function subInt(a: bigint, b: bigint): bigint {
  return checkInt(checkInt(a, 'subInt') - checkInt(b, 'subInt'), 'subInt')
}

export function mulInt(a: bigint, b: bigint): bigint {
  return checkInt(checkInt(a, 'mulInt') * checkInt(b, 'mulInt'), 'mulInt')
}

/**
 * divInt
 * Truncates toward zero (bigint division already does). INT256_MIN / -1 is the one quotient
 * that leaves the signed range.
 */
export function divInt(a: bigint, b: bigint): bigint {
  checkInt(a, 'divInt')
  checkInt(b, 'divInt')
  if (b === 0n) throw new ArithmeticError('DIVISION_BY_ZERO', 'divInt')
  return checkInt(a / b, 'divInt')
}

export function absInt(a: bigint): bigint {
  checkInt(a, 'absInt')
  return checkInt(a < 0n ? -a : a, 'absInt')
}

export function toInt256Safe(a: bigint): bigint {
  checkUint(a, 'toInt256Safe')
  if (a > INT256_MAX) throw new ArithmeticError('VALUE_TOO_LARGE_FOR_SIGNED', 'toInt256Safe')
  return a
}

export function toUint256Safe(a: bigint): bigint {
  checkInt(a, 'toUint256Safe')
  if (a < 0n) throw new ArithmeticError('UNDERFLOW', 'toUint256Safe')
  return a
}

export function minUint(a: bigint, b: bigint): bigint {
  return a < b ? a : b
}

/**
 * assertSupplyEnvelope
 * Startup check that the largest rate times the largest supply stays inside int256, which is what
 * keeps every per-cycle multiplication in range. Constrains configuration, so it runs once.
 */
export function assertSupplyEnvelope(maxRate: bigint = MAX_RATE, maxSupply: bigint = MAX_SUPPLY): void {
  if (maxRate * maxSupply > INT256_MAX) {
    throw new ArithmeticError('OVERFLOW', 'assertSupplyEnvelope')
  }
}
