/**
 * format.ts
 * Conversion between 18-decimal fixed-point bigints and their decimal string form.
 */
import { DECIMALS, ONE } from './fixedPoint'

const FIXED_RE = /^(-)?(\d+)(?:\.(\d+))?$/

/** formatFixed(1_500000000000000000n) === '1.5'; trailing zeros are dropped. */
export function formatFixed(value: bigint): string {
  const negative = value < 0n
  const abs = negative ? -value : value
  const whole = abs / ONE
  const frac = (abs % ONE).toString().padStart(DECIMALS, '0').replace(/0+$/, '')
  const body = frac.length ? `${whole}.${frac}` : whole.toString()
  return negative ? `-${body}` : body
}

/**
 * parseFixed
 * Accepts plain decimal strings with at most 18 fractional digits; anything else throws a RangeError.
 */
export function parseFixed(text: string): bigint {
  const m = FIXED_RE.exec(text.trim())
  if (!m) throw new RangeError(`not a decimal number: "${text}"`)
  const [, sign, whole, frac = ''] = m
  if (frac.length > DECIMALS) throw new RangeError(`more than ${DECIMALS} decimals: "${text}"`)
  const value = BigInt(whole) * ONE + BigInt(frac.padEnd(DECIMALS, '0'))
  return sign ? -value : value
}
