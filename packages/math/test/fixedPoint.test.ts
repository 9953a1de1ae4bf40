import {
  ONE,
  UINT256_MAX,
  INT256_MAX,
  INT256_MIN,
  MAX_RATE,
  MAX_SUPPLY,
  addUint,
  subUint,
  mulUint,
  divUint,
  addInt,
  subInt,
  mulInt,
  divInt,
  absInt,
  toInt256Safe,
  toUint256Safe,
  assertSupplyEnvelope,
} from '../src/fixedPoint'
import { ArithmeticError, ArithmeticErrorKind } from '../src/errors'

function kindOf(fn: () => unknown): ArithmeticErrorKind | null {
  try {
    fn()
    return null
  } catch (e) {
    if (e instanceof ArithmeticError) return e.kind
    throw e
  }
}

describe('unsigned checked arithmetic', () => {
  it('computes in range results exactly', () => {
    expect(addUint(2n, 3n)).toBe(5n)
    expect(subUint(5n, 3n)).toBe(2n)
    expect(mulUint(ONE, 3n)).toBe(3n * ONE)
    expect(divUint(7n, 2n)).toBe(3n)
  })

  it('fails instead of wrapping', () => {
    expect(kindOf(() => addUint(UINT256_MAX, 1n))).toBe('OVERFLOW')
    expect(kindOf(() => subUint(1n, 2n))).toBe('UNDERFLOW')
    expect(kindOf(() => mulUint(UINT256_MAX, 2n))).toBe('OVERFLOW')
    expect(kindOf(() => divUint(1n, 0n))).toBe('DIVISION_BY_ZERO')
  })
})

describe('signed checked arithmetic', () => {
  it('truncates division toward zero', () => {
    expect(divInt(-7n, 2n)).toBe(-3n)
    expect(divInt(7n, -2n)).toBe(-3n)
    expect(divInt(7n, 2n)).toBe(3n)
  })

  it('rejects results outside int256', () => {
    expect(kindOf(() => addInt(INT256_MAX, 1n))).toBe('OVERFLOW')
    expect(kindOf(() => subInt(INT256_MIN, 1n))).toBe('UNDERFLOW')
    expect(kindOf(() => mulInt(INT256_MAX, 2n))).toBe('OVERFLOW')
    expect(kindOf(() => mulInt(INT256_MIN, 2n))).toBe('UNDERFLOW')
    expect(kindOf(() => divInt(INT256_MIN, -1n))).toBe('OVERFLOW')
    expect(kindOf(() => divInt(1n, 0n))).toBe('DIVISION_BY_ZERO')
    expect(kindOf(() => absInt(INT256_MIN))).toBe('OVERFLOW')
  })

  it('absInt mirrors negatives', () => {
    expect(absInt(-5n)).toBe(5n)
    expect(absInt(5n)).toBe(5n)
  })
})

describe('sign conversion', () => {
  it('toInt256Safe accepts INT256_MAX and rejects anything larger', () => {
    expect(toInt256Safe(INT256_MAX)).toBe(INT256_MAX)
    expect(kindOf(() => toInt256Safe(INT256_MAX + 1n))).toBe('VALUE_TOO_LARGE_FOR_SIGNED')
  })

  it('toUint256Safe rejects negatives', () => {
    expect(toUint256Safe(0n)).toBe(0n)
    expect(kindOf(() => toUint256Safe(-1n))).toBe('UNDERFLOW')
  })
})

describe('supply envelope', () => {
  it('holds for the shipped constants', () => {
    expect(() => assertSupplyEnvelope()).not.toThrow()
    expect(MAX_RATE * MAX_SUPPLY <= INT256_MAX).toBe(true)
  })

  it('fails once the ceiling product leaves int256', () => {
    expect(kindOf(() => assertSupplyEnvelope(MAX_RATE, MAX_SUPPLY + 1n))).toBe('OVERFLOW')
  })

  it('names the failing operation in the message', () => {
    const err = new ArithmeticError('DIVISION_BY_ZERO', 'divUint')
    expect(err.message).toBe('division by zero in divUint')
  })
})
