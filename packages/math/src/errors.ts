/**
 * errors.ts
 * Typed failure for checked arithmetic. Nothing in this package wraps silently; every out-of-range
 * result throws an ArithmeticError naming the operation that produced it.
 */

export type ArithmeticErrorKind = 'OVERFLOW' | 'UNDERFLOW' | 'VALUE_TOO_LARGE_FOR_SIGNED' | 'DIVISION_BY_ZERO'

export class ArithmeticError extends Error {
  public readonly kind: ArithmeticErrorKind
  public readonly op: string

  constructor(kind: ArithmeticErrorKind, op: string) {
    super(`${kind.toLowerCase().replace(/_/g, ' ')} in ${op}`)
    this.name = 'ArithmeticError'
    this.kind = kind
    this.op = op
  }
}
