/**
 * Maps anything thrown inside a unit of work onto the shared ReasonedRejection shape.
 */
import { ReasonCode } from '@elastic-supply/dto'
import { ArithmeticError, ArithmeticErrorKind } from '@elastic-supply/math'
import { ReasonedRejection, isReasonedRejection, rejection } from '@elastic-supply/reasons'

const ARITHMETIC_CODES: Record<ArithmeticErrorKind, ReasonCode> = {
  OVERFLOW: 'ARITHMETIC_OVERFLOW',
  UNDERFLOW: 'ARITHMETIC_UNDERFLOW',
  VALUE_TOO_LARGE_FOR_SIGNED: 'ARITHMETIC_VALUE_TOO_LARGE_FOR_SIGNED',
  DIVISION_BY_ZERO: 'ARITHMETIC_DIVISION_BY_ZERO',
}

export function toRejection(err: unknown): ReasonedRejection {
  if (isReasonedRejection(err)) return err
  if (err instanceof ArithmeticError) {
    return rejection(ARITHMETIC_CODES[err.kind], { context: { op: err.op } })
  }
  const detail = err instanceof Error ? err.message : String(err)
  return rejection('INTERNAL_ERROR', { context: { error: detail } })
}
