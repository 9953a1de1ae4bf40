/**
 * ReasonedRejection Error
 * Wraps a ReasonDetail so every failure leaving a component has the same deterministic shape.
 */
import { ReasonCode, ReasonDetail } from '@elastic-supply/dto'
import { reason, ReasonOverrides } from './factory'

export class ReasonedRejection extends Error {
  public readonly reason: ReasonDetail

  constructor(detail: ReasonDetail, human?: string) {
    super(human ?? detail.message)
    this.name = 'ReasonedRejection'
    this.reason = detail
  }

  get code(): ReasonCode {
    return this.reason.code
  }
}

/** Build a ReasonedRejection straight from a registry code. */
export function rejection(code: ReasonCode, overrides?: ReasonOverrides): ReasonedRejection {
  return new ReasonedRejection(reason(code, overrides))
}

export function isReasonedRejection(err: unknown): err is ReasonedRejection {
  return err instanceof ReasonedRejection
}
