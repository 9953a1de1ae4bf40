/**
 * Reasons Registry
 * Centralizes all machine-parsable failure codes for the policy service.
 * Each entry is stable and consumed by operators and keepers to interpret failures deterministically.
 */
import { ReasonCode, ReasonDetail, REASONS as DTO_REASONS } from '@elastic-supply/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export function getReason(code: ReasonCode): ReasonDetail { return DTO_REASONS[code] }

export type { ReasonDetail }
