import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, http_status, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // GATING: retry at the right time, never automatically
  GATING_OUTSIDE_REBASE_WINDOW: { code: 'GATING_OUTSIDE_REBASE_WINDOW', category: ReasonCategory.GATING, http_status: 409, message: 'Outside rebase window' },
  GATING_REBASE_TOO_SOON: { code: 'GATING_REBASE_TOO_SOON', category: ReasonCategory.GATING, http_status: 409, message: 'Rebase too soon' },

  // INPUT
  INPUT_ORACLE_DATA_INVALID: { code: 'INPUT_ORACLE_DATA_INVALID', category: ReasonCategory.INPUT, http_status: 502, message: 'Oracle data invalid' },
  INPUT_ORACLE_NOT_CONFIGURED: { code: 'INPUT_ORACLE_NOT_CONFIGURED', category: ReasonCategory.INPUT, http_status: 503, message: 'Oracle not configured' },

  // ARITHMETIC
  ARITHMETIC_OVERFLOW: { code: 'ARITHMETIC_OVERFLOW', category: ReasonCategory.ARITHMETIC, http_status: 500, message: 'Arithmetic overflow' },
  ARITHMETIC_UNDERFLOW: { code: 'ARITHMETIC_UNDERFLOW', category: ReasonCategory.ARITHMETIC, http_status: 500, message: 'Arithmetic underflow' },
  ARITHMETIC_VALUE_TOO_LARGE_FOR_SIGNED: { code: 'ARITHMETIC_VALUE_TOO_LARGE_FOR_SIGNED', category: ReasonCategory.ARITHMETIC, http_status: 500, message: 'Value too large for signed conversion' },
  ARITHMETIC_DIVISION_BY_ZERO: { code: 'ARITHMETIC_DIVISION_BY_ZERO', category: ReasonCategory.ARITHMETIC, http_status: 500, message: 'Division by zero' },

  // AUTHORIZATION
  AUTH_INDIRECT_CALL_REJECTED: { code: 'AUTH_INDIRECT_CALL_REJECTED', category: ReasonCategory.AUTHORIZATION, http_status: 403, message: 'Indirect call rejected' },
  AUTH_NOT_OWNER: { code: 'AUTH_NOT_OWNER', category: ReasonCategory.AUTHORIZATION, http_status: 403, message: 'Caller is not the owner' },
  AUTH_NOT_ORCHESTRATOR: { code: 'AUTH_NOT_ORCHESTRATOR', category: ReasonCategory.AUTHORIZATION, http_status: 403, message: 'Caller is not the orchestrator' },

  // DOWNSTREAM
  DOWNSTREAM_INSUFFICIENT_BUDGET: { code: 'DOWNSTREAM_INSUFFICIENT_BUDGET', category: ReasonCategory.DOWNSTREAM, http_status: 500, message: 'Insufficient compute budget for downstream call' },
  DOWNSTREAM_UNAPPROVED_FAILURE: { code: 'DOWNSTREAM_UNAPPROVED_FAILURE', category: ReasonCategory.DOWNSTREAM, http_status: 502, message: 'Unapproved transaction failure' },

  // CONFIG
  CONFIG_INVALID_PARAMETER: { code: 'CONFIG_INVALID_PARAMETER', category: ReasonCategory.CONFIG, http_status: 400, message: 'Invalid configuration parameter' },
  CONFIG_INDEX_OUT_OF_RANGE: { code: 'CONFIG_INDEX_OUT_OF_RANGE', category: ReasonCategory.CONFIG, http_status: 404, message: 'Transaction index out of range' },

  // LEDGER
  LEDGER_SUPPLY_INVARIANT: { code: 'LEDGER_SUPPLY_INVARIANT', category: ReasonCategory.LEDGER, http_status: 500, message: 'Ledger supply exceeds maximum' },

  CLIENT_BAD_REQUEST: { code: 'CLIENT_BAD_REQUEST', category: ReasonCategory.CLIENT, http_status: 400, message: 'Bad request' },
  CLIENT_NOT_FOUND: { code: 'CLIENT_NOT_FOUND', category: ReasonCategory.CLIENT, http_status: 404, message: 'Not found' },

  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Internal server error' },
}

export function getReason(code: ReasonCode): ReasonDetail {
  return REASONS[code]
}
