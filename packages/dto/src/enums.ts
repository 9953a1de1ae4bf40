export enum CycleOutcome {
  COMMITTED = "COMMITTED",
  ROLLED_BACK = "ROLLED_BACK",
}

export enum CallStatus {
  SUCCESS = "SUCCESS",
  TOLERATED = "TOLERATED",
  SKIPPED = "SKIPPED",
}

export enum ReasonCategory {
  GATING = "GATING",
  INPUT = "INPUT",
  ARITHMETIC = "ARITHMETIC",
  AUTHORIZATION = "AUTHORIZATION",
  DOWNSTREAM = "DOWNSTREAM",
  CONFIG = "CONFIG",
  LEDGER = "LEDGER",
  CLIENT = "CLIENT",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "GATING_OUTSIDE_REBASE_WINDOW"
  | "GATING_REBASE_TOO_SOON"
  | "INPUT_ORACLE_DATA_INVALID"
  | "INPUT_ORACLE_NOT_CONFIGURED"
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW"
  | "ARITHMETIC_VALUE_TOO_LARGE_FOR_SIGNED"
  | "ARITHMETIC_DIVISION_BY_ZERO"
  | "AUTH_INDIRECT_CALL_REJECTED"
  | "AUTH_NOT_OWNER"
  | "AUTH_NOT_ORCHESTRATOR"
  | "DOWNSTREAM_INSUFFICIENT_BUDGET"
  | "DOWNSTREAM_UNAPPROVED_FAILURE"
  | "CONFIG_INVALID_PARAMETER"
  | "CONFIG_INDEX_OUT_OF_RANGE"
  | "LEDGER_SUPPLY_INVARIANT"
  | "CLIENT_BAD_REQUEST"
  | "CLIENT_NOT_FOUND"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  http_status: number;
  message: string;
  context?: Record<string, string | number | boolean>;
}

export interface ErrorEnvelope {
  corr_id: string;
  reason: ReasonDetail;
  ts: string; // RFC3339 UTC
}
