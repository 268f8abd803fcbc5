export enum FeeEstimateMode {
  STATE = "STATE",
  INTRINSIC = "INTRINSIC",
}

export const DEFAULT_FEE_ESTIMATE_MODE = FeeEstimateMode.STATE;

export enum ReasonCategory {
  FEE = "FEE",
  CLIENT = "CLIENT",
  VALIDATION = "VALIDATION",
  NETWORK = "NETWORK",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "FEE_NEGATIVE_VALUE"
  | "FEE_NOT_INTEGER"
  | "FEE_COMPONENT_MISSING"
  | "FEE_NETWORK_MISMATCH"
  | "FEE_TOTAL_MISMATCH"
  | "FEE_CHUNK_MISMATCH"
  | "FEE_NO_CHUNKS"
  | "CLIENT_BAD_REQUEST"
  | "CLIENT_CLOSED"
  | "VALIDATION_SCHEMA_FAIL"
  | "NETWORK_HTTP_ERROR"
  | "NETWORK_TIMEOUT"
  | "NETWORK_UNAVAILABLE"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  message: string;
  context?: Record<string, string | number | boolean>;
}
