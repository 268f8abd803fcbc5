import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // FEE 1xxx
  FEE_NEGATIVE_VALUE: { code: 'FEE_NEGATIVE_VALUE', category: ReasonCategory.FEE, message: 'Fee amount must not be negative' },
  FEE_NOT_INTEGER: { code: 'FEE_NOT_INTEGER', category: ReasonCategory.FEE, message: 'Fee amount must be a safe integer' },
  FEE_COMPONENT_MISSING: { code: 'FEE_COMPONENT_MISSING', category: ReasonCategory.FEE, message: 'Required fee component is missing' },
  FEE_NETWORK_MISMATCH: { code: 'FEE_NETWORK_MISMATCH', category: ReasonCategory.FEE, message: 'Network subtotal does not equal node subtotal times multiplier' },
  FEE_TOTAL_MISMATCH: { code: 'FEE_TOTAL_MISMATCH', category: ReasonCategory.FEE, message: 'Total does not equal the sum of component subtotals' },
  FEE_CHUNK_MISMATCH: { code: 'FEE_CHUNK_MISMATCH', category: ReasonCategory.FEE, message: 'Chunk estimates disagree on mode or multiplier' },
  FEE_NO_CHUNKS: { code: 'FEE_NO_CHUNKS', category: ReasonCategory.FEE, message: 'No chunk estimates to aggregate' },

  // CLIENT 2xxx
  CLIENT_BAD_REQUEST: { code: 'CLIENT_BAD_REQUEST', category: ReasonCategory.CLIENT, message: 'Bad request' },
  CLIENT_CLOSED: { code: 'CLIENT_CLOSED', category: ReasonCategory.CLIENT, message: 'Fee estimate client is closed' },

  // VALIDATION 3xxx
  VALIDATION_SCHEMA_FAIL: { code: 'VALIDATION_SCHEMA_FAIL', category: ReasonCategory.VALIDATION, message: 'Fee estimate response failed schema validation' },

  // NETWORK 7xxx
  NETWORK_HTTP_ERROR: { code: 'NETWORK_HTTP_ERROR', category: ReasonCategory.NETWORK, message: 'Fee estimate service returned an error status' },
  NETWORK_TIMEOUT: { code: 'NETWORK_TIMEOUT', category: ReasonCategory.NETWORK, message: 'Fee estimate request timed out' },
  NETWORK_UNAVAILABLE: { code: 'NETWORK_UNAVAILABLE', category: ReasonCategory.NETWORK, message: 'Fee estimate service unavailable' },

  // INTERNAL 9xxx
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, message: 'Internal error' },
}
