/**
 * Reasons Registry
 * Centralizes all machine-parsable failure codes for fee estimation.
 * Each entry is stable so callers can branch on `code` instead of parsing messages.
 */
import { ReasonCode, ReasonDetail, REASONS as DTO_REASONS } from '@feescope/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export function getReason(code: ReasonCode): ReasonDetail { return DTO_REASONS[code] }

export type { ReasonDetail }
