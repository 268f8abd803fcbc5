/**
 * Fee estimation errors
 * Every failure carries a ReasonDetail so callers get a deterministic shape across layers.
 */
import { ReasonDetail, ReasonCode } from '@feescope/dto'
import { reason, ReasonOverrides } from './factory'

export class FeeEstimateError extends Error {
  public readonly reason: ReasonDetail

  constructor(detail: ReasonDetail, options?: { cause?: unknown }) {
    super(detail.message)
    this.name = 'FeeEstimateError'
    this.reason = detail
    if (options?.cause !== undefined) this.cause = options.cause
  }

  get code(): ReasonCode {
    return this.reason.code
  }

  static of(code: ReasonCode, overrides?: ReasonOverrides, cause?: unknown): FeeEstimateError {
    return new FeeEstimateError(reason(code, overrides), { cause })
  }
}

/**
 * Raised by the aggregator for negative amounts, missing components and broken totals.
 * Only FEE_* codes are used with this class.
 */
export class InvalidFeeComponent extends FeeEstimateError {
  constructor(detail: ReasonDetail) {
    super(detail)
    this.name = 'InvalidFeeComponent'
  }

  static because(code: ReasonCode, overrides?: ReasonOverrides): InvalidFeeComponent {
    return new InvalidFeeComponent(reason(code, overrides))
  }
}

export function isFeeEstimateError(e: unknown): e is FeeEstimateError {
  return e instanceof FeeEstimateError
}
