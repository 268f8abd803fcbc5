import { FeeEstimateMode } from './enums'

/** Integer amount in the smallest currency unit. Inputs may use a safe-integer number. */
export type FeeAmount = bigint | number

/**
 * One named line item on top of a component's base fee.
 * The optional counters are filled in when the estimation service reports them.
 */
export interface FeeExtra {
  readonly name: string
  readonly subtotal: bigint
  readonly count?: number
  readonly included?: number
  readonly charged?: number
  readonly feePerUnit?: bigint
}

export interface FeeEstimate {
  readonly base: bigint
  readonly extras: readonly FeeExtra[]
  /** base + sum of extras[].subtotal */
  readonly subtotal: bigint
}

export interface NetworkFeeEstimate {
  readonly multiplier: bigint
  /** node subtotal * multiplier */
  readonly subtotal: bigint
}

export interface FeeEstimateResponse {
  readonly mode: FeeEstimateMode
  readonly network: NetworkFeeEstimate
  readonly node: FeeEstimate
  readonly service: FeeEstimate
  readonly notes: readonly string[]
  readonly total: bigint
}

export type FeeExtraInput = {
  name?: string
  subtotal: FeeAmount
  count?: number
  included?: number
  charged?: number
  feePerUnit?: FeeAmount
}

export type FeeComponentInput = {
  base: FeeAmount
  extras?: readonly FeeExtraInput[]
}

/**
 * Raw breakdown handed to the aggregator. Components are optional so that a
 * missing one can be reported instead of crashing on property access.
 */
export type FeeBreakdownInput = {
  mode?: FeeEstimateMode
  notes?: readonly string[]
  network?: { multiplier: FeeAmount }
  node?: FeeComponentInput
  service?: FeeComponentInput
}
