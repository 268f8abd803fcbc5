import type { FeeEstimateMode, FeeEstimateResponse } from '@feescope/dto'

/** Anything that can price one serialized transaction (or chunk) in a given mode. */
export interface FeeEstimateTransport {
  estimate(transaction: Uint8Array, mode: FeeEstimateMode): Promise<FeeEstimateResponse>
}

export type FeeEstimateClientOptions = {
  mirrorNodeUrl?: string
  timeoutMs?: number
}

/** A serialized transaction, or the ordered chunks of one that is submitted in pieces. */
export type TransactionInput = Uint8Array | readonly Uint8Array[]
