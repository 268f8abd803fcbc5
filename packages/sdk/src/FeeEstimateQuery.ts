import { DEFAULT_FEE_ESTIMATE_MODE, FeeEstimateMode, FeeEstimateResponse } from '@feescope/dto'
import { FeeEstimateError } from '@feescope/reasons'
import { aggregateChunkEstimates } from '@feescope/math'
import { FeeEstimateTransport, TransactionInput } from './types'
import { logFeeEstimate } from './utils/logger'

/**
 * FeeEstimateQuery
 * Builder for one fee estimate. A transaction handed in as several chunks is
 * estimated chunk by chunk (in order) and the results are summed.
 */
export class FeeEstimateQuery {
  private chunks: Uint8Array[] = []
  private mode: FeeEstimateMode = DEFAULT_FEE_ESTIMATE_MODE

  setTransaction(transaction: TransactionInput): this {
    this.chunks = transaction instanceof Uint8Array ? [transaction] : [...transaction]
    return this
  }

  getTransactionChunks(): readonly Uint8Array[] {
    return this.chunks
  }

  setMode(mode: FeeEstimateMode): this {
    this.mode = mode
    return this
  }

  getMode(): FeeEstimateMode {
    return this.mode
  }

  async execute(transport: FeeEstimateTransport): Promise<FeeEstimateResponse> {
    if (this.chunks.length === 0) {
      throw FeeEstimateError.of('CLIENT_BAD_REQUEST', { message: 'No transaction set on fee estimate query' })
    }
    const emptyIdx = this.chunks.findIndex(c => c.length === 0)
    if (emptyIdx !== -1) {
      throw FeeEstimateError.of('CLIENT_BAD_REQUEST', {
        message: 'Transaction chunk is empty',
        context: { chunk: emptyIdx }
      })
    }

    const estimates: FeeEstimateResponse[] = []
    for (const chunk of this.chunks) {
      estimates.push(await transport.estimate(chunk, this.mode))
    }

    const response = aggregateChunkEstimates(estimates)
    logFeeEstimate({ response, chunks: estimates.length })
    return response
  }
}

export default FeeEstimateQuery
