/**
 * chunks.ts
 * Combines per-chunk estimates of a transaction that is submitted in several chunks
 * (file append, long topic messages) into one response. Pure functions only.
 *
 * Rule: the aggregate is the component-wise sum of the chunks. Chunks must agree on
 * mode and multiplier, so network = (sum of node subtotals) * multiplier still holds.
 */
import { FeeEstimate, FeeEstimateResponse } from '@feescope/dto'
import { InvalidFeeComponent } from '@feescope/reasons'
import { freezeFeeEstimateResponse, verifyFeeEstimateResponse } from './fee'

function mergeComponents(components: readonly FeeEstimate[]): FeeEstimate {
  return {
    base: components.reduce((acc, c) => acc + c.base, 0n),
    extras: components.flatMap(c => c.extras),
    subtotal: components.reduce((acc, c) => acc + c.subtotal, 0n),
  }
}

function mergeNotes(chunks: readonly FeeEstimateResponse[]): string[] {
  const seen = new Set<string>()
  for (const chunk of chunks) {
    for (const note of chunk.notes) seen.add(note)
  }
  return [...seen]
}

export function aggregateChunkEstimates(chunks: readonly FeeEstimateResponse[]): FeeEstimateResponse {
  if (chunks.length === 0) throw InvalidFeeComponent.because('FEE_NO_CHUNKS')
  const [first, ...rest] = chunks
  if (rest.length === 0) return first

  rest.forEach((chunk, i) => {
    if (chunk.mode !== first.mode) {
      throw InvalidFeeComponent.because('FEE_CHUNK_MISMATCH', {
        context: { chunk: i + 1, field: 'mode', expected: first.mode, got: chunk.mode },
      })
    }
    if (chunk.network.multiplier !== first.network.multiplier) {
      throw InvalidFeeComponent.because('FEE_CHUNK_MISMATCH', {
        context: {
          chunk: i + 1,
          field: 'network.multiplier',
          expected: first.network.multiplier.toString(),
          got: chunk.network.multiplier.toString(),
        },
      })
    }
  })

  const aggregate = freezeFeeEstimateResponse({
    mode: first.mode,
    network: {
      multiplier: first.network.multiplier,
      subtotal: chunks.reduce((acc, c) => acc + c.network.subtotal, 0n),
    },
    node: mergeComponents(chunks.map(c => c.node)),
    service: mergeComponents(chunks.map(c => c.service)),
    notes: mergeNotes(chunks),
    total: chunks.reduce((acc, c) => acc + c.total, 0n),
  })
  return verifyFeeEstimateResponse(aggregate)
}
