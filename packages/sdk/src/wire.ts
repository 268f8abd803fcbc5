/* Decodes the JSON body returned by the mirror node fee-estimate endpoint.
    Shape is checked with zod; arithmetic consistency is checked by the math package. */

import { z } from 'zod'
import { FeeEstimateMode, FeeEstimateResponse, FeeExtraInput } from '@feescope/dto'
import { FeeEstimateError } from '@feescope/reasons'
import {
  buildFeeEstimate,
  freezeFeeEstimateResponse,
  requireComponent,
  toFeeUnits,
  verifyFeeEstimateResponse,
} from '@feescope/math'

// int64 values may be serialized as JSON numbers or as decimal strings.
// A number past 2^53 was already rounded by JSON.parse, so only the string form can carry it.
const IntegerSchema = z
  .union([
    z.number().int().refine(Number.isSafeInteger, { message: 'Integer is outside the safe range; send it as a string' }),
    z.string().regex(/^-?\d+$/),
  ])
  .transform(v => BigInt(v))

const FeeExtraWireSchema = z.object({
  name: z.string(),
  subtotal: IntegerSchema,
  count: z.number().int().optional(),
  included: z.number().int().optional(),
  charged: z.number().int().optional(),
  fee_per_unit: IntegerSchema.optional(),
})

const FeeEstimateWireSchema = z.object({
  base: IntegerSchema,
  extras: z.array(FeeExtraWireSchema).default([]),
})

const NetworkFeeWireSchema = z.object({
  multiplier: IntegerSchema,
  subtotal: IntegerSchema,
})

export const FeeEstimateResponseWireSchema = z.object({
  mode: z.nativeEnum(FeeEstimateMode).optional(),
  network: NetworkFeeWireSchema.nullish(),
  node: FeeEstimateWireSchema.nullish(),
  service: FeeEstimateWireSchema.nullish(),
  notes: z.array(z.string()).default([]),
  total: IntegerSchema,
})

export type FeeEstimateResponseWire = z.input<typeof FeeEstimateResponseWireSchema>

// mirror node error body: { "_status": { "messages": [{ "message": "..." }] } }
const MirrorErrorSchema = z.object({
  _status: z.object({ messages: z.array(z.object({ message: z.string() })) }),
})

type FeeEstimateWire = z.output<typeof FeeEstimateWireSchema>

function toComponentInput(wire: FeeEstimateWire) {
  return {
    base: wire.base,
    extras: wire.extras.map((e): FeeExtraInput => ({
      name: e.name,
      subtotal: e.subtotal,
      count: e.count,
      included: e.included,
      charged: e.charged,
      feePerUnit: e.fee_per_unit,
    })),
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
}

/**
 * parseFeeEstimateResponse
 * Validates the wire shape, converts amounts to bigint and checks both invariants
 * against the subtotal and total the service reported. A body without `mode`
 * takes the mode the request was made with; a body reporting another mode is rejected.
 */
export function parseFeeEstimateResponse(body: unknown, requestMode: FeeEstimateMode): FeeEstimateResponse {
  const parsed = FeeEstimateResponseWireSchema.safeParse(body)
  if (!parsed.success) {
    throw FeeEstimateError.of('VALIDATION_SCHEMA_FAIL', { context: { detail: describeIssues(parsed.error) } })
  }
  const wire = parsed.data
  if (wire.mode !== undefined && wire.mode !== requestMode) {
    throw FeeEstimateError.of('VALIDATION_SCHEMA_FAIL', {
      message: 'Fee estimate response mode does not match the requested mode',
      context: { field: 'mode', expected: requestMode, got: wire.mode },
    })
  }
  const network = requireComponent(wire.network, 'network')
  const node = requireComponent(wire.node, 'node')
  const service = requireComponent(wire.service, 'service')

  const response = freezeFeeEstimateResponse({
    mode: requestMode,
    network: {
      multiplier: toFeeUnits(network.multiplier, 'network.multiplier'),
      subtotal: toFeeUnits(network.subtotal, 'network.subtotal'),
    },
    node: buildFeeEstimate(toComponentInput(node), 'node'),
    service: buildFeeEstimate(toComponentInput(service), 'service'),
    notes: wire.notes,
    total: toFeeUnits(wire.total, 'total'),
  })
  return verifyFeeEstimateResponse(response)
}

export function describeErrorBody(data: unknown): string {
  if (data === undefined || data === null) return ''
  if (typeof data === 'string') return data
  const mirror = MirrorErrorSchema.safeParse(data)
  if (mirror.success) return mirror.data._status.messages.map(m => m.message).join('; ')
  return JSON.stringify(data)
}
