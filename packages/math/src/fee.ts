/**
 * fee.ts
 * Fee breakdown aggregation: component subtotals, network derivation and totals.
 * Pure functions only (no I/O, no side-effects). Amounts are bigint in the smallest currency unit.
 */
import {
  DEFAULT_FEE_ESTIMATE_MODE,
  FeeAmount,
  FeeBreakdownInput,
  FeeComponentInput,
  FeeEstimate,
  FeeEstimateResponse,
  FeeExtra,
  FeeExtraInput,
  NetworkFeeEstimate,
} from '@feescope/dto'
import { InvalidFeeComponent } from '@feescope/reasons'

export type ComponentName = 'network' | 'node' | 'service'

/** Anything with a base and extras: raw input or an already computed FeeEstimate. */
export type FeeComponentLike = {
  base: FeeAmount
  extras?: readonly { subtotal: FeeAmount }[]
}

export type FeeEstimateResponseLike = {
  network?: { multiplier: FeeAmount; subtotal: FeeAmount } | null
  node?: FeeComponentLike | null
  service?: FeeComponentLike | null
}

/**
 * toFeeUnits
 * Normalizes an amount to bigint. Numbers must be safe integers; negatives are rejected.
 */
export function toFeeUnits(value: FeeAmount, field: string): bigint {
  let units: bigint
  if (typeof value === 'bigint') units = value
  else if (typeof value === 'number' && Number.isSafeInteger(value)) units = BigInt(value)
  else throw InvalidFeeComponent.because('FEE_NOT_INTEGER', { context: { field, value: String(value) } })

  if (units < 0n) {
    throw InvalidFeeComponent.because('FEE_NEGATIVE_VALUE', { context: { field, value: units.toString() } })
  }
  return units
}

function toCount(value: number, field: string): number {
  return Number(toFeeUnits(value, field))
}

export function requireComponent<T>(value: T | null | undefined, component: ComponentName): T {
  if (value === undefined || value === null) {
    throw InvalidFeeComponent.because('FEE_COMPONENT_MISSING', { context: { component } })
  }
  return value
}

/**
 * computeSubtotal
 * subtotal = base + sum(extras[].subtotal); an empty extras list yields the base.
 */
export function computeSubtotal(estimate: FeeComponentLike, field = 'estimate'): bigint {
  const base = toFeeUnits(estimate.base, `${field}.base`)
  return (estimate.extras ?? []).reduce(
    (acc, extra, i) => acc + toFeeUnits(extra.subtotal, `${field}.extras[${i}].subtotal`),
    base
  )
}

/**
 * computeNetworkSubtotal
 * network = nodeSubtotal * multiplier; a zero multiplier zeroes the network fee.
 */
export function computeNetworkSubtotal(nodeSubtotal: FeeAmount, multiplier: FeeAmount): bigint {
  return toFeeUnits(nodeSubtotal, 'node.subtotal') * toFeeUnits(multiplier, 'network.multiplier')
}

/**
 * computeResponseTotal
 * total = network.subtotal + node subtotal + service subtotal.
 * The reported network subtotal must equal node subtotal * multiplier.
 */
export function computeResponseTotal(response: FeeEstimateResponseLike): bigint {
  const network = requireComponent(response.network, 'network')
  const node = requireComponent(response.node, 'node')
  const service = requireComponent(response.service, 'service')

  const nodeSubtotal = computeSubtotal(node, 'node')
  const serviceSubtotal = computeSubtotal(service, 'service')
  const expected = computeNetworkSubtotal(nodeSubtotal, network.multiplier)
  const reported = toFeeUnits(network.subtotal, 'network.subtotal')
  if (reported !== expected) {
    throw InvalidFeeComponent.because('FEE_NETWORK_MISMATCH', {
      context: { expected: expected.toString(), reported: reported.toString() },
    })
  }
  return reported + nodeSubtotal + serviceSubtotal
}

function buildFeeExtra(input: FeeExtraInput, field: string): FeeExtra {
  const extra: {
    name: string
    subtotal: bigint
    count?: number
    included?: number
    charged?: number
    feePerUnit?: bigint
  } = {
    name: input.name ?? '',
    subtotal: toFeeUnits(input.subtotal, `${field}.subtotal`),
  }
  if (input.count !== undefined) extra.count = toCount(input.count, `${field}.count`)
  if (input.included !== undefined) extra.included = toCount(input.included, `${field}.included`)
  if (input.charged !== undefined) extra.charged = toCount(input.charged, `${field}.charged`)
  if (input.feePerUnit !== undefined) extra.feePerUnit = toFeeUnits(input.feePerUnit, `${field}.feePerUnit`)
  return Object.freeze(extra)
}

export function buildFeeEstimate(input: FeeComponentInput, field: string): FeeEstimate {
  const base = toFeeUnits(input.base, `${field}.base`)
  const extras = (input.extras ?? []).map((e, i) => buildFeeExtra(e, `${field}.extras[${i}]`))
  return Object.freeze({
    base,
    extras: Object.freeze(extras),
    subtotal: computeSubtotal({ base, extras }, field),
  })
}

export function freezeFeeEstimateResponse(response: {
  mode: FeeEstimateResponse['mode']
  network: NetworkFeeEstimate
  node: FeeEstimate
  service: FeeEstimate
  notes: readonly string[]
  total: bigint
}): FeeEstimateResponse {
  return Object.freeze({
    mode: response.mode,
    network: Object.freeze({ ...response.network }),
    node: Object.freeze({ ...response.node, extras: Object.freeze([...response.node.extras]) }),
    service: Object.freeze({ ...response.service, extras: Object.freeze([...response.service.extras]) }),
    notes: Object.freeze([...response.notes]),
    total: response.total,
  })
}

/**
 * buildFeeEstimateResponse
 * Computing role: derives every subtotal and the total from a raw breakdown.
 * Mode defaults to STATE, notes to an empty list.
 */
export function buildFeeEstimateResponse(input: FeeBreakdownInput): FeeEstimateResponse {
  const networkInput = requireComponent(input.network, 'network')
  const nodeInput = requireComponent(input.node, 'node')
  const serviceInput = requireComponent(input.service, 'service')

  const node = buildFeeEstimate(nodeInput, 'node')
  const service = buildFeeEstimate(serviceInput, 'service')
  const multiplier = toFeeUnits(networkInput.multiplier, 'network.multiplier')
  const network = { multiplier, subtotal: computeNetworkSubtotal(node.subtotal, multiplier) }

  return freezeFeeEstimateResponse({
    mode: input.mode ?? DEFAULT_FEE_ESTIMATE_MODE,
    network,
    node,
    service,
    notes: input.notes ?? [],
    total: network.subtotal + node.subtotal + service.subtotal,
  })
}

/**
 * verifyFeeEstimateResponse
 * Validating role: checks a response whose subtotals and total were reported elsewhere.
 */
export function verifyFeeEstimateResponse(response: FeeEstimateResponse): FeeEstimateResponse {
  const total = computeResponseTotal(response)
  for (const component of ['node', 'service'] as const) {
    const reported = toFeeUnits(response[component].subtotal, `${component}.subtotal`)
    const computed = computeSubtotal(response[component], component)
    if (reported !== computed) {
      throw InvalidFeeComponent.because('FEE_TOTAL_MISMATCH', {
        context: { field: `${component}.subtotal`, expected: computed.toString(), reported: reported.toString() },
      })
    }
  }
  const reportedTotal = toFeeUnits(response.total, 'total')
  if (reportedTotal !== total) {
    throw InvalidFeeComponent.because('FEE_TOTAL_MISMATCH', {
      context: { field: 'total', expected: total.toString(), reported: reportedTotal.toString() },
    })
  }
  return response
}
