import pino from 'pino'
import type { FeeEstimateMode, FeeEstimateResponse, ReasonCode } from '@feescope/dto'
import { ENV } from '../config'

type EstimatePayload = {
  response: FeeEstimateResponse
  chunks: number
}

type RequestPayload = {
  url: string
  mode: FeeEstimateMode
  bytes: number
}

type RequestFailedPayload = {
  url: string
  mode: FeeEstimateMode
  code: ReasonCode
  status?: number
}

// create default logger; tests can replace via setLogger
let logger: pino.BaseLogger = pino({ level: ENV.LOG_LEVEL })

export function setLogger(l: pino.BaseLogger) {
  logger = l
}

export function getLogger(): pino.BaseLogger {
  return logger
}

// amounts are bigint; JSON has no bigint so they go out as decimal strings
export function logFeeEstimate(payload: EstimatePayload): void {
  const { response } = payload
  logger.info({
    event: 'fee.estimate',
    mode: response.mode,
    chunks: payload.chunks,
    network_multiplier: response.network.multiplier.toString(),
    network_subtotal: response.network.subtotal.toString(),
    node_subtotal: response.node.subtotal.toString(),
    service_subtotal: response.service.subtotal.toString(),
    total: response.total.toString(),
    notes: response.notes.length
  })
}

export function logFeeRequest(payload: RequestPayload): void {
  logger.debug({
    event: 'fee.request',
    url: payload.url,
    mode: payload.mode,
    bytes: payload.bytes
  })
}

export function logFeeRequestFailed(payload: RequestFailedPayload): void {
  logger.warn({
    event: 'fee.request_failed',
    url: payload.url,
    mode: payload.mode,
    code: payload.code,
    status: payload.status
  })
}

// Short, human-friendly breakdown for terminal observers (non-JSON).
export function formatFeeBreakdown(response: FeeEstimateResponse): string {
  return [
    'Fee Estimate:',
    `  Mode: ${response.mode}`,
    `  Service Base: ${response.service.base}`,
    `  Network Subtotal: ${response.network.subtotal}`,
    `  Node Base: ${response.node.base}`,
    `  Total: ${response.total}`
  ].join('\n')
}
