import axios, { AxiosInstance } from 'axios'
import { DEFAULT_FEE_ESTIMATE_MODE, FeeEstimateMode, FeeEstimateResponse } from '@feescope/dto'
import { FeeEstimateError } from '@feescope/reasons'
import { CONSTANTS, ENV } from './config'
import { FeeEstimateClientOptions, FeeEstimateTransport } from './types'
import { describeErrorBody, parseFeeEstimateResponse } from './wire'
import { logFeeRequest, logFeeRequestFailed } from './utils/logger'

/**
 * FeeEstimateClient
 *
 * Purpose:
 *  - Asks a mirror node what a serialized transaction would cost
 *  - POSTs the transaction bytes to `/api/v1/network/fees?mode=STATE|INTRINSIC`
 *
 * Lifetime:
 *  - One AbortController per client; `close()` aborts in-flight requests and
 *    every later `estimate()` fails with CLIENT_CLOSED
 *
 * Notes:
 *  - One request per call. Failures are mapped to reason codes and thrown to
 *    the caller; nothing is retried here.
 */
export class FeeEstimateClient implements FeeEstimateTransport {
  private readonly baseUrl: string
  private readonly http: AxiosInstance
  private readonly controller = new AbortController()
  private closed = false

  constructor(options: FeeEstimateClientOptions = {}) {
    this.baseUrl = (options.mirrorNodeUrl ?? ENV.MIRROR_NODE_URL).replace(/\/$/, '')
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? ENV.FEE_ESTIMATE_TIMEOUT_MS
    })
  }

  get isClosed(): boolean {
    return this.closed
  }

  public async estimate(
    transaction: Uint8Array,
    mode: FeeEstimateMode = DEFAULT_FEE_ESTIMATE_MODE
  ): Promise<FeeEstimateResponse> {
    if (this.closed) throw FeeEstimateError.of('CLIENT_CLOSED')
    if (transaction.length === 0) {
      throw FeeEstimateError.of('CLIENT_BAD_REQUEST', { message: 'Transaction bytes are empty' })
    }

    const url = `${this.baseUrl}${CONSTANTS.FEE_ESTIMATE_PATH}`
    logFeeRequest({ url, mode, bytes: transaction.length })

    let body: unknown
    try {
      const res = await this.http.post<unknown>(CONSTANTS.FEE_ESTIMATE_PATH, Buffer.from(transaction), {
        params: { mode },
        headers: {
          'Content-Type': 'application/protobuf',
          Accept: 'application/json'
        },
        signal: this.controller.signal
      })
      body = res.data
    } catch (e: unknown) {
      const err = this.toFeeEstimateError(e)
      const status = err.reason.context?.status
      logFeeRequestFailed({
        url,
        mode,
        code: err.code,
        status: typeof status === 'number' ? status : undefined
      })
      throw err
    }

    return parseFeeEstimateResponse(body, mode)
  }

  /** Idempotent. */
  public close(): void {
    if (this.closed) return
    this.closed = true
    this.controller.abort()
  }

  private toFeeEstimateError(e: unknown): FeeEstimateError {
    if (axios.isCancel(e)) return FeeEstimateError.of('CLIENT_CLOSED', undefined, e)
    if (axios.isAxiosError(e)) {
      if (e.response) {
        return FeeEstimateError.of(
          'NETWORK_HTTP_ERROR',
          { context: { status: e.response.status, detail: describeErrorBody(e.response.data) } },
          e
        )
      }
      if (e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT') {
        return FeeEstimateError.of('NETWORK_TIMEOUT', { context: { detail: e.message } }, e)
      }
      return FeeEstimateError.of('NETWORK_UNAVAILABLE', { context: { detail: e.message } }, e)
    }
    return FeeEstimateError.of('INTERNAL_ERROR', { context: { detail: String(e) } }, e)
  }
}

export default FeeEstimateClient
