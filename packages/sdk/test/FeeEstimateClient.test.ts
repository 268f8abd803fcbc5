import nock from 'nock'
import pino from 'pino'
import { FeeEstimateClient } from '../src/FeeEstimateClient'
import { setLogger } from '../src/utils/logger'
import { FeeEstimateMode } from '@feescope/dto'
import { FeeEstimateError } from '@feescope/reasons'

const BASE_URL = 'http://mirror.test:5551'
const FEES_PATH = '/api/v1/network/fees'
const TX = Buffer.from('signed-transfer-tx')

const transferBody = {
  network: { multiplier: 9, subtotal: 900 },
  node: { base: 100, extras: [] },
  service: { base: 9000, extras: [] },
  notes: [],
  total: 10000,
}

async function failure(p: Promise<unknown>): Promise<FeeEstimateError> {
  try {
    await p
  } catch (e) {
    if (e instanceof FeeEstimateError) return e
    throw e
  }
  throw new Error('expected promise to reject with FeeEstimateError')
}

describe('FeeEstimateClient', () => {
  beforeAll(() => {
    nock.disableNetConnect()
    setLogger(pino({ level: 'silent' }))
  })

  afterAll(() => {
    nock.enableNetConnect()
  })

  afterEach(() => {
    nock.cleanAll()
  })

  test('posts transaction bytes with the mode and decodes the response', async () => {
    let received = ''
    const scope = nock(BASE_URL)
      .matchHeader('content-type', 'application/protobuf')
      .post(FEES_PATH, (body: unknown) => {
        received = String(body)
        return true
      })
      .query({ mode: 'STATE' })
      .reply(200, transferBody)

    const client = new FeeEstimateClient({ mirrorNodeUrl: `${BASE_URL}/` })
    const res = await client.estimate(TX, FeeEstimateMode.STATE)

    expect(scope.isDone()).toBe(true)
    expect(received).toBe('signed-transfer-tx')
    expect(res.mode).toBe(FeeEstimateMode.STATE)
    expect(res.node.subtotal).toBe(100n)
    expect(res.network.subtotal).toBe(900n)
    expect(res.total).toBe(10000n)
  })

  test('sends INTRINSIC mode and stamps it on a response without mode', async () => {
    nock(BASE_URL).post(FEES_PATH).query({ mode: 'INTRINSIC' }).reply(200, transferBody)

    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL })
    const res = await client.estimate(TX, FeeEstimateMode.INTRINSIC)
    expect(res.mode).toBe(FeeEstimateMode.INTRINSIC)
  })

  test('defaults to STATE when no mode is given', async () => {
    const scope = nock(BASE_URL).post(FEES_PATH).query({ mode: 'STATE' }).reply(200, transferBody)

    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL })
    const res = await client.estimate(TX)
    expect(scope.isDone()).toBe(true)
    expect(res.mode).toBe(FeeEstimateMode.STATE)
  })

  test('maps an error status to NETWORK_HTTP_ERROR with the mirror message', async () => {
    nock(BASE_URL)
      .post(FEES_PATH)
      .query(true)
      .reply(400, { _status: { messages: [{ message: 'Invalid transaction bytes' }] } })

    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL })
    const err = await failure(client.estimate(TX, FeeEstimateMode.STATE))
    expect(err.code).toBe('NETWORK_HTTP_ERROR')
    expect(err.reason.context).toEqual({ status: 400, detail: 'Invalid transaction bytes' })
  })

  test('maps a slow response to NETWORK_TIMEOUT', async () => {
    nock(BASE_URL).post(FEES_PATH).query(true).delay(300).reply(200, transferBody)

    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL, timeoutMs: 50 })
    const err = await failure(client.estimate(TX, FeeEstimateMode.STATE))
    expect(err.code).toBe('NETWORK_TIMEOUT')
  })

  test('maps a connection failure to NETWORK_UNAVAILABLE', async () => {
    nock(BASE_URL)
      .post(FEES_PATH)
      .query(true)
      .replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED 127.0.0.1:5551' })

    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL })
    const err = await failure(client.estimate(TX, FeeEstimateMode.STATE))
    expect(err.code).toBe('NETWORK_UNAVAILABLE')
  })

  test('a non-JSON body is a schema failure', async () => {
    nock(BASE_URL).post(FEES_PATH).query(true).reply(200, 'upstream says hi', { 'Content-Type': 'text/plain' })

    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL })
    const err = await failure(client.estimate(TX, FeeEstimateMode.STATE))
    expect(err.code).toBe('VALIDATION_SCHEMA_FAIL')
  })

  test('an inconsistent body is rejected with InvalidFeeComponent codes', async () => {
    nock(BASE_URL)
      .post(FEES_PATH)
      .query(true)
      .reply(200, { ...transferBody, total: 10001 })

    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL })
    const err = await failure(client.estimate(TX, FeeEstimateMode.STATE))
    expect(err.code).toBe('FEE_TOTAL_MISMATCH')
  })

  test('rejects empty bytes without a request', async () => {
    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL })
    const err = await failure(client.estimate(new Uint8Array(0), FeeEstimateMode.STATE))
    expect(err.code).toBe('CLIENT_BAD_REQUEST')
  })

  test('close() is idempotent and later calls fail with CLIENT_CLOSED', async () => {
    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL })
    expect(client.isClosed).toBe(false)
    client.close()
    client.close()
    expect(client.isClosed).toBe(true)
    const err = await failure(client.estimate(TX, FeeEstimateMode.STATE))
    expect(err.code).toBe('CLIENT_CLOSED')
  })

  test('close() aborts an in-flight request', async () => {
    nock(BASE_URL).post(FEES_PATH).query(true).delay(200).reply(200, transferBody)

    const client = new FeeEstimateClient({ mirrorNodeUrl: BASE_URL })
    const pending = client.estimate(TX, FeeEstimateMode.STATE)
    client.close()
    const err = await failure(pending)
    expect(err.code).toBe('CLIENT_CLOSED')
  })
})
