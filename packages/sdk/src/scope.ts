import { FeeEstimateClient } from './FeeEstimateClient'
import { FeeEstimateClientOptions } from './types'

/**
 * withFeeEstimateClient
 * Opens a client for the duration of `fn` and closes it on every exit path.
 */
export async function withFeeEstimateClient<T>(
  options: FeeEstimateClientOptions,
  fn: (client: FeeEstimateClient) => Promise<T>
): Promise<T> {
  const client = new FeeEstimateClient(options)
  try {
    return await fn(client)
  } finally {
    client.close()
  }
}
