/**
 * feescope SDK public surface: fee-estimate query, client and wire decoding.
 */
export * from './types'
export * from './wire'
export * from './scope'
export { FeeEstimateClient } from './FeeEstimateClient'
export { FeeEstimateQuery } from './FeeEstimateQuery'
export { loadConfig, ENV, CONSTANTS } from './config'
export type { SdkConfig } from './config'
export { setLogger, getLogger, formatFeeBreakdown } from './utils/logger'
