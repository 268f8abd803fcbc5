// src/config.ts

/**
 * Centralized configuration module for environment variables and constants.
 */

// Load environment variables from .env.fee-estimate if it exists
import dotenv from 'dotenv'
import fs from 'fs'
import path from 'path'

// Resolve package root for both ts-jest (src) and built (dist/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const packageRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..')

const candidateEnvPaths = [
  path.join(packageRoot, '.env.fee-estimate'),
  path.join(process.cwd(), '.env.fee-estimate')
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

export type SdkConfig = {
  NODE_ENV: string
  MIRROR_NODE_URL: string
  FEE_ESTIMATE_TIMEOUT_MS: number
  LOG_LEVEL: string
}

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  return Number.isSafeInteger(n) && n > 0 ? n : fallback
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SdkConfig {
  return {
    NODE_ENV: env.NODE_ENV || 'development',
    // local mirror node REST port
    MIRROR_NODE_URL: env.MIRROR_NODE_URL || 'http://localhost:5551',
    FEE_ESTIMATE_TIMEOUT_MS: positiveInt(env.FEE_ESTIMATE_TIMEOUT_MS, 10_000),
    LOG_LEVEL: env.LOG_LEVEL || 'info'
  }
}

export const ENV = loadConfig()

export const CONSTANTS = {
  FEE_ESTIMATE_PATH: '/api/v1/network/fees'
}
