/**
 * Fetch settings from the environment.
 *
 * METRICS_FETCH_TIMEOUT_MS     request timeout (default 10000)
 * METRICS_MAX_RESPONSE_BYTES   response size cap (default 10 MB)
 * METRICS_USER_AGENT           User-Agent header (default: statline bot UA)
 * METRICS_FETCH_MAX_ATTEMPTS   attempts per fetch, 1 = no retry (default 1)
 */

import { DEFAULT_FETCH_OPTIONS, DEFAULT_USER_AGENT } from '../metrics/types.js'

export interface FetchSettings {
  timeoutMs: number
  maxSizeBytes: number
  userAgent: string
  maxAttempts: number
}

function positiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback
  const parsed = Number.parseInt(raw, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback
}

export function loadFetchSettings(env: NodeJS.ProcessEnv = process.env): FetchSettings {
  return {
    timeoutMs: positiveInt(env.METRICS_FETCH_TIMEOUT_MS, DEFAULT_FETCH_OPTIONS.timeoutMs),
    maxSizeBytes: positiveInt(env.METRICS_MAX_RESPONSE_BYTES, DEFAULT_FETCH_OPTIONS.maxSizeBytes),
    userAgent: env.METRICS_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    maxAttempts: positiveInt(env.METRICS_FETCH_MAX_ATTEMPTS, 1),
  }
}
