/**
 * Error taxonomy for metric harvesting.
 *
 * "No value" is not an error: extractors and accessors return null for it.
 */

import type { FetchResultStatus } from './types.js'

export type MetricsErrorCode = 'FETCH_FAILED' | 'CONFIGURATION_ERROR'

export class MetricsError extends Error {
  readonly code: MetricsErrorCode

  constructor(code: MetricsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'MetricsError'
    this.code = code
  }
}

export type FetchFailureStatus = Exclude<FetchResultStatus, 'ok'>

/**
 * The page fetcher failed: network, timeout, non-success status or
 * unreadable content. Surfaced to the caller, never retried by the core.
 */
export class FetchError extends MetricsError {
  readonly url: string
  readonly status: FetchFailureStatus
  readonly statusCode?: number

  constructor(
    url: string,
    message: string,
    details: { status?: FetchFailureStatus; statusCode?: number; cause?: unknown } = {}
  ) {
    super('FETCH_FAILED', message, { cause: details.cause })
    this.name = 'FetchError'
    this.url = url
    this.status = details.status ?? 'error'
    this.statusCode = details.statusCode
  }

  /**
   * Wrap whatever a fetcher threw. FetchErrors pass through untouched.
   */
  static from(url: string, error: unknown): FetchError {
    if (error instanceof FetchError) {
      return error
    }
    const message = error instanceof Error ? error.message : String(error)
    return new FetchError(url, `Failed to fetch ${url}: ${message}`, { cause: error })
  }
}

/**
 * A required input (URL, extractor, selector) is missing or invalid, or the
 * registry is used out of order. Programmer error; not recoverable.
 */
export class ConfigurationError extends MetricsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options)
    this.name = 'ConfigurationError'
  }
}
