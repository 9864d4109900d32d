/**
 * HTTP Fetcher
 *
 * Native fetch with timeout, response size cap, identifying User-Agent and an
 * optional retry policy (single attempt unless configured).
 */

import type { Fetcher, FetchOptions, FetchResult, RetryPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, NO_RETRY_POLICY } from '../types.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Defaults applied to every request; per-call options win */
  defaults?: FetchOptions
}

interface ResolvedRequest {
  timeoutMs: number
  maxSizeBytes: number
  headers: Record<string, string>
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Decode the body, or null once more than maxBytes have arrived.
 */
async function readCapped(response: Response, maxBytes: number): Promise<string | null> {
  if (!response.body) return ''

  const reader = response.body.getReader()
  const decoder = new TextDecoder('utf-8')
  let received = 0
  let html = ''

  for (;;) {
    const chunk = await reader.read()
    if (chunk.done) {
      return html + decoder.decode()
    }

    received += chunk.value.byteLength
    if (received > maxBytes) {
      await reader.cancel()
      return null
    }
    html += decoder.decode(chunk.value, { stream: true })
  }
}

export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly defaults: FetchOptions

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? NO_RETRY_POLICY
    this.defaults = options.defaults ?? {}
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    const startedAt = Date.now()
    const request = this.resolveRequest(options)
    const { maxAttempts } = this.retryPolicy
    let lastError: unknown = null

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const isLastAttempt = attempt === maxAttempts

      let result: FetchResult
      try {
        result = await this.attempt(url, request, startedAt)
      } catch (error) {
        lastError = error
        if (isLastAttempt) break
        await sleep(this.backoffDelay(attempt))
        continue
      }

      if (isLastAttempt || !this.isRetryable(result)) {
        return result
      }
      await sleep(this.backoffDelay(attempt))
    }

    return {
      status: 'error',
      durationMs: Date.now() - startedAt,
      error: lastError instanceof Error ? lastError.message : 'Unknown error after retries',
    }
  }

  private resolveRequest(options: FetchOptions | undefined): ResolvedRequest {
    return {
      timeoutMs: options?.timeoutMs ?? this.defaults.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs,
      maxSizeBytes: options?.maxSizeBytes ?? this.defaults.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes,
      headers: { ...DEFAULT_FETCH_HEADERS, ...this.defaults.headers, ...options?.headers },
    }
  }

  /**
   * One request. Network failures other than the timeout are thrown.
   */
  private async attempt(url: string, request: ResolvedRequest, startedAt: number): Promise<FetchResult> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), request.timeoutMs)
    const elapsed = () => Date.now() - startedAt

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: request.headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        await response.body?.cancel()
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: elapsed(),
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const declaredSize = Number(response.headers.get('content-length'))
      if (declaredSize > request.maxSizeBytes) {
        await response.body?.cancel()
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: elapsed(),
          error: `Response too large: ${declaredSize} bytes`,
        }
      }

      const html = await readCapped(response, request.maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: elapsed(),
          error: `Response exceeded ${request.maxSizeBytes} bytes`,
        }
      }

      return { status: 'ok', statusCode: response.status, html, durationMs: elapsed() }
    } catch (error) {
      if (controller.signal.aborted) {
        return {
          status: 'timeout',
          durationMs: elapsed(),
          error: `Request timed out after ${request.timeoutMs}ms`,
        }
      }
      throw error
    } finally {
      clearTimeout(timer)
    }
  }

  private isRetryable(result: FetchResult): boolean {
    return (
      result.status === 'error' &&
      result.statusCode !== undefined &&
      this.retryPolicy.retryableStatusCodes.includes(result.statusCode)
    )
  }

  private backoffDelay(attempt: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs } = this.retryPolicy
    return Math.min(initialDelayMs * backoffMultiplier ** (attempt - 1), maxDelayMs)
  }
}
