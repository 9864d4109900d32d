/**
 * Metric Harvester Core Types
 *
 * Capabilities the extraction engine consumes (DocumentTree, PageFetcher),
 * the HTML transport behind the default fetcher, and the registry shapes.
 */

import type { ILogger } from '@statline/logger'
import type { MetricCategory } from '@statline/metric-catalog'

// ═══════════════════════════════════════════════════════════════════════════════
// Document Tree Capability
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Navigable view of a parsed page.
 *
 * Only element nodes are exposed: siblings skip text and comment nodes, and
 * the document root is not a parent.
 */
export interface DocumentTree<TNode> {
  /** First element, depth-first in document order, satisfying the predicate */
  findFirst(predicate: (node: TNode) => boolean): TNode | null

  /** First element matching a CSS selector */
  selectFirst(selector: string): TNode | null

  /** Next element sibling */
  nextSibling(node: TNode): TNode | null

  /** Parent element */
  parent(node: TNode): TNode | null

  /** Label text of the subtree: trimmed text pieces joined by one space */
  text(node: TNode): string

  /** Value text of the subtree: trimmed text pieces joined with no separator */
  valueText(node: TNode): string

  /** Lowercase tag name */
  tagName(node: TNode): string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Page Fetcher Capability
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Turns a URL into a document tree.
 * Implementations reject with FetchError; no retry is implied by the contract.
 */
export interface PageFetcher<TNode> {
  fetch(url: string): Promise<DocumentTree<TNode>>
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTML Transport
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fetcher interface - returns raw HTML plus an explicit status.
 * HtmlPageFetcher wraps one of these into a PageFetcher.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** Request timeout in ms */
  timeoutMs?: number

  /** Maximum response size in bytes */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>
}

export const DEFAULT_USER_AGENT = 'statline-metrics-bot/1.0 (+https://example.com/contact)'

export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': DEFAULT_USER_AGENT,
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 10_000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
} as const satisfies FetchOptions

export type FetchResultStatus = 'ok' | 'error' | 'timeout' | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  html?: string
  error?: string
  durationMs: number
}

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableStatusCodes: number[]
}

/**
 * Single attempt. Retrying is opt-in per fetcher.
 */
export const NO_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

// ═══════════════════════════════════════════════════════════════════════════════
// Registry
// ═══════════════════════════════════════════════════════════════════════════════

export type RegistryState = 'uninitialized' | 'discovering' | 'ready' | 'failed'

export type DiscoveryMode = 'explicit' | 'auto'

export interface MetricRegistryOptions<TNode> {
  /** Page the metrics are read from */
  baseUrl: string

  /** Shared by every accessor of the registry */
  fetcher: PageFetcher<TNode>

  /** Metric name -> CSS selector. Omitted or empty means auto mode. */
  metricSelectors?: Readonly<Record<string, string>>

  /** Categories evaluated in auto mode (default: KNOWN_METRICS) */
  catalog?: readonly MetricCategory[]

  logger?: ILogger
}

/**
 * Two metric names that produced the same identifier.
 * The later registration replaced the earlier one.
 */
export interface IdentifierCollision {
  identifier: string
  replacedMetricName: string
  metricName: string
}
