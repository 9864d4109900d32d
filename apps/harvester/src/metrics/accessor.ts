/**
 * Metric Accessor
 *
 * Runtime handle for one metric: fetches its source page and applies the
 * owned extractor. Created by MetricRegistry; the registry is the only party
 * that rebinds the fetcher.
 */

import { coerceMetricValue, type MetricValue } from './coerce.js'
import { ConfigurationError, FetchError } from './errors.js'
import { runExtractor, type Extractor } from './extractors.js'
import type { DocumentTree, PageFetcher } from './types.js'

export interface MetricAccessorInit<TNode> {
  metricName: string
  identifier: string
  sourceUrl: string
  extractor: Extractor | undefined
  fetcher: PageFetcher<TNode>
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export class MetricAccessor<TNode> {
  readonly metricName: string
  readonly identifier: string
  readonly sourceUrl: string
  readonly extractor: Extractor | undefined
  private fetcher: PageFetcher<TNode>

  constructor(init: MetricAccessorInit<TNode>) {
    this.metricName = init.metricName
    this.identifier = init.identifier
    this.sourceUrl = init.sourceUrl
    this.extractor = init.extractor
    this.fetcher = init.fetcher
  }

  /**
   * Fetch a fresh copy of the source page and extract the raw metric text.
   * Bound extractors ignore the page and replay their captured value.
   *
   * @returns the raw text, or null when the page has no value for the metric
   * @throws ConfigurationError when the source URL or extractor is missing
   * @throws FetchError when the page cannot be fetched
   */
  async fetchRaw(): Promise<string | null> {
    if (!this.sourceUrl) {
      throw new ConfigurationError(`Metric '${this.metricName}' has no source URL`)
    }
    const extractor = this.extractor
    if (!extractor) {
      throw new ConfigurationError(`Metric '${this.metricName}' has no extractor`)
    }

    let tree: DocumentTree<TNode>
    try {
      tree = await this.fetcher.fetch(this.sourceUrl)
    } catch (error) {
      throw FetchError.from(this.sourceUrl, error)
    }

    return runExtractor(extractor, tree)
  }

  /**
   * Raw text coerced to a number where it holds one, else the raw text.
   */
  async getValue(): Promise<MetricValue> {
    return coerceMetricValue(await this.fetchRaw())
  }

  /**
   * Wait, then fetchRaw(). The delay is a courtesy to the remote site,
   * chosen by the caller.
   */
  async refresh(delaySeconds = 0): Promise<string | null> {
    if (delaySeconds > 0) {
      await sleep(delaySeconds * 1000)
    }
    return this.fetchRaw()
  }

  /** @internal registry-only */
  bindFetcher(fetcher: PageFetcher<TNode>): void {
    this.fetcher = fetcher
  }

  toString(): string {
    return `<Metric ${this.metricName} @ ${this.sourceUrl}>`
  }
}
