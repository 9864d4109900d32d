/**
 * Metric Registry
 *
 * Discovers the metrics of one page and holds one accessor per metric.
 *
 * State machine:
 *   uninitialized -> discovering -> ready
 *                               \-> failed
 *
 * ready and failed are terminal. Fresh discovery means a new registry.
 *
 * Explicit mode: caller-supplied selectors, one lazy selector extractor each,
 * no fetch during discovery.
 * Auto mode: one fetch of the base URL, then every catalog category is
 * evaluated against that page.
 */

import type { ILogger } from '@statline/logger'
import { loggers } from '../config/logger.js'
import { MetricAccessor } from './accessor.js'
import { ConfigurationError, FetchError } from './errors.js'
import { fromDiscovery, fromSelector, isLazy, type Extractor } from './extractors.js'
import { toMetricIdentifier } from './identifier.js'
import { LabelMatcher } from './matching/label-matcher.js'
import type {
  DiscoveryMode,
  DocumentTree,
  IdentifierCollision,
  MetricRegistryOptions,
  PageFetcher,
  RegistryState,
} from './types.js'

type ExtractorEntry = [metricName: string, extractor: Extractor]

export class MetricRegistry<TNode> {
  readonly baseUrl: string
  readonly mode: DiscoveryMode

  private fetcher: PageFetcher<TNode>
  private readonly metricSelectors: Readonly<Record<string, string>>
  private readonly matcher: LabelMatcher
  private readonly log: ILogger

  private currentState: RegistryState = 'uninitialized'
  private failureError: Error | null = null

  private readonly byIdentifier = new Map<string, MetricAccessor<TNode>>()
  private readonly byName = new Map<string, MetricAccessor<TNode>>()
  private readonly collisionLog: IdentifierCollision[] = []

  constructor(options: MetricRegistryOptions<TNode>) {
    if (!options.baseUrl) {
      throw new ConfigurationError('MetricRegistry requires a base URL')
    }
    if (!options.fetcher) {
      throw new ConfigurationError('MetricRegistry requires a page fetcher')
    }

    this.baseUrl = options.baseUrl
    this.fetcher = options.fetcher
    this.metricSelectors = options.metricSelectors ?? {}
    this.mode = Object.keys(this.metricSelectors).length > 0 ? 'explicit' : 'auto'
    this.matcher = LabelMatcher.fromCatalog(options.catalog)
    this.log = (options.logger ?? loggers.registry).child({ baseUrl: options.baseUrl })
  }

  get state(): RegistryState {
    return this.currentState
  }

  /** The error that failed discovery, if it failed */
  get failure(): Error | null {
    return this.failureError
  }

  get collisions(): readonly IdentifierCollision[] {
    return this.collisionLog
  }

  get size(): number {
    return this.byIdentifier.size
  }

  /**
   * Run discovery once. Resolves with the registry when it is ready.
   *
   * @throws FetchError when the page cannot be fetched (auto mode); the
   *   registry is then failed and keeps the error in `failure`
   * @throws ConfigurationError on an empty selector, or when called twice
   */
  async discover(): Promise<this> {
    if (this.currentState !== 'uninitialized') {
      throw new ConfigurationError(
        `Registry for ${this.baseUrl} is already ${this.currentState}; create a new registry to discover again`
      )
    }

    this.currentState = 'discovering'
    const startedAt = Date.now()
    this.log.info('METRICS_DISCOVERY_STARTED', { mode: this.mode })

    let entries: ExtractorEntry[]
    try {
      entries = this.mode === 'explicit' ? this.createSelectorExtractors() : await this.discoverExtractors()
    } catch (error) {
      this.currentState = 'failed'
      this.failureError = error instanceof Error ? error : new Error(String(error))
      this.log.error('METRICS_DISCOVERY_FAILED', { mode: this.mode, durationMs: Date.now() - startedAt }, error)
      throw error
    }

    for (const [metricName, extractor] of entries) {
      this.install(metricName, extractor)
    }

    this.currentState = 'ready'
    const accessors = this.accessors()
    this.log.info('METRICS_DISCOVERY_COMPLETED', {
      mode: this.mode,
      metrics: accessors.length,
      lazy: accessors.filter(accessor => accessor.extractor && isLazy(accessor.extractor)).length,
      collisions: this.collisionLog.length,
      durationMs: Date.now() - startedAt,
    })

    return this
  }

  /**
   * Accessor by generated identifier, e.g. "BallPossessionMetric".
   */
  get(identifier: string): MetricAccessor<TNode> | undefined {
    this.assertReady()
    return this.byIdentifier.get(identifier)
  }

  /**
   * Accessor by human-readable metric name, e.g. "Ball possession".
   * A name whose identifier was taken over by a later metric is not listed.
   */
  getByName(metricName: string): MetricAccessor<TNode> | undefined {
    this.assertReady()
    return this.byName.get(metricName)
  }

  has(identifier: string): boolean {
    this.assertReady()
    return this.byIdentifier.has(identifier)
  }

  identifiers(): string[] {
    this.assertReady()
    return Array.from(this.byIdentifier.keys())
  }

  metricNames(): string[] {
    this.assertReady()
    return Array.from(this.byName.keys())
  }

  accessors(): MetricAccessor<TNode>[] {
    this.assertReady()
    return Array.from(this.byIdentifier.values())
  }

  /**
   * Swap the fetcher shared by this registry and all of its accessors.
   */
  useFetcher(fetcher: PageFetcher<TNode>): void {
    this.fetcher = fetcher
    for (const accessor of this.byIdentifier.values()) {
      accessor.bindFetcher(fetcher)
    }
  }

  private createSelectorExtractors(): ExtractorEntry[] {
    return Object.entries(this.metricSelectors).map(([metricName, selector]): ExtractorEntry => {
      if (typeof selector !== 'string' || !selector.trim()) {
        throw new ConfigurationError(`Metric '${metricName}' has an empty selector`)
      }
      return [metricName, fromSelector(selector)]
    })
  }

  private async discoverExtractors(): Promise<ExtractorEntry[]> {
    let tree: DocumentTree<TNode>
    try {
      tree = await this.fetcher.fetch(this.baseUrl)
    } catch (error) {
      throw FetchError.from(this.baseUrl, error)
    }

    const entries: ExtractorEntry[] = []
    for (const rule of this.matcher.rules()) {
      const result = fromDiscovery(rule, tree)
      if (!result.found) {
        this.log.debug('METRICS_LABEL_NOT_FOUND', { metricName: rule.metricName })
        continue
      }

      this.log.debug('METRICS_LABEL_FOUND', {
        metricName: rule.metricName,
        extractor: result.extractor.kind,
        strategy: result.strategy,
      })
      entries.push([rule.metricName, result.extractor])
    }
    return entries
  }

  // Last registration wins an identifier; the collision is recorded.
  private install(metricName: string, extractor: Extractor): void {
    const identifier = toMetricIdentifier(metricName)

    const existing = this.byIdentifier.get(identifier)
    if (existing) {
      this.collisionLog.push({ identifier, replacedMetricName: existing.metricName, metricName })
      this.byName.delete(existing.metricName)
      this.log.warn('METRICS_IDENTIFIER_COLLISION', {
        identifier,
        replacedMetricName: existing.metricName,
        metricName,
      })
    }

    const accessor = new MetricAccessor<TNode>({
      metricName,
      identifier,
      sourceUrl: this.baseUrl,
      extractor,
      fetcher: this.fetcher,
    })
    this.byIdentifier.set(identifier, accessor)
    this.byName.set(metricName, accessor)
  }

  private assertReady(): void {
    if (this.currentState !== 'ready') {
      throw new ConfigurationError(`Registry for ${this.baseUrl} is ${this.currentState}, not ready`)
    }
  }
}

/**
 * Construct a registry and run discovery.
 */
export async function createMetricRegistry<TNode>(
  options: MetricRegistryOptions<TNode>
): Promise<MetricRegistry<TNode>> {
  return new MetricRegistry(options).discover()
}
