/**
 * Metric harvesting public surface.
 */

export { MetricAccessor } from './accessor.js'
export { coerceMetricValue, type MetricValue } from './coerce.js'
export { CheerioDocumentTree } from './document/cheerio-tree.js'
export { ConfigurationError, FetchError, MetricsError, type MetricsErrorCode } from './errors.js'
export {
  fromDiscovery,
  fromRule,
  fromSelector,
  fromValue,
  isLazy,
  runExtractor,
  type BoundExtractor,
  type DiscoveryResult,
  type Extractor,
  type RuleExtractor,
  type SelectorExtractor,
} from './extractors.js'
export { HtmlPageFetcher, type HtmlPageFetcherOptions } from './fetch/page-fetcher.js'
export { HttpFetcher, type HttpFetcherOptions } from './fetch/http-fetcher.js'
export { IDENTIFIER_SUFFIX, titleCase, toMetricIdentifier } from './identifier.js'
export {
  LABEL_TAGS,
  LabelMatcher,
  createRecognitionRule,
  findLabelNode,
  type RecognitionRule,
} from './matching/label-matcher.js'
export { resolveValue, type ResolutionStrategy, type ResolvedValue } from './matching/value-resolver.js'
export { MetricRegistry, createMetricRegistry } from './registry.js'
export type * from './types.js'
export { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_USER_AGENT, NO_RETRY_POLICY } from './types.js'
