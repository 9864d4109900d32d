/**
 * Metric category catalog shared across apps.
 *
 * Each category names a metric and the label text that denotes it on a
 * stats page. Patterns are matched case-insensitively against the flattened
 * text of a candidate label node.
 */

export interface MetricCategory {
  /** Human-readable metric name, preserved verbatim on accessors */
  name: string
  /** Label pattern; tested against a node's flattened text */
  pattern: RegExp
}

export const KNOWN_METRICS = [
  { name: 'Ball possession', pattern: /ball possession/i },
  { name: 'Average goals', pattern: /avg\.?\s*goals|goals per match|average goals/i },
  { name: 'Clean sheets', pattern: /clean sheets?/i },
  // The whole label must read "Goals", so "Goals conceded" is not a match
  { name: 'Goals', pattern: /^goals$/i },
  { name: 'Shots on target', pattern: /on target/i },
] as const satisfies readonly MetricCategory[]

export type KnownMetric = (typeof KNOWN_METRICS)[number]

export type KnownMetricName = KnownMetric['name']

export function findKnownMetric(name: string): KnownMetric | undefined {
  const wanted = name.trim().toLowerCase()
  return KNOWN_METRICS.find(metric => metric.name.toLowerCase() === wanted)
}
