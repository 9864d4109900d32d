/**
 * Metric identifiers.
 *
 * "Ball possession" -> "BallPossessionMetric"
 */

export const IDENTIFIER_SUFFIX = 'Metric'

/**
 * Upper-case every letter that follows a non-letter, lower-case the rest.
 * "clean SHEETS" -> "Clean Sheets", "avg.goals" -> "Avg.Goals"
 */
export function titleCase(value: string): string {
  let result = ''
  let previousIsLetter = false

  for (const char of value) {
    const isLetter = char.toLowerCase() !== char.toUpperCase()
    if (isLetter) {
      result += previousIsLetter ? char.toLowerCase() : char.toUpperCase()
    } else {
      result += char
    }
    previousIsLetter = isLetter
  }

  return result
}

/**
 * Identifier for a metric name: title-cased, non-alphanumerics stripped,
 * suffixed with "Metric" unless it already ends with it.
 * Distinct names can produce the same identifier.
 */
export function toMetricIdentifier(metricName: string): string {
  const base = titleCase(metricName).replace(/[^0-9a-zA-Z]+/g, '') || IDENTIFIER_SUFFIX
  return base.endsWith(IDENTIFIER_SUFFIX) ? base : `${base}${IDENTIFIER_SUFFIX}`
}
