/**
 * Raw metric text -> value.
 *
 * Percentages keep their 0-100 magnitude: "43%" -> 43.
 */

export type MetricValue = number | string | null

const WHOLE_NUMBER = /^(-?\d+(?:\.\d+)?)\s*%?$/

const EMBEDDED_NUMBER = /-?\d+(?:\.\d+)?/

/**
 * - null stays null
 * - a number, optionally followed by %, becomes that number
 * - otherwise the first number inside the text ("Rank: 7th" -> 7)
 * - otherwise the raw text, untouched
 */
export function coerceMetricValue(raw: string | null): MetricValue {
  if (raw === null) return null

  const trimmed = raw.trim()

  const whole = WHOLE_NUMBER.exec(trimmed)
  if (whole) {
    return Number.parseFloat(whole[1])
  }

  const embedded = EMBEDDED_NUMBER.exec(trimmed)
  if (embedded) {
    return Number.parseFloat(embedded[0])
  }

  return raw
}
