import { ConfigurationError } from '../metrics/errors.js'

/**
 * "Ball possession=td.possession" -> ["Ball possession", "td.possession"]
 * Splits at the first "=", so selectors may contain "=" themselves.
 */
export function parseSelectorSpecs(specs: string[]): Record<string, string> {
  const selectors: Record<string, string> = {}

  for (const spec of specs) {
    const separator = spec.indexOf('=')
    const name = separator > 0 ? spec.slice(0, separator).trim() : ''
    const selector = separator > 0 ? spec.slice(separator + 1).trim() : ''
    if (!name || !selector) {
      throw new ConfigurationError(`Invalid --selector "${spec}", expected "<metric name>=<css selector>"`)
    }
    selectors[name] = selector
  }

  return selectors
}
