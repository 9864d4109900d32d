import { findKnownMetric } from '@statline/metric-catalog'
import { coerceMetricValue } from '../../metrics/coerce.js'
import { MetricsError } from '../../metrics/errors.js'
import { createMetricRegistry } from '../../metrics/registry.js'
import type { CommandDeps } from './types.js'

interface GetCommandArgs {
  url: string
  metric: string
  selectors: Record<string, string>
  delaySeconds?: number
}

export async function runGetCommand<TNode>(args: GetCommandArgs, deps: CommandDeps<TNode>): Promise<number> {
  if (!args.url || !args.metric) {
    deps.write('Missing --url or --metric')
    return 2
  }

  try {
    const registry = await createMetricRegistry({
      baseUrl: args.url,
      fetcher: deps.fetcher,
      metricSelectors: args.selectors,
      logger: deps.logger,
    })

    // Accept an identifier, the exact name, or a catalog name in any case.
    const accessor =
      registry.get(args.metric) ??
      registry.getByName(args.metric) ??
      registry.getByName(findKnownMetric(args.metric)?.name ?? '')

    if (!accessor) {
      deps.write(`Metric "${args.metric}" not found on ${args.url}`)
      return 1
    }

    const raw = await accessor.refresh(args.delaySeconds ?? 0)
    const value = coerceMetricValue(raw)
    deps.write(value === null ? `${accessor.metricName}: (no value)` : `${accessor.metricName}: ${value}`)
    return 0
  } catch (error) {
    if (error instanceof MetricsError) {
      deps.logger.error('METRICS_GET_COMMAND_FAILED', { url: args.url, code: error.code }, error)
      deps.write(`Fetching "${args.metric}" failed: ${error.message}`)
      return 1
    }
    throw error
  }
}
