import { createMetricRegistry } from '../../metrics/registry.js'
import { isLazy } from '../../metrics/extractors.js'
import { MetricsError } from '../../metrics/errors.js'
import type { MetricValue } from '../../metrics/coerce.js'
import type { CommandDeps } from './types.js'

interface DiscoverCommandArgs {
  url: string
  selectors: Record<string, string>
  json: boolean
}

interface DiscoveredMetricRow {
  identifier: string
  metricName: string
  extractor: string
  value: MetricValue
}

function formatValue(value: MetricValue): string {
  return value === null ? '(no value)' : String(value)
}

export async function runDiscoverCommand<TNode>(
  args: DiscoverCommandArgs,
  deps: CommandDeps<TNode>
): Promise<number> {
  if (!args.url) {
    deps.write('Missing --url')
    return 2
  }

  try {
    const registry = await createMetricRegistry({
      baseUrl: args.url,
      fetcher: deps.fetcher,
      metricSelectors: args.selectors,
      logger: deps.logger,
    })

    const rows: DiscoveredMetricRow[] = []
    for (const accessor of registry.accessors()) {
      rows.push({
        identifier: accessor.identifier,
        metricName: accessor.metricName,
        extractor: accessor.extractor && isLazy(accessor.extractor) ? 'lazy' : 'bound',
        value: await accessor.getValue(),
      })
    }

    if (args.json) {
      deps.write(
        JSON.stringify({ url: args.url, mode: registry.mode, metrics: rows, collisions: registry.collisions }, null, 2)
      )
      return 0
    }

    if (rows.length === 0) {
      deps.write(`No metrics found on ${args.url}`)
      return 0
    }

    for (const row of rows) {
      deps.write(
        `${row.identifier.padEnd(28)} ${row.metricName.padEnd(20)} ${row.extractor.padEnd(5)} ${formatValue(row.value)}`
      )
    }
    return 0
  } catch (error) {
    if (error instanceof MetricsError) {
      deps.logger.error('METRICS_DISCOVER_COMMAND_FAILED', { url: args.url, code: error.code }, error)
      deps.write(`Discovery failed: ${error.message}`)
      return 1
    }
    throw error
  }
}
