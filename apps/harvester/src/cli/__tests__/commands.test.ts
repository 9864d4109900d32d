import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { describe, it, expect } from 'vitest'
import { silentLogger } from '@statline/logger'
import type { Element } from 'domhandler'
import { FailingPageFetcher, StubPageFetcher } from '../../metrics/__tests__/helpers.js'
import type { PageFetcher } from '../../metrics/types.js'
import { runDiscoverCommand } from '../commands/discover.js'
import { runGetCommand } from '../commands/get.js'
import type { CommandDeps } from '../commands/types.js'

const PAGE_URL = 'https://example.test/team'
const TEAM_STATS = readFileSync(
  fileURLToPath(new URL('../../metrics/__tests__/fixtures/team-stats.html', import.meta.url)),
  'utf8'
)

function depsFor(fetcher: PageFetcher<Element>) {
  const lines: string[] = []
  const deps: CommandDeps<Element> = { fetcher, write: line => lines.push(line), logger: silentLogger }
  return { deps, lines }
}

function row(identifier: string, metricName: string, extractor: string, value: string): string {
  return `${identifier.padEnd(28)} ${metricName.padEnd(20)} ${extractor.padEnd(5)} ${value}`
}

describe('discover command', () => {
  it('prints one row per metric', async () => {
    const { deps, lines } = depsFor(new StubPageFetcher(TEAM_STATS))

    const code = await runDiscoverCommand({ url: PAGE_URL, selectors: {}, json: false }, deps)

    expect(code).toBe(0)
    expect(lines).toEqual([
      row('BallPossessionMetric', 'Ball possession', 'bound', '57.4'),
      row('AverageGoalsMetric', 'Average goals', 'bound', '1.8'),
      row('CleanSheetsMetric', 'Clean sheets', 'bound', '9'),
      row('ShotsOnTargetMetric', 'Shots on target', 'bound', '112'),
    ])
  })

  it('prints JSON', async () => {
    const { deps, lines } = depsFor(new StubPageFetcher('<span class="pos">61%</span>'))

    const code = await runDiscoverCommand({ url: PAGE_URL, selectors: { 'Ball possession': '.pos' }, json: true }, deps)

    expect(code).toBe(0)
    expect(JSON.parse(lines.join('\n'))).toEqual({
      url: PAGE_URL,
      mode: 'explicit',
      metrics: [{ identifier: 'BallPossessionMetric', metricName: 'Ball possession', extractor: 'lazy', value: 61 }],
      collisions: [],
    })
  })

  it('says so when nothing is found', async () => {
    const { deps, lines } = depsFor(new StubPageFetcher('<p>Fixtures</p>'))

    expect(await runDiscoverCommand({ url: PAGE_URL, selectors: {}, json: false }, deps)).toBe(0)
    expect(lines).toEqual([`No metrics found on ${PAGE_URL}`])
  })

  it('reports fetch failures', async () => {
    const { deps, lines } = depsFor(new FailingPageFetcher(new Error('connect ECONNREFUSED')))

    expect(await runDiscoverCommand({ url: PAGE_URL, selectors: {}, json: false }, deps)).toBe(1)
    expect(lines).toEqual([`Discovery failed: Failed to fetch ${PAGE_URL}: connect ECONNREFUSED`])
  })

  it('requires a URL', async () => {
    const { deps, lines } = depsFor(new StubPageFetcher(TEAM_STATS))

    expect(await runDiscoverCommand({ url: '', selectors: {}, json: false }, deps)).toBe(2)
    expect(lines).toEqual(['Missing --url'])
  })
})

describe('get command', () => {
  it('looks metrics up by catalog name in any case', async () => {
    const fetcher = new StubPageFetcher(TEAM_STATS)
    const { deps, lines } = depsFor(fetcher)

    expect(await runGetCommand({ url: PAGE_URL, metric: 'ball possession', selectors: {} }, deps)).toBe(0)
    expect(lines).toEqual(['Ball possession: 57.4'])
    expect(fetcher.calls).toEqual([PAGE_URL, PAGE_URL])
  })

  it('looks metrics up by identifier', async () => {
    const { deps, lines } = depsFor(new StubPageFetcher(TEAM_STATS))

    expect(await runGetCommand({ url: PAGE_URL, metric: 'CleanSheetsMetric', selectors: {} }, deps)).toBe(0)
    expect(lines).toEqual(['Clean sheets: 9'])
  })

  it('prints a missing value', async () => {
    const { deps, lines } = depsFor(new StubPageFetcher('<p>Fixtures</p>'))

    const code = await runGetCommand(
      { url: PAGE_URL, metric: 'Ball possession', selectors: { 'Ball possession': '.pos' } },
      deps
    )

    expect(code).toBe(0)
    expect(lines).toEqual(['Ball possession: (no value)'])
  })

  it('fails on unknown metrics', async () => {
    const { deps, lines } = depsFor(new StubPageFetcher(TEAM_STATS))

    expect(await runGetCommand({ url: PAGE_URL, metric: 'Corners', selectors: {} }, deps)).toBe(1)
    expect(lines).toEqual([`Metric "Corners" not found on ${PAGE_URL}`])
  })

  it('requires a URL and a metric', async () => {
    const { deps, lines } = depsFor(new StubPageFetcher(TEAM_STATS))

    expect(await runGetCommand({ url: PAGE_URL, metric: '', selectors: {} }, deps)).toBe(2)
    expect(lines).toEqual(['Missing --url or --metric'])
  })
})
