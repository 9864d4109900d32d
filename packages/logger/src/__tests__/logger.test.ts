import { describe, it, expect, afterEach, vi } from 'vitest'
import {
  createLogger,
  formatPretty,
  resolveLogFormat,
  resolveLogLevel,
  type LogEntry,
  type LogLevel,
} from '../index.js'

function capture(level: LogLevel = 'debug') {
  const entries: LogEntry[] = []
  const lines: string[] = []
  const logger = createLogger('harvester', {
    level,
    format: 'json',
    sink: (entry, formatted) => {
      entries.push(entry)
      lines.push(formatted)
    },
  })
  return { entries, lines, logger }
}

describe('Logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('drops entries below the minimum level', () => {
    const { entries, logger } = capture('warn')

    logger.info('IGNORED')
    logger.warn('KEPT')

    expect(entries.map(entry => entry.message)).toEqual(['KEPT'])
  })

  it('reads LOG_LEVEL when no level is fixed', () => {
    vi.stubEnv('LOG_LEVEL', 'error')
    const entries: LogEntry[] = []
    const logger = createLogger('harvester', { sink: entry => entries.push(entry) })

    logger.warn('IGNORED')
    logger.error('KEPT')

    expect(entries.map(entry => entry.message)).toEqual(['KEPT'])
  })

  it('extends the component path and context in children', () => {
    const { entries, logger } = capture()

    logger
      .child('registry')
      .child({ baseUrl: 'https://example.test' })
      .child('discover')
      .info('STARTED', { mode: 'auto' })

    expect(entries[0]).toMatchObject({
      level: 'info',
      service: 'harvester',
      component: 'registry:discover',
      message: 'STARTED',
      baseUrl: 'https://example.test',
      mode: 'auto',
    })
  })

  it('writes JSON lines', () => {
    const { entries, lines, logger } = capture()

    logger.debug('PING', { attempt: 2 })

    expect(JSON.parse(lines[0] ?? '')).toEqual(entries[0])
  })

  it('records error details and codes', () => {
    const { entries, logger } = capture()
    const error = Object.assign(new Error('boom'), { code: 'FETCH_FAILED' })

    logger.error('FAILED', {}, error)
    logger.fatal('CRASHED', {}, 'plain failure')

    expect(entries[0]?.error).toMatchObject({ name: 'Error', message: 'boom', code: 'FETCH_FAILED' })
    expect(entries[1]?.error).toEqual({ name: 'UnknownError', message: 'plain failure' })
  })

  it('prints the component path in pretty output', () => {
    const line = formatPretty({
      timestamp: '2026-01-01T00:00:00.000Z',
      level: 'info',
      service: 'harvester',
      component: 'cli',
      message: 'READY',
    })

    expect(line).toContain('[harvester:cli]')
    expect(line).toContain('READY')
    expect(line).not.toContain('\n')
  })

  it('appends metadata and puts the error on its own line', () => {
    const line = formatPretty({
      timestamp: '2026-01-01T00:00:00.000Z',
      level: 'error',
      service: 'harvester',
      message: 'FAILED',
      attempt: 2,
      error: { name: 'Error', message: 'boom' },
    })
    const [first, second] = line.split('\n')

    expect(first?.endsWith(' FAILED \x1b[2m{"attempt":2}\x1b[0m')).toBe(true)
    expect(second).toBe('  \x1b[2mboom\x1b[0m')
  })
})

describe('environment resolution', () => {
  it('resolves the level', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'DEBUG' })).toBe('debug')
    expect(resolveLogLevel({ LOG_LEVEL: 'loud' })).toBe('info')
    expect(resolveLogLevel({ LOG_LEVEL: 'toString' })).toBe('info')
    expect(resolveLogLevel({})).toBe('info')
  })

  it('resolves the format', () => {
    expect(resolveLogFormat({ LOG_FORMAT: 'json' })).toBe('json')
    expect(resolveLogFormat({ NODE_ENV: 'production' })).toBe('json')
    expect(resolveLogFormat({})).toBe('pretty')
  })
})
