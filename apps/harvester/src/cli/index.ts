#!/usr/bin/env node
import '../env.js'
import type { Element } from 'domhandler'
import { loggers } from '../config/logger.js'
import { ConfigurationError } from '../metrics/errors.js'
import { HtmlPageFetcher } from '../metrics/fetch/page-fetcher.js'
import { runDiscoverCommand } from './commands/discover.js'
import { runGetCommand } from './commands/get.js'
import type { CommandDeps } from './commands/types.js'
import { asNumber, asString, asStringList, parseFlags } from './parse-flags.js'
import { parseSelectorSpecs } from './selectors.js'

function printHelp(): void {
  console.log('Statline metrics CLI')
  console.log('')
  console.log('Commands:')
  console.log('  discover --url <url> [--selector "<name>=<css>"]... [--json]')
  console.log('  get --url <url> --metric <name|identifier> [--selector "<name>=<css>"]... [--delay <seconds>]')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  let selectors: Record<string, string>
  try {
    selectors = parseSelectorSpecs(asStringList(flags.selector))
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error
    console.error(error.message)
    process.exit(2)
  }

  const deps: CommandDeps<Element> = {
    fetcher: HtmlPageFetcher.fromSettings(),
    write: line => console.log(line),
    logger: loggers.cli,
  }

  let exitCode = 2

  switch (command) {
    case 'discover':
      exitCode = await runDiscoverCommand(
        { url: asString(flags.url), selectors, json: flags.json === true },
        deps
      )
      break
    case 'get':
      exitCode = await runGetCommand(
        {
          url: asString(flags.url),
          metric: asString(flags.metric),
          selectors,
          delaySeconds: asNumber(flags.delay),
        },
        deps
      )
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  loggers.cli.fatal('METRICS_CLI_CRASHED', {}, error)
  process.exit(1)
})
