#!/usr/bin/env node
/**
 * Miniserver change monitor
 * Records the state of selected controls to CSV, one row per change
 */

import chalk from 'chalk'
import { InvalidArgumentError, program } from 'commander'

import { parseUnsignedInteger } from '@utils/number'

import {
  defaultCsvPath,
  isCancellation,
  listingFor,
  loadCatalog,
  openTerminal,
  printListing,
  reportFailure,
  runMonitor,
  selectFromTokens,
  selectInteractively,
  startRuntime,
} from './session'

import type { Runtime } from '@boot/types'
import type { ListingRow } from '@reports'

function parseInterval(value: string): number {
  const ms = parseUnsignedInteger(value.trim())
  if (ms === null || ms < 100) {
    throw new InvalidArgumentError('Expected a whole number of milliseconds, at least 100.')
  }
  return ms
}

program
  .name('miniserver-monitor')
  .description('Record state changes of Loxone Miniserver controls to CSV')
  .option('-c, --csv <file>', 'CSV file to append to (default: timestamped file in OUTPUT_DIR)')
  .option('-i, --interval <ms>', 'Wait between sampling passes (default: POLL_INTERVAL_MS)', parseInterval)
  .option('-s, --select <token...>', 'Select controls without prompting, e.g. --select 1-5 9 or --select all')
  .parse(process.argv)

const options = program.opts<{ csv?: string; interval?: number; select?: string[] }>()

async function main(): Promise<void> {
  let runtime: Runtime | undefined
  const terminal = openTerminal()

  try {
    runtime = await startRuntime()
    const catalog = await loadCatalog(runtime)
    const rows = listingFor(runtime, catalog)

    if (rows.length === 0) {
      console.log(chalk.yellow('The Miniserver reports no controls'))
      return
    }

    let selected: ListingRow[]
    if (options.select) {
      selected = selectFromTokens(rows, options.select)
    } else {
      printListing(rows)
      selected = await selectInteractively(rows, terminal.ask)
    }

    if (selected.length === 0) {
      console.log(chalk.yellow('No controls selected'))
      return
    }

    const stop = terminal.stopOnEnter()
    try {
      await runMonitor(runtime, catalog, selected, {
        csvPath: options.csv ?? defaultCsvPath(runtime.config.outputDir, new Date()),
        pollIntervalMs: options.interval ?? runtime.config.pollIntervalMs,
        stopSignal: stop.signal,
      })
    } finally {
      stop.dispose()
    }
  } catch (error) {
    if (isCancellation(error)) {
      console.log(chalk.gray('\nCancelled'))
      return
    }
    reportFailure(error, runtime)
    process.exitCode = 1
  } finally {
    terminal.close()
    await runtime?.logger.close()
  }
}

void main()
