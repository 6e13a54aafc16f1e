#!/usr/bin/env node
/**
 * Interactive main menu
 * 1. Full control analysis  2. Change monitor  3. Exit
 */

import chalk from 'chalk'
import { program } from 'commander'

import {
  defaultCsvPath,
  isCancellation,
  listingFor,
  loadCatalog,
  openTerminal,
  printHeader,
  printListing,
  reportFailure,
  runAnalysis,
  runMonitor,
  selectInteractively,
  startRuntime,
} from './session'

import type { Runtime } from '@boot/types'
import type { Terminal } from './session'

program
  .name('miniserver')
  .description('Analyse a Loxone Miniserver and record control changes')
  .parse(process.argv)

async function analysis(runtime: Runtime): Promise<void> {
  const catalog = await loadCatalog(runtime)
  await runAnalysis(runtime, catalog, runtime.config.analysisFile, false)
}

async function monitor(runtime: Runtime, terminal: Terminal): Promise<void> {
  const catalog = await loadCatalog(runtime)
  const rows = listingFor(runtime, catalog)
  if (rows.length === 0) {
    console.log(chalk.yellow('The Miniserver reports no controls'))
    return
  }

  printListing(rows)
  const selected = await selectInteractively(rows, terminal.ask)
  if (selected.length === 0) {
    console.log(chalk.yellow('No controls selected'))
    return
  }

  const csvName = (await terminal.ask('\n📄 CSV file name (Enter for automatic): ')).trim()
  const stop = terminal.stopOnEnter()
  try {
    await runMonitor(runtime, catalog, selected, {
      csvPath: csvName === '' ? defaultCsvPath(runtime.config.outputDir, new Date()) : csvName,
      pollIntervalMs: runtime.config.pollIntervalMs,
      stopSignal: stop.signal,
    })
  } finally {
    stop.dispose()
  }
}

async function main(): Promise<void> {
  let runtime: Runtime | undefined
  const terminal = openTerminal()

  try {
    runtime = await startRuntime()
    printHeader('Loxone Miniserver analyser (Gen 1 and Gen 2)')

    for (;;) {
      console.log('\n' + chalk.white.bold('Main menu'))
      console.log('  1. Full control analysis')
      console.log('  2. Change monitor (CSV)')
      console.log('  3. Exit')

      const choice = (await terminal.ask('\n➤ Choose an option (1-3): ')).trim()

      if (choice === '3') {
        break
      }
      if (choice !== '1' && choice !== '2') {
        console.log(chalk.red('✗ Not a menu option'))
        continue
      }

      try {
        if (choice === '1') {
          await analysis(runtime)
        } else {
          await monitor(runtime, terminal)
        }
      } catch (error) {
        if (isCancellation(error)) {
          console.log(chalk.gray('\nCancelled'))
          continue
        }
        // The controller may be back on the next attempt
        reportFailure(error, runtime)
      }
    }
    console.log(chalk.gray('Bye'))
  } catch (error) {
    if (!isCancellation(error)) {
      reportFailure(error, runtime)
      process.exitCode = 1
    }
  } finally {
    terminal.close()
    await runtime?.logger.close()
  }
}

void main()
