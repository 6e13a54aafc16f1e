/**
 * Shared CLI plumbing
 * Startup, structure download, analysis, selection and monitor runs used by
 * the analyze, monitor and menu commands
 */

import * as path from 'path'
import { createInterface } from 'readline/promises'

import chalk from 'chalk'

import { createEnvExample, loadEnvFile } from '@boot/config'
import { createRuntime, resolveConfig } from '@boot/init'
import { classifyCatalog } from '@classifier'
import { parseInventory } from '@inventory'
import { createChangeMonitor } from '@monitor'
import { createCsvRecordSink } from '@records'
import {
  buildAnalysisReport,
  buildListing,
  entriesOf,
  formatAnalysisSummary,
  formatListingLine,
  formatSelectionSummary,
  saveAnalysisReport,
} from '@reports'
import { createSelectionSession, selectEntries } from '@selection'
import {
  AuthenticationError,
  ConfigValidationError,
  MalformedInventoryError,
  SelectionSyntaxError,
  TransientFetchError,
} from '$types/errors'
import { formatFileStamp, sleep, systemClock } from '@utils/time'

import type { Runtime } from '@boot/types'
import type { Catalog } from '@inventory'
import type { MonitorSummary } from '@monitor'
import type { ListingRow } from '@reports'

/** Asks one question and resolves with the typed line */
export type Prompt = (question: string) => Promise<string>

export interface StopHandle {
  signal: AbortSignal
  dispose(): void
}

/**
 * Line-based terminal input
 */
export interface Terminal {
  /** Rejects with an AbortError when the user presses Ctrl+C */
  ask: Prompt
  /** Signal aborted by Enter or Ctrl+C, for a running monitor */
  stopOnEnter(): StopHandle
  close(): void
}

export function openTerminal(): Terminal {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  let current = new AbortController()
  rl.on('SIGINT', () => current.abort())

  function fresh(): AbortController {
    if (current.signal.aborted) {
      current = new AbortController()
    }
    return current
  }

  return {
    ask: (question) => rl.question(question, { signal: fresh().signal }),
    stopOnEnter() {
      const controller = fresh()
      const onLine = () => controller.abort()
      rl.once('line', onLine)
      return {
        signal: controller.signal,
        dispose: () => rl.removeListener('line', onLine),
      }
    },
    close: () => rl.close(),
  }
}

/**
 * Ctrl+C at a prompt
 */
export function isCancellation(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

const RULE = '═'.repeat(70)

export function printHeader(title: string): void {
  console.log('\n' + chalk.cyan(RULE))
  console.log(chalk.cyan.bold(title))
  console.log(chalk.cyan(RULE))
}

/**
 * Load .env, validate configuration and build the logger and client
 *
 * Warnings are printed and the run continues; errors stop it.
 */
export async function startRuntime(): Promise<Runtime> {
  if (!loadEnvFile() && createEnvExample()) {
    console.log(chalk.gray('No .env found. Wrote .env.example; copy it to .env and edit it.'))
  }

  const { config, validation } = resolveConfig(process.env)

  for (const warning of validation.warnings) {
    console.warn(chalk.yellow(`⚠ ${warning.message}`))
  }

  if (!validation.valid) {
    const lines = validation.errors.map((error) => `  - ${error.message}`)
    throw new ConfigValidationError(
      validation.errors.map((error) => error.field),
      'Configuration errors:\n' + lines.join('\n')
    )
  }

  return createRuntime(config, { colors: process.stdout.isTTY === true })
}

/**
 * Download and parse the structure document
 */
export async function loadCatalog(runtime: Runtime): Promise<Catalog> {
  runtime.logger.info(`Downloading structure from ${runtime.client.baseUrl}`)
  const catalog = parseInventory(await runtime.client.fetchStructure())

  runtime.logger.info(
    `Structure loaded: ${catalog.controls.length} controls, ` +
    `${catalog.rooms.size} rooms, ${catalog.categories.size} categories`
  )
  return catalog
}

/**
 * Classify the catalog, print the summary and write the analysis JSON
 */
export async function runAnalysis(runtime: Runtime, catalog: Catalog, outputPath: string, quiet: boolean): Promise<void> {
  const label = runtime.config.unassignedRoomLabel
  const classification = classifyCatalog(catalog, { unassignedRoomLabel: label })
  const report = buildAnalysisReport(catalog, classification, systemClock())

  if (!quiet) {
    printHeader('Miniserver analysis')
    for (const line of formatAnalysisSummary(report)) {
      console.log(line)
    }
  }

  await saveAnalysisReport(report, outputPath)
  console.log(chalk.green(`✓ Analysis saved to ${outputPath}`))
}

export function listingFor(runtime: Runtime, catalog: Catalog): ListingRow[] {
  return buildListing(catalog, runtime.config.unassignedRoomLabel)
}

export function printListing(rows: readonly ListingRow[]): void {
  printHeader(`Controls (${rows.length})`)
  for (const row of rows) {
    console.log(formatListingLine(row))
  }
}

/**
 * Prompt for selection tokens until the session is done
 *
 * @returns Selected rows, empty when the user ended without choosing
 */
export async function selectInteractively(rows: readonly ListingRow[], prompt: Prompt): Promise<ListingRow[]> {
  const session = createSelectionSession(rows)

  console.log(chalk.gray('Enter a number (5), a range (1-10), a list (1,3,7-9) or "all".'))
  console.log(chalk.gray('Press Enter on an empty line when done.'))

  while (session.phase() !== 'done') {
    const answer = await prompt(`➤ Control #${session.selection().length + 1} (Enter to finish): `)
    const outcome = session.submit(answer)

    switch (outcome.kind) {
      case 'added':
        for (const row of outcome.entries) {
          console.log(chalk.green(`  ✓ Added: ${row.entry.name} (${row.typeLabel})`))
        }
        if (outcome.complete) {
          console.log(chalk.green(`✓ Every control selected (${rows.length})`))
        }
        break
      case 'duplicate':
        console.log(chalk.yellow('  ⚠ Already selected'))
        break
      case 'rejected':
        console.log(chalk.red(`  ✗ ${outcome.error.message}`))
        break
      case 'done':
        break
    }
  }

  return session.selection().slice()
}

/**
 * Apply selection tokens given on the command line
 *
 * @throws SelectionSyntaxError for the first token that does not apply
 */
export function selectFromTokens(rows: readonly ListingRow[], tokens: readonly string[]): ListingRow[] {
  const chosen = new Set<ListingRow>()
  for (const token of tokens) {
    for (const row of selectEntries(rows, token)) {
      chosen.add(row)
    }
  }
  return Array.from(chosen)
}

export function defaultCsvPath(outputDir: string, date: Date): string {
  return path.join(outputDir, `miniserver_monitor_${formatFileStamp(date)}.csv`)
}

export interface MonitorRunOptions {
  csvPath: string
  pollIntervalMs: number
  /** Aborted when the user asks to stop (Enter or Ctrl+C at the prompt) */
  stopSignal?: AbortSignal
}

/**
 * Record changes of the selected controls until stopped
 *
 * SIGINT stops the run as well as `stopSignal`. The pass in progress
 * completes before the monitor returns.
 */
export async function runMonitor(
  runtime: Runtime,
  catalog: Catalog,
  selected: readonly ListingRow[],
  options: MonitorRunOptions
): Promise<MonitorSummary> {
  const controller = new AbortController()
  const stop = () => controller.abort()

  printHeader('Change monitor')
  for (const line of formatSelectionSummary(selected)) {
    console.log(line)
  }
  console.log(chalk.blue(`CSV file: ${options.csvPath}`))
  console.log(chalk.blue(`Interval: ${options.pollIntervalMs}ms, changes only`))
  console.log(chalk.yellow('Press Enter or Ctrl+C to stop'))

  process.once('SIGINT', stop)
  if (options.stopSignal?.aborted) {
    stop()
  }
  options.stopSignal?.addEventListener('abort', stop, { once: true })

  const monitor = createChangeMonitor(
    { catalog, entries: entriesOf(selected) },
    {
      reader: runtime.client,
      sink: createCsvRecordSink({ path: options.csvPath }),
      logger: runtime.logger,
      clock: systemClock,
      sleep: sleep,
    },
    {
      pollIntervalMs: options.pollIntervalMs,
      statsEvery: runtime.config.statsEvery,
      unassignedRoomLabel: runtime.config.unassignedRoomLabel,
    }
  )

  try {
    const summary = await monitor.run(controller.signal)
    console.log(chalk.green(`✓ Monitoring stopped. Records in ${options.csvPath}`))
    return summary
  } finally {
    process.removeListener('SIGINT', stop)
    options.stopSignal?.removeEventListener('abort', stop)
  }
}

/**
 * Print a failure with hints for the errors a user can fix
 */
export function reportFailure(error: unknown, runtime?: Runtime): void {
  if (error instanceof ConfigValidationError) {
    console.error(chalk.red(error.message))
    console.error(chalk.gray('Edit .env (see .env.example) and try again.'))
    return
  }

  if (error instanceof AuthenticationError) {
    console.error(chalk.red('✗ Authentication failed'))
    console.error(chalk.gray(`  ${error.message}`))
    return
  }

  if (error instanceof TransientFetchError) {
    console.error(chalk.red(`✗ Cannot reach the Miniserver: ${error.message}`))
    console.error(chalk.gray(`  URL: ${error.url}`))
    if (runtime) {
      const { host, port } = runtime.config
      console.error(chalk.gray('  • Check that the Miniserver is powered on'))
      console.error(chalk.gray(`  • Check the address (LOXONE_IP=${host})`))
      console.error(chalk.gray(`  • Check the port (LOXONE_PORT=${port ?? ''})`))
      console.error(chalk.gray(`  • Check network connectivity (ping ${host})`))
    }
    return
  }

  if (error instanceof MalformedInventoryError || error instanceof SelectionSyntaxError) {
    console.error(chalk.red(`✗ ${error.message}`))
    return
  }

  console.error(chalk.red('✗ Unexpected error:'), error instanceof Error ? error.message : String(error))
}
