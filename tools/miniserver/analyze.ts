#!/usr/bin/env node
/**
 * Miniserver structure analysis
 * Downloads the structure file, prints a summary and saves the analysis JSON
 */

import { program } from 'commander'

import { loadCatalog, reportFailure, runAnalysis, startRuntime } from './session'

import type { Runtime } from '@boot/types'

program
  .name('miniserver-analyze')
  .description('Analyse the controls of a Loxone Miniserver')
  .option('-o, --output <file>', 'Analysis JSON path (default: ANALYSIS_FILE)')
  .option('-q, --quiet', 'Only report where the analysis was saved')
  .parse(process.argv)

const options = program.opts<{ output?: string; quiet?: boolean }>()

async function main(): Promise<void> {
  let runtime: Runtime | undefined
  try {
    runtime = await startRuntime()
    const catalog = await loadCatalog(runtime)
    await runAnalysis(runtime, catalog, options.output ?? runtime.config.analysisFile, options.quiet === true)
  } catch (error) {
    reportFailure(error, runtime)
    process.exitCode = 1
  } finally {
    await runtime?.logger.close()
  }
}

void main()
