#!/usr/bin/env node
/**
 * Health Summary Ingest CLI
 *
 * Main entry point for the health-ingest tool.
 * Uses commander for argument parsing.
 *
 * Usage:
 *   health-ingest --help
 *   health-ingest ./data
 *   health-ingest ./data --dry-run
 *   health-ingest /srv/health --api-url http://indexer:5000/ingest --wait-for-api
 *
 * @module cli
 */

import * as path from 'node:path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { VERSION, getVersionInfo } from './version.js';
import { BaseCommand, EXIT_CODES, type ExitCode, type GlobalOptions } from './base-command.js';
import { createSpinner, formatIngestionSummary, formatQuickSummary } from './formatters/index.js';
import { loadConfig, ConfigError, PRINT_MODE, isPrintMode, type Config } from '../config/index.js';
import { runIngestion, DataDirectoryError } from '../pipeline/index.js';
import { ProfileLoadError } from '../profiles/store.js';
import { waitForApi, healthUrlFor } from '../delivery/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options accepted by the ingest command.
 */
export interface IngestCommandOptions extends GlobalOptions {
  apiUrl?: string;
  dryRun?: boolean;
  batchSize?: number;
  maxConcurrent?: number;
  flushEvery?: number;
  waitForApi?: boolean;
}

export type CommandRunner = (
  dataDir: string | undefined,
  options: IngestCommandOptions
) => Promise<ExitCode>;

// ============================================================================
// Argument Parsing
// ============================================================================

/**
 * Commander argument parser for counts.
 *
 * @throws InvalidArgumentError for anything but a positive integer
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

// ============================================================================
// Command
// ============================================================================

/**
 * Run one ingestion from parsed options.
 *
 * @returns The process exit code
 */
export async function runCommand(
  dataDirArg: string | undefined,
  options: IngestCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<ExitCode> {
  const base = new BaseCommand(options);

  if (options.verbose && options.quiet) {
    base.report('Cannot use both --verbose and --quiet flags');
    return EXIT_CODES.USAGE_ERROR;
  }

  let config: Readonly<Config>;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      base.report(error.message);
      return EXIT_CODES.ERROR;
    }
    throw error;
  }

  const apiUrl = options.dryRun ? PRINT_MODE : (options.apiUrl ?? config.apiUrl);
  const dataDir = path.resolve(dataDirArg ?? config.dataDir);
  const dryRun = isPrintMode(apiUrl);

  base.section(getVersionInfo());
  base.keyValue('Data directory', dataDir);
  base.keyValue('Endpoint', dryRun ? 'PRINT_MODE (dry run)' : apiUrl);

  if (options.waitForApi && !dryRun) {
    const spinner = createSpinner(`Waiting for API at ${healthUrlFor(apiUrl)}...`);
    spinner.start();
    const ready = await waitForApi(apiUrl, {
      logger: { ...base.logger, info: (message) => base.debug(message) },
      onAttempt: (attempt, max) => spinner.update(`Waiting for API (${attempt}/${max})...`),
    });
    if (!ready) {
      spinner.fail('API did not become ready');
      return EXIT_CODES.ERROR;
    }
    spinner.succeed('API is ready');
  }

  try {
    const result = await runIngestion({
      dataDir,
      apiUrl,
      batchSize: options.batchSize ?? config.batchSize,
      maxConcurrent: options.maxConcurrent ?? config.maxConcurrent,
      flushEvery: options.flushEvery ?? config.flushEvery,
      logger: base.logger,
    });

    if (base.isQuiet()) {
      console.log(formatQuickSummary(result));
    } else {
      base.info('');
      base.info(formatIngestionSummary(result));
    }
    if (result.delivery.failed > 0) {
      base.fail(`${result.delivery.failed} summaries could not be delivered`);
    } else {
      base.success('All summaries delivered');
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof DataDirectoryError || error instanceof ProfileLoadError) {
      base.report(error.message, error);
      return EXIT_CODES.ERROR;
    }
    throw error;
  }
}

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the CLI program.
 *
 * @param run - Command implementation (replaced in tests)
 */
export function createProgram(run: CommandRunner = runCommand): Command {
  const program = new Command();

  program
    .name('health-ingest')
    .description('Aggregate health telemetry into daily summaries and send them for indexing')
    .version(VERSION, '-V, --version', 'Display version number')
    .argument('[dataDir]', 'Directory containing users.json and the record files')
    .option('--api-url <url>', 'Ingest endpoint, or PRINT_MODE for a dry run')
    .option('--dry-run', 'Print summary previews instead of sending them')
    .option('--batch-size <n>', 'Summaries per delivery batch', parsePositiveInt)
    .option('--max-concurrent <n>', 'Deliveries in flight within a batch', parsePositiveInt)
    .option('--flush-every <n>', 'Records between partial aggregator flushes', parsePositiveInt)
    .option('--wait-for-api', 'Poll the endpoint health check before sending')
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .action(async (dataDir: string | undefined, options: IngestCommandOptions) => {
      process.exitCode = await run(dataDir, options);
    });

  // Let main() map commander errors to exit codes
  program.exitOverride();

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, version or the usage error
      process.exitCode =
        error.code === 'commander.helpDisplayed' || error.code === 'commander.version'
          ? EXIT_CODES.SUCCESS
          : EXIT_CODES.USAGE_ERROR;
      return;
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_CODES.ERROR;
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
