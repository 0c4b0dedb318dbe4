/**
 * Base Command
 *
 * Provides common functionality for the CLI including:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error reporting and exit codes
 * - Output utilities (log, warn, error)
 * - A Logger view handed to the ingestion pipeline
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Run completed, even with failed deliveries */
  SUCCESS: 0,
  /** Fatal error: configuration, data directory, profiles, API readiness */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * const base = new BaseCommand({ verbose: true });
 *
 * base.info('Ingesting...');
 * const result = await runIngestion({ dataDir, logger: base.logger });
 * base.success('Done');
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Pipeline-facing view; errors are reported without exiting */
  readonly logger: Logger;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }

    this.logger = {
      debug: (message) => this.debug(message),
      info: (message) => this.info(message),
      warn: (message) => this.warn(message),
      error: (message) => this.report(message),
    };
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Print an error to stderr without exiting.
   *
   * @param message - Error message
   * @param error - Cause; its stack is shown in verbose mode
   */
  report(message: string, error?: unknown): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error instanceof Error && this.options.verbose) {
      console.error(chalk.dim(error.stack ?? error.message));
    }
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X.
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      console.log(chalk.dim('='.repeat(title.length)));
    }
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}
