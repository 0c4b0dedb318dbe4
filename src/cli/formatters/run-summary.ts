/**
 * Run Summary Formatters
 *
 * Terminal output for a finished ingestion run.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { IngestionResult } from '../../pipeline/index.js';
import { formatDuration } from './progress.js';

/** Failed keys listed before the rest are elided */
export const MAX_LISTED_FAILURES = 10;

// ============================================================================
// Formatters
// ============================================================================

/**
 * Format the full run summary.
 *
 * @example
 * ```
 * === Ingestion Complete ===
 * Endpoint:  http://localhost:5000/ingest
 * Duration:  2.4s
 *
 * Profiles:  120
 * Files:     6 read, 0 skipped
 * Records:   48210 processed, 3 skipped
 * Summaries: 3590 rendered
 * Delivered: 3588/3590 (3601 attempts, 36 batches)
 * Failed:    2
 *   - u17/2024-03-02
 *   - u88/2024-03-09
 * ```
 */
export function formatIngestionSummary(result: IngestionResult): string {
  const { delivery } = result;
  const lines: string[] = [];

  lines.push(chalk.bold('=== Ingestion Complete ==='));
  lines.push(`Endpoint:  ${result.dryRun ? 'PRINT_MODE (dry run)' : result.apiUrl}`);
  lines.push(`Duration:  ${formatDuration(result.timing.durationMs)}`);
  lines.push('');
  lines.push(`Profiles:  ${result.profilesLoaded}`);
  lines.push(`Files:     ${result.filesProcessed} read, ${result.filesSkipped} skipped`);
  lines.push(`Records:   ${result.recordsProcessed} processed, ${result.recordsSkipped} skipped`);
  lines.push(`Summaries: ${result.summariesRendered} rendered`);
  lines.push(
    `Delivered: ${delivery.delivered}/${delivery.submitted} ` +
      `(${delivery.attempts} attempts, ${delivery.batches} batches)`
  );

  if (delivery.failed > 0) {
    lines.push(chalk.red(`Failed:    ${delivery.failed}`));
    for (const key of delivery.failedKeys.slice(0, MAX_LISTED_FAILURES)) {
      lines.push(`  - ${key}`);
    }
    const hidden = delivery.failedKeys.length - MAX_LISTED_FAILURES;
    if (hidden > 0) {
      lines.push(chalk.dim(`  ... and ${hidden} more`));
    }
  }

  return lines.join('\n');
}

/**
 * One-line summary for quiet mode.
 *
 * @example
 * formatQuickSummary(result) // 'Delivered 3588/3590 summaries (2 failed) in 2.4s'
 */
export function formatQuickSummary(result: IngestionResult): string {
  const { delivery } = result;
  const failed = delivery.failed > 0 ? ` (${delivery.failed} failed)` : '';
  return (
    `Delivered ${delivery.delivered}/${delivery.submitted} summaries${failed} ` +
    `in ${formatDuration(result.timing.durationMs)}`
  );
}
