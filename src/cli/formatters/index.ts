/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';

// Run summary formatters
export {
  formatIngestionSummary,
  formatQuickSummary,
  MAX_LISTED_FAILURES,
} from './run-summary.js';
