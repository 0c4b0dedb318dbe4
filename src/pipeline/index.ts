/**
 * Pipeline Exports
 *
 * Public entry point of the package: the ingestion driver and the types
 * shared across stages.
 *
 * @module pipeline
 */

export {
  runIngestion,
  DataDirectoryError,
  type IngestionOptions,
  type IngestionResult,
} from './ingest.js';

export {
  silentLogger,
  type Logger,
  type SummaryItem,
  type DeliveryResult,
  type DeliveryStats,
} from './types.js';
