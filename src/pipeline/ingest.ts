/**
 * Ingestion Driver
 *
 * One run: check the data directory, load profiles, stream every record
 * file through the day aggregator, render the buckets it releases and hand
 * them to the dispatcher, then drain whatever is left.
 *
 * The aggregator is touched only from this loop; delivery workers receive
 * immutable summary items.
 *
 * @module pipeline/ingest
 */

import { DEFAULT_API_URL, DEFAULT_BATCH_SIZE, DEFAULT_MAX_CONCURRENT, isPrintMode } from '../config/index.js';
import { DayAggregator, FLUSH_EVERY, type DayBucket } from '../aggregator/index.js';
import { readRecords, type ReaderCallbacks, type StreamSource } from '../ingest/index.js';
import { ProfileStore } from '../profiles/store.js';
import { toSummaryItem } from '../summary/index.js';
import { createDeliveryClient, SummaryDispatcher, type DeliveryClient } from '../delivery/index.js';
import { directoryExists } from '../storage/files.js';
import { silentLogger, type DeliveryStats, type Logger } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * The data directory is missing or is not a directory. Fatal.
 */
export class DataDirectoryError extends Error {
  constructor(public readonly dataDir: string) {
    super(`Data directory not found: ${dataDir}`);
    this.name = 'DataDirectoryError';
  }
}

export interface IngestionOptions {
  /** Directory holding users.json and the record streams */
  dataDir: string;
  /** Ingest endpoint or PRINT_MODE (default: http://localhost:5000/ingest) */
  apiUrl?: string;
  /** Replaces the client chosen from apiUrl */
  client?: DeliveryClient;
  batchSize?: number;
  maxConcurrent?: number;
  flushEvery?: number;
  /** Streams to read, in order (default: all six) */
  streams?: readonly StreamSource[];
  logger?: Logger;
  /** Dry-run output sink */
  write?: (line: string) => void;
  callbacks?: ReaderCallbacks;
}

/**
 * What a run did.
 */
export interface IngestionResult {
  dataDir: string;
  apiUrl: string;
  dryRun: boolean;
  profilesLoaded: number;
  /** Records folded into the aggregator */
  recordsProcessed: number;
  /** Records dropped for a missing owner, date or field */
  recordsSkipped: number;
  filesProcessed: number;
  filesSkipped: number;
  summariesRendered: number;
  delivery: DeliveryStats;
  timing: {
    startedAt: string;
    completedAt: string;
    durationMs: number;
  };
}

// ============================================================================
// Driver
// ============================================================================

/**
 * Run one ingestion pass.
 *
 * @throws DataDirectoryError when dataDir is not a directory
 * @throws ProfileLoadError when users.json cannot be loaded
 *
 * @example
 * ```typescript
 * const result = await runIngestion({ dataDir: './data', apiUrl: 'PRINT_MODE' });
 * console.log(`${result.summariesRendered} summaries`);
 * ```
 */
export async function runIngestion(options: IngestionOptions): Promise<IngestionResult> {
  const started = new Date();
  const logger = options.logger ?? silentLogger;
  const apiUrl = options.apiUrl ?? DEFAULT_API_URL;
  const { dataDir } = options;

  if (!(await directoryExists(dataDir))) {
    throw new DataDirectoryError(dataDir);
  }

  const profiles = await ProfileStore.load(dataDir);
  logger.info(`Loaded ${profiles.size} profiles`);

  const client =
    options.client ?? createDeliveryClient(apiUrl, { logger, write: options.write });
  const dispatcher = new SummaryDispatcher(client, {
    batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
    maxConcurrent: options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT,
    logger,
  });
  const aggregator = new DayAggregator({ flushEvery: options.flushEvery ?? FLUSH_EVERY });

  let filesProcessed = 0;
  let filesSkipped = 0;
  let summariesRendered = 0;

  const ship = async (buckets: DayBucket[]): Promise<void> => {
    for (const bucket of buckets) {
      await dispatcher.submit(toSummaryItem(profiles.lookup(bucket.userId), bucket));
      summariesRendered++;
    }
  };

  const callbacks: ReaderCallbacks = {
    onFileStart: options.callbacks?.onFileStart,
    onFileLoaded: (source, count) => {
      filesProcessed++;
      options.callbacks?.onFileLoaded?.(source, count);
    },
    onFileSkipped: (source, reason) => {
      filesSkipped++;
      options.callbacks?.onFileSkipped?.(source, reason);
    },
  };

  let flushes = 0;

  for await (const tagged of readRecords(dataDir, { streams: options.streams, logger, callbacks })) {
    const outcome = aggregator.add(tagged);

    if (outcome.status === 'skipped') {
      logger.debug(
        `Skipped ${tagged.kind} record: ${outcome.reason}${outcome.detail ? ` (${outcome.detail})` : ''}`
      );
      continue;
    }

    if (aggregator.flushCount > flushes) {
      flushes = aggregator.flushCount;
      logger.info(`Processed ${aggregator.recordCount} records...`);
      await ship(outcome.flushed);
    }
  }

  await ship(aggregator.drain());
  await dispatcher.flush();

  const completed = new Date();
  const delivery = dispatcher.getStats();

  return {
    dataDir,
    apiUrl,
    dryRun: isPrintMode(apiUrl),
    profilesLoaded: profiles.size,
    recordsProcessed: aggregator.recordCount,
    recordsSkipped: aggregator.skippedCount,
    filesProcessed,
    filesSkipped,
    summariesRendered,
    delivery,
    timing: {
      startedAt: started.toISOString(),
      completedAt: completed.toISOString(),
      durationMs: completed.getTime() - started.getTime(),
    },
  };
}
