/**
 * Record Reader
 *
 * Opens each stream file in turn and yields its elements tagged with the
 * stream's record kind. Files are read one at a time; a missing or broken
 * file is reported and skipped without ending the run.
 *
 * @module ingest/reader
 */

import * as path from 'node:path';
import { fileExists, readJson } from '../storage/files.js';
import { silentLogger, type Logger } from '../pipeline/types.js';
import type { TaggedRecord } from '../aggregator/types.js';
import { STREAMS, type StreamSource } from './streams.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Callbacks for per-file lifecycle events.
 */
export interface ReaderCallbacks {
  /** Called before a file is opened */
  onFileStart?: (source: StreamSource) => void;
  /** Called once a file has been parsed, with its element count */
  onFileLoaded?: (source: StreamSource, count: number) => void;
  /** Called when a file is skipped */
  onFileSkipped?: (source: StreamSource, reason: string) => void;
}

/**
 * Options for readRecords.
 */
export interface ReadRecordsOptions {
  /** Streams to read, in order (default: STREAMS) */
  streams?: readonly StreamSource[];
  logger?: Logger;
  callbacks?: ReaderCallbacks;
}

// ============================================================================
// Reader
// ============================================================================

/**
 * Parse one stream file into its array of elements.
 *
 * @returns The elements, or a reason string when the file must be skipped
 */
async function loadStream(filePath: string): Promise<unknown[] | string> {
  if (!(await fileExists(filePath))) {
    return 'file not found';
  }

  let content: unknown;
  try {
    content = await readJson(filePath);
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }

  if (!Array.isArray(content)) {
    return 'top-level value is not an array';
  }

  return content;
}

/**
 * Yield every element of every stream file under `dataDir`.
 *
 * @example
 * ```typescript
 * for await (const { kind, record } of readRecords('/data')) {
 *   aggregator.add({ kind, record });
 * }
 * ```
 */
export async function* readRecords(
  dataDir: string,
  options: ReadRecordsOptions = {}
): AsyncGenerator<TaggedRecord> {
  const { streams = STREAMS, logger = silentLogger, callbacks = {} } = options;

  for (const source of streams) {
    callbacks.onFileStart?.(source);
    logger.info(`Processing ${source.file}...`);

    const loaded = await loadStream(path.join(dataDir, source.file));

    if (typeof loaded === 'string') {
      logger.warn(`Skipping ${source.file}: ${loaded}`);
      callbacks.onFileSkipped?.(source, loaded);
      continue;
    }

    callbacks.onFileLoaded?.(source, loaded.length);
    logger.debug(`Loaded ${loaded.length} records from ${source.file}`);

    for (const record of loaded) {
      yield { kind: source.kind, record };
    }
  }
}
