/**
 * Record Reader Exports
 *
 * @module ingest
 */

export { readRecords, type ReaderCallbacks, type ReadRecordsOptions } from './reader.js';
export { STREAMS, type StreamSource } from './streams.js';
export { extractDate } from './date.js';
