/**
 * Day Aggregator Exports
 *
 * @module aggregator
 */

export { DayAggregator, isFlushable } from './aggregator.js';
export {
  FLUSH_EVERY,
  type DayBucket,
  type TaggedRecord,
  type FoldOutcome,
  type SkipReason,
  type AggregatorOptions,
} from './types.js';
