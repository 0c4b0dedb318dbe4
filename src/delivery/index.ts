/**
 * Delivery Module Exports
 *
 * @module delivery
 */

export {
  VectorIngestClient,
  IngestApiError,
  buildPayload,
  retryDelay,
  MAX_ATTEMPTS,
  RETRY_DELAY_MS,
  REQUEST_TIMEOUT_MS,
  LOW_SPEED_LIMIT,
  LOW_SPEED_TIME_MS,
  type DeliveryClient,
  type VectorIngestClientOptions,
} from './client.js';
export {
  PrintDeliveryClient,
  createDeliveryClient,
  formatPreview,
  PREVIEW_LENGTH,
  type CreateDeliveryClientOptions,
} from './print-client.js';
export { SummaryDispatcher, type DispatcherOptions } from './dispatcher.js';
export { ConcurrencyLimiter, type ConcurrencyStats } from './concurrency.js';
export { LowSpeedMonitor, type LowSpeedOptions } from './low-speed.js';
export {
  waitForApi,
  healthUrlFor,
  HEALTH_MAX_ATTEMPTS,
  HEALTH_INTERVAL_MS,
  type WaitForApiOptions,
} from './health.js';
