/**
 * Readiness probe for the ingest endpoint.
 *
 * @module delivery/health
 */

import { silentLogger, type Logger } from '../pipeline/types.js';

export const HEALTH_MAX_ATTEMPTS = 60;
export const HEALTH_INTERVAL_MS = 5000;
export const HEALTH_TIMEOUT_MS = 5000;

export interface WaitForApiOptions {
  maxAttempts?: number;
  intervalMs?: number;
  /** Per-probe timeout */
  timeoutMs?: number;
  logger?: Logger;
  /** Called before every probe */
  onAttempt?: (attempt: number, maxAttempts: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * `/health` on the ingest URL's origin.
 *
 * @example
 * healthUrlFor('http://localhost:5000/ingest') // 'http://localhost:5000/health'
 */
export function healthUrlFor(apiUrl: string): string {
  return new URL('/health', apiUrl).toString();
}

async function probe(url: string, timeoutMs: number): Promise<boolean> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { method: 'GET', signal: controller.signal });
    return response.ok;
  } catch {
    return false;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Polls the health endpoint until it answers 2xx.
 *
 * @returns true once healthy, false when every attempt failed
 */
export async function waitForApi(apiUrl: string, options: WaitForApiOptions = {}): Promise<boolean> {
  const maxAttempts = options.maxAttempts ?? HEALTH_MAX_ATTEMPTS;
  const intervalMs = options.intervalMs ?? HEALTH_INTERVAL_MS;
  const timeoutMs = options.timeoutMs ?? HEALTH_TIMEOUT_MS;
  const logger = options.logger ?? silentLogger;
  const wait = options.sleep ?? sleep;
  const url = healthUrlFor(apiUrl);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    options.onAttempt?.(attempt, maxAttempts);
    if (await probe(url, timeoutMs)) {
      logger.info(`API is ready at ${url}`);
      return true;
    }
    logger.debug(`API not ready (${attempt}/${maxAttempts})`);
    if (attempt < maxAttempts) {
      await wait(intervalMs);
    }
  }

  logger.error(`API at ${url} did not become ready after ${maxAttempts} attempts`);
  return false;
}
