/**
 * Dry-run delivery: prints a preview of each summary instead of POSTing it.
 *
 * @module delivery/print-client
 */

import { isPrintMode } from '../config/index.js';
import type { DeliveryResult, SummaryItem } from '../pipeline/types.js';
import { VectorIngestClient, type DeliveryClient, type VectorIngestClientOptions } from './client.js';

/** Characters of summary text shown per preview line */
export const PREVIEW_LENGTH = 150;

/**
 * `[<user_id> - <date>] <first 150 chars>...`
 */
export function formatPreview(item: SummaryItem): string {
  return `[${item.userId} - ${item.date}] ${item.text.slice(0, PREVIEW_LENGTH)}...`;
}

function writeStdout(line: string): void {
  process.stdout.write(`${line}\n`);
}

export class PrintDeliveryClient implements DeliveryClient {
  constructor(private readonly write: (line: string) => void = writeStdout) {}

  async deliver(item: SummaryItem): Promise<DeliveryResult> {
    this.write(formatPreview(item));
    return { userId: item.userId, date: item.date, success: true, attempts: 0 };
  }
}

export interface CreateDeliveryClientOptions extends VectorIngestClientOptions {
  /** Output sink for dry-run previews */
  write?: (line: string) => void;
}

/**
 * Picks the dry-run printer for the PRINT_MODE sentinel, HTTP otherwise.
 */
export function createDeliveryClient(
  apiUrl: string,
  options: CreateDeliveryClientOptions = {}
): DeliveryClient {
  if (isPrintMode(apiUrl)) {
    return new PrintDeliveryClient(options.write);
  }
  return new VectorIngestClient(apiUrl, options);
}
