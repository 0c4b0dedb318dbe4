/**
 * Low-speed transfer watchdog.
 *
 * Aborts an HTTP exchange whose throughput over a trailing window falls
 * under a floor.
 *
 * @module delivery/low-speed
 */

/** Slots the trailing window is divided into */
const SAMPLES_PER_WINDOW = 30;

export interface LowSpeedOptions {
  /** Minimum average throughput in bytes per second */
  limitBytesPerSec: number;
  /** Window length in milliseconds */
  windowMs: number;
  /** Called once when the trailing window falls under the floor */
  onStall: () => void;
}

/**
 * Counts transferred bytes into fixed slots and checks the sum of the last
 * window's worth of slots after every slot closes.
 *
 * At the defaults (100 B/s over 30 s) each slot is one second, so a burst
 * followed by silence is caught one window after the burst.
 *
 * @example
 * ```typescript
 * const monitor = new LowSpeedMonitor({
 *   limitBytesPerSec: 100,
 *   windowMs: 30_000,
 *   onStall: () => controller.abort(),
 * });
 * monitor.start();
 * monitor.record(chunk.byteLength);
 * monitor.stop();
 * ```
 */
export class LowSpeedMonitor {
  private readonly minBytesPerWindow: number;
  private readonly sampleMs: number;
  private readonly slotCount: number;
  private readonly slots: number[] = [];
  private bytesInSlot = 0;
  private timer: NodeJS.Timeout | undefined;

  constructor(private readonly options: LowSpeedOptions) {
    this.minBytesPerWindow = (options.limitBytesPerSec * options.windowMs) / 1000;
    this.sampleMs = Math.max(1, Math.round(options.windowMs / SAMPLES_PER_WINDOW));
    this.slotCount = Math.max(1, Math.round(options.windowMs / this.sampleMs));
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.sample(), this.sampleMs);
  }

  record(bytes: number): void {
    this.bytesInSlot += bytes;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private sample(): void {
    this.slots.push(this.bytesInSlot);
    this.bytesInSlot = 0;
    if (this.slots.length > this.slotCount) {
      this.slots.shift();
    }

    // Not judged until a whole window has been observed
    if (this.slots.length < this.slotCount) {
      return;
    }

    const total = this.slots.reduce((sum, bytes) => sum + bytes, 0);
    if (total < this.minBytesPerWindow) {
      this.stop();
      this.options.onStall();
    }
  }
}
