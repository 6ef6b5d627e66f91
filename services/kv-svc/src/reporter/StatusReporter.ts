import { setTimeout as delay } from "node:timers/promises";

import type { Logger } from "../observability/logger.js";
import type { StopSignal } from "../lifecycle/StopSignal.js";
import type { KeyValueStore } from "../store/KeyValueStore.js";

export const DEFAULT_REPORT_INTERVAL_MS = 5000;

export type StatusReporterOptions = {
  store: KeyValueStore;
  stopSignal: StopSignal;
  logger: Logger;
  intervalMs?: number;
};

export function formatStatusLine(requests: number, size: number): string {
  return `Current requests: ${requests}, Database size: ${size}`;
}

/**
 * Logs the store's request count and size on a fixed period until the stop
 * signal closes. Each wait is "next tick or stop, whichever comes first", so a
 * stop between ticks ends the loop at once.
 */
export class StatusReporter {
  private readonly store: KeyValueStore;
  private readonly stopSignal: StopSignal;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private running: Promise<void> | null = null;

  constructor(options: StatusReporterOptions) {
    this.store = options.store;
    this.stopSignal = options.stopSignal;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs ?? DEFAULT_REPORT_INTERVAL_MS;
  }

  /** Starts the loop; later calls return the same completion promise. */
  start(): Promise<void> {
    if (!this.running) {
      this.running = this.run();
    }
    return this.running;
  }

  /** Settles once the loop has exited, or at once if it was never started. */
  done(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    const signal = this.stopSignal.signal;
    while (!signal.aborted) {
      const ticked = await delay(this.intervalMs, true, { signal }).catch((error: unknown) => {
        if (signal.aborted) {
          return false;
        }
        throw error;
      });
      if (!ticked) {
        break;
      }
      const { requests, size } = this.store.sample();
      this.logger.info({ requests, dbSize: size }, formatStatusLine(requests, size));
    }
    this.logger.info("Status reporter stopped");
  }
}
