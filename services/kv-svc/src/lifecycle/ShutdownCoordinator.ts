import type { Logger } from "../observability/logger.js";
import type { StopSignal } from "./StopSignal.js";

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

export type CoordinatorState = "running" | "draining";

export type DrainOutcome = "drained" | "timed_out";

/** The slice of `http.Server` the coordinator drives. */
export type DrainableServer = {
  close(callback?: (error?: Error) => void): unknown;
  closeAllConnections(): void;
};

export type ShutdownCoordinatorOptions = {
  stopSignal: StopSignal;
  server: DrainableServer;
  logger: Logger;
  timeoutMs?: number;
  /** Awaited after the stop signal closes and before the drain starts. */
  beforeDrain?: () => Promise<void>;
};

export type ShutdownResult = {
  reason: string;
  outcome: DrainOutcome;
};

/**
 * running → draining, once. Closes the stop signal, then stops the listener
 * and waits for in-flight requests up to the timeout, after which the
 * remaining connections are destroyed.
 */
export class ShutdownCoordinator {
  private readonly stopSignal: StopSignal;
  private readonly server: DrainableServer;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly beforeDrain?: () => Promise<void>;
  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(options: ShutdownCoordinatorOptions) {
    this.stopSignal = options.stopSignal;
    this.server = options.server;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.beforeDrain = options.beforeDrain;
  }

  get state(): CoordinatorState {
    return this.shutdownPromise ? "draining" : "running";
  }

  /** Repeated and concurrent calls share the first call's result. */
  shutdown(reason = "shutdown requested"): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(reason);
    }
    return this.shutdownPromise;
  }

  private async runShutdown(reason: string): Promise<ShutdownResult> {
    this.logger.info({ reason }, "Shutting down server");
    this.stopSignal.close(reason);
    if (this.beforeDrain) {
      await this.beforeDrain();
    }
    const outcome = await this.drain();
    if (outcome === "timed_out") {
      this.logger.warn({ timeoutMs: this.timeoutMs }, "Drain timed out; closed remaining connections");
    }
    this.logger.info({ outcome }, "Server exited properly");
    return { reason, outcome };
  }

  private drain(): Promise<DrainOutcome> {
    return new Promise<DrainOutcome>(resolve => {
      let settled = false;
      const finish = (outcome: DrainOutcome) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      };

      const timer = setTimeout(() => {
        this.server.closeAllConnections();
        finish("timed_out");
      }, this.timeoutMs);

      this.server.close(error => {
        if (error) {
          this.logger.warn({ err: error }, "Listener close reported an error");
        }
        finish("drained");
      });
    });
  }
}
