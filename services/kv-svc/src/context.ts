import type { AppConfig } from "./config.js";
import { StopSignal } from "./lifecycle/StopSignal.js";
import { createLogger, type Logger } from "./observability/logger.js";
import { createServiceMetrics, type ServiceMetrics } from "./observability/metrics.js";
import { StatusReporter } from "./reporter/StatusReporter.js";
import { KeyValueStore } from "./store/KeyValueStore.js";

/**
 * Everything one running service shares: built once at startup and handed to
 * both the HTTP adapter and the status reporter.
 */
export type ServiceContext = {
  config: AppConfig;
  logger: Logger;
  store: KeyValueStore;
  stopSignal: StopSignal;
  reporter: StatusReporter;
  metrics: ServiceMetrics;
};

export function createServiceContext(config: AppConfig, logger?: Logger): ServiceContext {
  const resolvedLogger = logger ?? createLogger(config.logging.level);
  const store = new KeyValueStore();
  const stopSignal = new StopSignal();
  const reporter = new StatusReporter({
    store,
    stopSignal,
    logger: resolvedLogger.child({ component: "reporter" }),
    intervalMs: config.reporter.intervalMs
  });

  return {
    config,
    logger: resolvedLogger,
    store,
    stopSignal,
    reporter,
    metrics: createServiceMetrics(store)
  };
}
