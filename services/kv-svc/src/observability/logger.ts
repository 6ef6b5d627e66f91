import { pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  const options = {
    level,
    base: { service: "kv-svc" }
  };
  return destination ? pino(options, destination) : pino(options);
}

/** Adapts a pino logger to the `{ write }` stream morgan expects. */
export function toAccessLogStream(logger: Logger): { write: (line: string) => void } {
  return {
    write: (line: string) => {
      logger.info(line.trimEnd());
    }
  };
}
