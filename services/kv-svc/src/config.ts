import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { isLogLevel, LOG_LEVELS, type LogLevel } from "./observability/logger.js";

export type ServerConfig = {
  host: string;
  port: number;
  shutdownTimeoutMs: number;
  jsonLimit: string;
};

export type ReporterConfig = {
  enabled: boolean;
  intervalMs: number;
};

export type AppConfig = {
  server: ServerConfig;
  reporter: ReporterConfig;
  logging: { level: LogLevel };
  ui: { enabled: boolean };
};

type PartialAppConfig = {
  server?: Partial<ServerConfig>;
  reporter?: Partial<ReporterConfig>;
  logging?: { level?: LogLevel };
  ui?: { enabled?: boolean };
};

export const DEFAULT_CONFIG: AppConfig = {
  server: {
    host: "0.0.0.0",
    port: 8080,
    shutdownTimeoutMs: 5000,
    jsonLimit: "1mb"
  },
  reporter: {
    enabled: true,
    intervalMs: 5000
  },
  logging: { level: "info" },
  ui: { enabled: true }
};

const AppConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    shutdownTimeoutMs: z.number().int().positive(),
    jsonLimit: z.string().min(1)
  }),
  reporter: z.object({
    enabled: z.boolean(),
    intervalMs: z.number().int().positive()
  }),
  logging: z.object({ level: z.enum(LOG_LEVELS) }),
  ui: z.object({ enabled: z.boolean() })
});

export class ConfigLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigLoadError";
  }
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : undefined;
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function asBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (["true", "1", "yes", "on"].includes(normalized)) {
      return true;
    }
    if (["false", "0", "no", "off"].includes(normalized)) {
      return false;
    }
  }
  return undefined;
}

function asString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function asLogLevel(value: unknown): LogLevel | undefined {
  const normalized = asString(value)?.toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function readConfigFile(cfgPath: string): PartialAppConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(cfgPath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(`Failed to parse configuration file at ${cfgPath}: ${message}`, { cause: error });
  }

  const doc = asRecord(parsed);
  if (!doc) {
    return {};
  }
  const server = asRecord(doc.server);
  const reporter = asRecord(doc.reporter);
  const logging = asRecord(doc.logging);
  const ui = asRecord(doc.ui);

  return {
    server: server
      ? {
          host: asString(server.host),
          port: asNumber(server.port),
          shutdownTimeoutMs: asNumber(server.shutdownTimeoutMs),
          jsonLimit: asString(server.jsonLimit)
        }
      : undefined,
    reporter: reporter
      ? {
          enabled: asBoolean(reporter.enabled),
          intervalMs: asNumber(reporter.intervalMs)
        }
      : undefined,
    logging: logging ? { level: asLogLevel(logging.level) } : undefined,
    ui: ui ? { enabled: asBoolean(ui.enabled) } : undefined
  };
}

/**
 * Resolves configuration from defaults, then `APP_CONFIG` (or
 * `config/app.yaml` under the working directory), then environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cfgPath = env.APP_CONFIG || path.join(process.cwd(), "config", "app.yaml");
  const fileCfg = fs.existsSync(cfgPath) ? readConfigFile(cfgPath) : {};

  const candidate: AppConfig = {
    server: {
      host: asString(env.HOST) ?? fileCfg.server?.host ?? DEFAULT_CONFIG.server.host,
      port: asNumber(env.PORT) ?? fileCfg.server?.port ?? DEFAULT_CONFIG.server.port,
      shutdownTimeoutMs:
        asNumber(env.SHUTDOWN_TIMEOUT_MS) ??
        fileCfg.server?.shutdownTimeoutMs ??
        DEFAULT_CONFIG.server.shutdownTimeoutMs,
      jsonLimit: asString(env.JSON_BODY_LIMIT) ?? fileCfg.server?.jsonLimit ?? DEFAULT_CONFIG.server.jsonLimit
    },
    reporter: {
      enabled: asBoolean(env.REPORTER_ENABLED) ?? fileCfg.reporter?.enabled ?? DEFAULT_CONFIG.reporter.enabled,
      intervalMs:
        asNumber(env.REPORTER_INTERVAL_MS) ?? fileCfg.reporter?.intervalMs ?? DEFAULT_CONFIG.reporter.intervalMs
    },
    logging: {
      level: asLogLevel(env.LOG_LEVEL) ?? fileCfg.logging?.level ?? DEFAULT_CONFIG.logging.level
    },
    ui: {
      enabled: asBoolean(env.UI_ENABLED) ?? fileCfg.ui?.enabled ?? DEFAULT_CONFIG.ui.enabled
    }
  };

  const result = AppConfigSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join(", ");
    throw new ConfigLoadError(`Invalid configuration: ${details}`);
  }
  return result.data;
}
