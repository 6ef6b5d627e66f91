import http from "node:http";
import path from "node:path";
import { fileURLToPath } from "node:url";

import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import morgan from "morgan";
import { z } from "zod";

import { loadConfig } from "./config.js";
import { createServiceContext, type ServiceContext } from "./context.js";
import { ShutdownCoordinator } from "./lifecycle/ShutdownCoordinator.js";
import { createLogger, toAccessLogStream } from "./observability/logger.js";
import type { Entries } from "./store/KeyValueStore.js";

const VIEWS_DIR = fileURLToPath(new URL("../views/", import.meta.url));
const PUBLIC_DIR = fileURLToPath(new URL("../public/", import.meta.url));

const PAGES: Record<string, string> = {
  "/": "index.html",
  "/index": "index.html",
  "/data": "data.html",
  "/stats": "stats.html"
};

const EntryListSchema = z.array(z.tuple([z.string(), z.string()]));

/**
 * Decodes a merge body regardless of its declared content type. Validation
 * runs over the entry list so keys such as `__proto__` stay ordinary keys.
 */
function decodeEntries(body: unknown): Entries | undefined {
  if (typeof body !== "string") {
    return undefined;
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (typeof decoded !== "object" || decoded === null || Array.isArray(decoded)) {
    return undefined;
  }
  const parsed = EntryListSchema.safeParse(Object.entries(decoded));
  return parsed.success ? Object.fromEntries(parsed.data) : undefined;
}

function methodNotAllowed(allowed: string[]): RequestHandler {
  const allowHeader = allowed.join(", ");
  return (_req: Request, res: Response) => {
    res.set("Allow", allowHeader);
    res.status(405).json({ error: "Method not allowed" });
  };
}

function statusOf(error: unknown): number {
  if (typeof error === "object" && error !== null) {
    const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

export function createServer(context: ServiceContext): Express {
  const { config, logger, store, metrics } = context;
  const app = express();
  const rawBody = express.text({ limit: config.server.jsonLimit, type: () => true });

  app.use(cors());
  app.use(morgan("tiny", { stream: toAccessLogStream(logger) }));

  app.use("/api", (req: Request, res: Response, next: NextFunction) => {
    res.on("finish", () => {
      const route: unknown = req.route?.path;
      metrics.httpRequests.inc({
        route: typeof route === "string" ? route : "unmatched",
        method: req.method,
        status: String(res.statusCode)
      });
    });
    next();
  });

  app.get("/healthz", (_req: Request, res: Response) => {
    res.status(200).json({ status: "ok" });
  });

  app.get("/metrics", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const body = await metrics.registry.metrics();
      res.set("Content-Type", metrics.registry.contentType);
      res.send(body);
    } catch (error) {
      next(error);
    }
  });

  const merge = (req: Request, res: Response) => {
    const updates = decodeEntries(req.body);
    if (!updates) {
      res.status(400).json({ error: "Invalid JSON" });
      return;
    }
    store.put(updates);
    res.json({ status: "ok" });
  };

  app
    .route("/api/data")
    .head(methodNotAllowed(["GET", "POST", "PUT"]))
    .get((_req: Request, res: Response) => {
      res.json(store.getAll());
    })
    .post(rawBody, merge)
    .put(rawBody, merge)
    .delete((_req: Request, res: Response) => {
      res.status(400).json({ error: "Key not specified" });
    })
    .all(methodNotAllowed(["GET", "POST", "PUT"]));

  const deleteKey = (req: Request, res: Response) => {
    const { key } = req.params;
    if (!store.delete(key)) {
      res.status(404).json({ error: "Key not found" });
      return;
    }
    res.json({ deleted: key });
  };

  // Segments after the key are ignored.
  for (const keyRoute of ["/api/data/:key", "/api/data/:key/*"]) {
    app.route(keyRoute).delete(deleteKey).all(methodNotAllowed(["DELETE"]));
  }

  app
    .route("/api/stats")
    .head(methodNotAllowed(["GET"]))
    .get((_req: Request, res: Response) => {
      const { requests, size } = store.stats();
      res.json({ requests, db_size: size });
    })
    .all(methodNotAllowed(["GET"]));

  if (config.ui.enabled) {
    app.use("/public", express.static(PUBLIC_DIR));
    for (const [route, file] of Object.entries(PAGES)) {
      app.get(route, (_req: Request, res: Response, next: NextFunction) => {
        res.sendFile(path.join(VIEWS_DIR, file), error => {
          if (error) {
            next(error);
          }
        });
      });
    }
  }

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(error);
    if (status >= 500) {
      logger.error({ err: error, method: req.method, path: req.path }, "request failed");
    }
    const message = error instanceof Error ? error.message : "Internal Server Error";
    res.status(status).json({ error: message });
  });

  return app;
}

export type RunningService = {
  server: http.Server;
  coordinator: ShutdownCoordinator;
  port: number;
};

/**
 * Binds the listener, starts the status reporter and returns the coordinator
 * that tears both down. Rejects if the listener cannot bind.
 */
export async function startService(context: ServiceContext): Promise<RunningService> {
  const { config, logger, reporter, stopSignal } = context;
  const server = http.createServer(createServer(context));

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(config.server.port, config.server.host);
  });

  server.on("error", error => {
    logger.error({ err: error }, "http server error");
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : config.server.port;
  logger.info({ host: config.server.host, port }, "kv-svc listening");

  const reporterRun = config.reporter.enabled
    ? reporter.start().catch((error: unknown) => {
        logger.error({ err: error }, "Status reporter failed");
      })
    : Promise.resolve();

  const coordinator = new ShutdownCoordinator({
    stopSignal,
    server,
    logger,
    timeoutMs: config.server.shutdownTimeoutMs,
    beforeDrain: () => reporterRun
  });

  return { server, coordinator, port };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logging.level);
  const context = createServiceContext(config, logger);
  const { coordinator } = await startService(context);

  const onSignal = (signal: NodeJS.Signals) => {
    coordinator.shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.fatal({ err: error }, "shutdown failed");
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

if (process.env.NODE_ENV !== "test") {
  main().catch((error: unknown) => {
    createLogger("info").fatal({ err: error }, "kv-svc failed to start");
    process.exit(1);
  });
}
