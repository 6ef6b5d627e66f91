import { Counter, Gauge, Registry } from "prom-client";

import type { KeyValueStore } from "../store/KeyValueStore.js";

export const HTTP_REQUESTS_NAME = "kvsvc_http_requests_total";
export const STORE_ENTRIES_NAME = "kvsvc_store_entries";
export const STORE_REQUESTS_NAME = "kvsvc_store_requests";

export type ServiceMetrics = {
  registry: Registry;
  httpRequests: Counter<"route" | "method" | "status">;
};

/**
 * One registry per service context. The store gauges are collected on scrape
 * through `sample()`, so scraping never counts as store traffic.
 */
export function createServiceMetrics(store: KeyValueStore): ServiceMetrics {
  const registry = new Registry();

  const httpRequests = new Counter({
    name: HTTP_REQUESTS_NAME,
    help: "Total number of API requests handled, by route, method and status",
    labelNames: ["route", "method", "status"] as const,
    registers: [registry]
  });

  new Gauge({
    name: STORE_ENTRIES_NAME,
    help: "Number of keys currently held by the store",
    registers: [registry],
    collect() {
      this.set(store.sample().size);
    }
  });

  new Gauge({
    name: STORE_REQUESTS_NAME,
    help: "Requests counted by the store since startup",
    registers: [registry],
    collect() {
      this.set(store.sample().requests);
    }
  });

  return { registry, httpRequests };
}
