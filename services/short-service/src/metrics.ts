import client from "prom-client";
import type { Counter, Histogram, Registry } from "prom-client";
import type { KeyStoreListener } from "./key_store.js";

export interface Metrics {
  registry: Registry;
  httpRequestsTotal: Counter<"method" | "route" | "status_code">;
  httpRequestDurationSeconds: Histogram<"method" | "route" | "status_code">;
  createsTotal: Counter<"outcome">;
  lookupsTotal: Counter<"outcome">;
  collisionsTotal: Counter;
}

export function createMetrics(): Metrics {
  const registry = new client.Registry();

  // Default Node.js / process metrics (CPU, memory, GC, event loop, etc.)
  client.collectDefaultMetrics({ register: registry });

  return {
    registry,

    httpRequestsTotal: new client.Counter({
      name: "http_requests_total",
      help: "Total number of HTTP requests",
      labelNames: ["method", "route", "status_code"] as const,
      registers: [registry]
    }),

    httpRequestDurationSeconds: new client.Histogram({
      name: "http_request_duration_seconds",
      help: "HTTP request duration in seconds",
      labelNames: ["method", "route", "status_code"] as const,
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [registry]
    }),

    // created | existing | failed
    createsTotal: new client.Counter({
      name: "short_creates_total",
      help: "Total number of create calls by outcome",
      labelNames: ["outcome"] as const,
      registers: [registry]
    }),

    // found | not_found | failed
    lookupsTotal: new client.Counter({
      name: "short_lookups_total",
      help: "Total number of lookup calls by outcome",
      labelNames: ["outcome"] as const,
      registers: [registry]
    }),

    collisionsTotal: new client.Counter({
      name: "short_collisions_total",
      help: "Probe windows already held by a different value",
      registers: [registry]
    })
  };
}

export function keyStoreListener(metrics: Metrics): KeyStoreListener {
  return (event) => {
    if (event.op === "create") {
      if (!event.ok) {
        metrics.createsTotal.inc({ outcome: "failed" });
        return;
      }
      metrics.createsTotal.inc({ outcome: event.outcome.created ? "created" : "existing" });
      if (event.outcome.collisions > 0) metrics.collisionsTotal.inc(event.outcome.collisions);
      return;
    }

    if (event.ok) {
      metrics.lookupsTotal.inc({ outcome: "found" });
    } else {
      metrics.lookupsTotal.inc({ outcome: event.error.code === "key_not_found" ? "not_found" : "failed" });
    }
  };
}
