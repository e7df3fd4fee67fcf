import { fastify, type FastifyInstance } from "fastify";
import {
  Counter,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import type { Logger } from "./logger.js";

export interface ScannerMetrics {
  registry: Registry;
  polls: Counter<"status">;
  notifications: Counter<"result">;
  pollDuration: Histogram<"status">;
}

export function createMetrics(opts: { collectDefaults?: boolean } = {}): ScannerMetrics {
  const registry = new Registry();
  if (opts.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix: "scanner_" });
  }

  return {
    registry,
    polls: new Counter({
      name: "scanner_polls_total",
      help: "Poll cycles by outcome",
      labelNames: ["status"] as const,
      registers: [registry],
    }),
    notifications: new Counter({
      name: "scanner_notifications_total",
      help: "Notification attempts by result",
      labelNames: ["result"] as const,
      registers: [registry],
    }),
    pollDuration: new Histogram({
      name: "scanner_poll_duration_ms",
      help: "Wall time of one poll cycle (ms)",
      labelNames: ["status"] as const,
      buckets: [50, 100, 250, 500, 1000, 2000, 5000, 15000],
      registers: [registry],
    }),
  };
}

export function buildMetricsServer(metrics: ScannerMetrics): FastifyInstance {
  const app = fastify({ logger: false });
  app.get("/health/live", async () => ({ ok: true }));
  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", metrics.registry.contentType);
    return metrics.registry.metrics();
  });
  return app;
}

export async function startMetricsServer(
  metrics: ScannerMetrics,
  port: number,
  logger: Logger,
): Promise<FastifyInstance> {
  const app = buildMetricsServer(metrics);
  await app.listen({ port, host: "0.0.0.0" });
  logger.info({ port }, "metrics listening on /metrics");
  return app;
}
