import type { FastifyInstance } from "fastify";
import { log } from "../logger.js";
import { register } from "../metrics.js";
import type { ReliabilityContext } from "../reliability/context.js";

// =============================================================================
// Status Routes
// =============================================================================
//
// Read-only views over the reliability context. Dashboard and alerts run a
// full report evaluation, which charges the error budgets.
//
// =============================================================================

export function registerStatusRoutes(app: FastifyInstance, ctx: ReliabilityContext): void {
  app.get("/sre/dashboard", async () => {
    return ctx.report.evaluate();
  });

  app.get("/sre/circuit-breakers", async () => {
    const now = ctx.timeProvider.now();
    return {
      circuitBreakers: ctx.registry.snapshotAll(),
      openCircuits: ctx.registry.listOpen(),
      criticalCircuits: ctx.registry.listCritical(now),
      summary: ctx.registry.summary(now),
    };
  });

  app.get("/sre/alerts", async () => {
    const report = ctx.report.evaluate();
    return {
      alerts: report.alerts,
      totalAlerts: report.alerts.length,
      overallStatus: report.overallStatus,
    };
  });

  // Prometheus scrape target
  app.get("/metrics", async (request, reply) => {
    try {
      const output = await register.metrics();
      reply.type(register.contentType);
      return reply.send(output);
    } catch (error) {
      log.api.error({ error }, "failed to collect metrics");
      return reply.status(500).send({ error: "Failed to collect metrics" });
    }
  });

  app.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });
}
