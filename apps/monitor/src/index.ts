/**
 * Reliability monitor service
 *
 * Serves the status surface (dashboard, breaker status, alerts, metrics) for
 * the process-wide reliability context.
 */

import { config } from "./config.js";
import { log, logFailure } from "./logger.js";
import { DAY_MS } from "./domain/utils/time.js";
import { createReliabilityContext } from "./reliability/context.js";
import { loadSloDefinitions } from "./reliability/slo-config.js";
import { buildServer } from "./server.js";
import { createShutdownHandler, printBanner, withTimeout } from "./entrypoints/shared.js";

async function main(): Promise<void> {
  const slos = await loadSloDefinitions(config.SLO_CONFIG_PATH);

  const ctx = createReliabilityContext({
    slos,
    latencyThresholdMs: config.SLI_LATENCY_THRESHOLD_MS,
    criticalBudgetThreshold: config.ERROR_BUDGET_CRITICAL_THRESHOLD,
    retentionMs: config.METRICS_RETENTION_DAYS !== undefined ? config.METRICS_RETENTION_DAYS * DAY_MS : undefined,
    breakerDefaults: {
      failureThreshold: config.CIRCUIT_FAILURE_THRESHOLD,
      recoveryTimeoutMs: config.CIRCUIT_RECOVERY_TIMEOUT_MS,
    },
  });

  const app = buildServer(ctx);

  createShutdownHandler(config.SERVICE_NAME, async () => {
    await withTimeout(app.close(), 10000, "http server");
  });

  await app.listen({ port: config.PORT, host: config.HOST });

  log.system.info({
    port: config.PORT,
    env: config.NODE_ENV,
    slos: slos.map((slo) => slo.name),
    latencyThresholdMs: config.SLI_LATENCY_THRESHOLD_MS,
  }, "started");

  printBanner("Reliability Monitor", {
    SLOs: slos.length,
    "Latency threshold": `${config.SLI_LATENCY_THRESHOLD_MS}ms`,
  });
}

main().catch((error: unknown) => {
  logFailure("system", "startup failed", error, {});
  process.exit(1);
});
