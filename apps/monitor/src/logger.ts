import pino from "pino";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Structured Logger
// =============================================================================
//
// Usage patterns:
//
// TRANSITIONS (short, info/warn level):
//   log.breaker.warn({ breaker: "database", failures: 3 }, "opened")
//   log.breaker.info({ breaker: "database" }, "closed")
//
// EVALUATIONS:
//   log.report.warn({ overallStatus: "DEGRADED", alerts: 2 }, "reliability degraded")
//
// DEBUG (verbose, only in dev):
//   log.slo.debug({ evicted: 12 }, "pruned request buckets")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL ?? (isDev ? "debug" : "info"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  base: { service: config.SERVICE_NAME },
};

// Pretty printing only for local development; tests and production emit JSON
export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname,service",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================
// Each component gets its own child logger for easy filtering

export const log = {
  // Circuit breaker transitions and rejections
  breaker: logger.child({ component: "breaker" }),

  // Request recording and SLI/SLO accounting
  slo: logger.child({ component: "slo" }),

  // Reliability report evaluations
  report: logger.child({ component: "report" }),

  // HTTP status surface
  api: logger.child({ component: "api" }),

  // System-level events
  system: logger.child({ component: "system" }),
};

export type LogComponent = keyof typeof log;

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: LogComponent,
  event: string,
  error: unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    // Include stack trace only in dev
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Start a high-resolution timer. The returned function yields elapsed milliseconds.
 */
export function startTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - start) / 1_000_000;
}

export default log;
