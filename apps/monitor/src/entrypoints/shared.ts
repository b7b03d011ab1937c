/**
 * Process lifecycle helpers shared by service entrypoints.
 */

import { config } from "../config.js";
import { log } from "../logger.js";
import { errorMessage } from "../reliability/errors.js";

const SHUTDOWN_TIMEOUT_MS = 30000;

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  name: string
): Promise<T | void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<void>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${name} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    log.system.warn({ error: errorMessage(error), component: name }, "shutdown timeout");
  } finally {
    clearTimeout(timer);
  }
}

export function createShutdownHandler(
  serviceName: string,
  shutdownFn: () => Promise<void>
): void {
  let shutdownInProgress = false;

  async function initiateShutdown(): Promise<void> {
    if (shutdownInProgress) {
      log.system.warn({ service: serviceName }, "shutdown already in progress, forcing exit");
      process.exit(1);
    }
    shutdownInProgress = true;

    log.system.info({ service: serviceName }, "shutting down");

    const forceExitTimer = setTimeout(() => {
      log.system.error({ service: serviceName }, "shutdown timeout exceeded, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    try {
      await shutdownFn();
      log.system.info({ service: serviceName }, "shutdown complete");
      process.exit(0);
    } catch (error) {
      log.system.error({ service: serviceName, error: errorMessage(error) }, "shutdown error");
      process.exit(1);
    }
  }

  process.on("SIGTERM", () => void initiateShutdown());
  process.on("SIGINT", () => void initiateShutdown());
}

// Service banner for dev
export function printBanner(serviceName: string, extras: Record<string, string | number> = {}): void {
  if (config.NODE_ENV !== "production") {
    const lines = [
      `  ${serviceName}`,
      `  Port: ${config.PORT}`,
      ...Object.entries(extras).map(([k, v]) => `  ${k}: ${v}`),
    ];

    console.log(`
========================================
${lines.join("\n")}
========================================
`);
  }
}
