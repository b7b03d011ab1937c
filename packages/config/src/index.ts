import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Optional positive number from an env var.
 * Empty strings are treated as unset so `FOO=` in a .env file doesn't fail parsing.
 */
const optionalPositiveNumber = z
  .union([z.number(), z.string()])
  .optional()
  .transform((val) => (val === "" || val === undefined ? undefined : Number(val)))
  .pipe(z.number().positive().optional());

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  SERVICE_NAME: z.string().min(1).default("steadyline-monitor"),

  // ===========================================================================
  // Server
  // ===========================================================================
  PORT: z.coerce.number().int().min(1).max(65535).default(6001),
  HOST: z.string().default("0.0.0.0"),

  // ===========================================================================
  // Circuit Breakers
  // Defaults for breakers created without explicit settings
  // ===========================================================================
  CIRCUIT_FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(5),
  CIRCUIT_RECOVERY_TIMEOUT_MS: z.coerce.number().int().min(1).default(60_000),

  // ===========================================================================
  // SLIs / SLOs
  // ===========================================================================
  /** Requests faster than this count towards the latency SLI */
  SLI_LATENCY_THRESHOLD_MS: z.coerce.number().positive().default(200),
  /** Budget is critical once less than this fraction of it remains */
  ERROR_BUDGET_CRITICAL_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  /** How long hourly request buckets are kept. Defaults to the longest SLO window. */
  METRICS_RETENTION_DAYS: optionalPositiveNumber,
  /** JSON file with custom SLO definitions (replaces the built-in set) */
  SLO_CONFIG_PATH: z.string().min(1).optional(),
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}

/** Singleton config instance */
export const config = loadConfig();
