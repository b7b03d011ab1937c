/**
 * App configuration.
 * The schema lives in @steadyline/config so other workspaces share one source of truth.
 */
export { config, configSchema, loadConfig, resetConfig } from "@steadyline/config";
export type { Config } from "@steadyline/config";
