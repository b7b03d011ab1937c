/**
 * SLO definitions from configuration.
 *
 * A custom set is a JSON array of objects:
 *   [{ "name": "availability", "sliName": "availability", "target": 99.9, "windowDays": 30 }]
 * It replaces the built-in set entirely.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import {
  DEFAULT_SLO_DEFINITIONS,
  SLI_NAMES,
  createSloDefinition,
} from "../domain/slo/index.js";
import type { SloDefinition } from "../domain/slo/index.js";
import { log } from "../logger.js";
import { SloConfigError, errorMessage } from "./errors.js";

export const sloDefinitionSchema = z.object({
  name: z.string().min(1),
  sliName: z.enum(SLI_NAMES),
  target: z.number().min(0).max(100),
  windowDays: z.number().positive(),
  description: z.string().optional(),
});

export const sloDefinitionsSchema = z
  .array(sloDefinitionSchema)
  .min(1)
  .refine((slos) => new Set(slos.map((slo) => slo.name)).size === slos.length, {
    message: "SLO names must be unique",
  });

/**
 * Validate already-parsed JSON into frozen SLO definitions.
 *
 * @param source - where the data came from, for error messages
 * @throws SloConfigError when validation fails
 */
export function parseSloDefinitions(raw: unknown, source: string = "input"): SloDefinition[] {
  const result = sloDefinitionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new SloConfigError(source, issues);
  }
  return result.data.map((input) => createSloDefinition(input));
}

/**
 * Load SLO definitions from `path`, or the built-in set when no path is given.
 *
 * @throws SloConfigError when the file is unreadable, not JSON, or invalid
 */
export async function loadSloDefinitions(path?: string): Promise<readonly SloDefinition[]> {
  if (path === undefined) {
    return DEFAULT_SLO_DEFINITIONS;
  }

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new SloConfigError(path, [`cannot read file: ${errorMessage(error)}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SloConfigError(path, [`invalid JSON: ${errorMessage(error)}`]);
  }

  const definitions = parseSloDefinitions(raw, path);
  log.slo.info({ path, slos: definitions.map((slo) => slo.name) }, "loaded SLO definitions");
  return definitions;
}
