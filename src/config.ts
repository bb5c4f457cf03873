/**
 * Generator configuration.
 *
 * Read from `generator.config.json` in the working directory when present;
 * every field has a default, and tool parameters override the file.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { formatZodIssues, parseJsonText } from "./data/json.js";

export const CONFIG_FILENAME = "generator.config.json";

export const generatorConfigSchema = z.object({
  variablePrefix: z
    .string()
    .default("MD11_")
    .describe("Prepended to a control's base identifier to name its variable."),
  variableScope: z
    .string()
    .default("L:")
    .describe("Scope written in front of variable names in var_name fields."),
  title: z.string().default("MD-11").describe("Aircraft name used in file headers."),
  referenceLinks: z
    .array(z.string())
    .default([])
    .describe("Documentation links written as header comments."),
  outputPath: z
    .string()
    .optional()
    .describe("Default directory for generated definition files."),
});

export type GeneratorConfig = z.infer<typeof generatorConfigSchema>;

export const DEFAULT_CONFIG: GeneratorConfig = generatorConfigSchema.parse({});

/** Validate a raw config object, naming the offending fields on failure. */
export function parseConfig(raw: unknown, source = CONFIG_FILENAME): GeneratorConfig {
  const result = generatorConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid configuration in ${source}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load the configuration file. A missing file yields the defaults;
 * a file that is not valid JSON or fails validation throws.
 */
export async function loadConfig(
  path: string = resolve(process.cwd(), CONFIG_FILENAME),
): Promise<GeneratorConfig> {
  if (!existsSync(path)) return DEFAULT_CONFIG;

  const text = await readFile(path, "utf-8");
  return parseConfig(parseJsonText(text, path), path);
}
