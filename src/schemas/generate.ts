/**
 * Zod schemas for generate_definitions tool parameters.
 */

import { z } from "zod";

export const generateDefinitionsSchema = {
  source: z
    .string()
    .min(1)
    .describe(
      "Path to a category .json file, or raw category JSON " +
        '({ "category": "...", "events": [...] }). Entries marked " // present" are skipped.',
    ),
  variables: z
    .string()
    .optional()
    .describe(
      "Path to a variables .json file, or raw JSON " +
        '({ "variables": { "MD11_APU_MASTER": "boolean" } }). Without it every control becomes a plain event.',
    ),
  description: z
    .string()
    .optional()
    .describe("Header description. Defaults to the category description."),
  variablePrefix: z
    .string()
    .optional()
    .describe("Variable naming prefix. Defaults to the configured prefix (MD11_)."),
  outputPath: z
    .string()
    .optional()
    .describe(
      "Optional path of a .yaml file to write; relative paths resolve against the working directory. " +
        "The YAML content is always returned in the response regardless.",
    ),
};
