/**
 * Zod schemas for check_coverage tool parameters.
 */

import { z } from "zod";

export const checkCoverageSchema = {
  checklist: z
    .string()
    .min(1)
    .describe("Path to a category .json file, or raw category JSON."),
  corpus: z
    .array(z.string().min(1))
    .min(1)
    .describe("Generated definition files to search: .yaml or .yml paths, or raw YAML text."),
  markPresent: z
    .boolean()
    .default(false)
    .describe(
      'Rewrite the checklist file so found events end in " // present". ' +
        "Only applies when checklist is a file path.",
    ),
};
