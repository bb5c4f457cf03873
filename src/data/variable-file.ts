/**
 * Variable files: known simulator variables and their data kind.
 *
 * { "variables": { "MD11_APU_MASTER": "boolean", "MD11_PED_DU1_BRT_KB": "numeric" } }
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { VariableTable } from "../core/variable-table.js";
import { formatZodIssues, parseJsonText } from "./json.js";

export const variableDocumentSchema = z.object({
  variables: z.record(z.enum(["boolean", "numeric"])),
});

/** Build a table from parsed JSON, validating its shape. */
export function parseVariableDocument(raw: unknown, source: string, prefix?: string): VariableTable {
  const result = variableDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid variable file ${source}: ${formatZodIssues(result.error)}`);
  }
  return new VariableTable(result.data.variables, { prefix });
}

export function parseVariableText(text: string, source: string, prefix?: string): VariableTable {
  return parseVariableDocument(parseJsonText(text, source), source, prefix);
}

export async function loadVariableTable(path: string, prefix?: string): Promise<VariableTable> {
  const text = await readFile(path, "utf-8");
  return parseVariableText(text, path, prefix);
}
