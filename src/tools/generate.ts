/**
 * MCP tool handler for generate_definitions.
 *
 * Follows the executeX + formatX pattern: execute returns structured data,
 * format renders the text response.
 */

import { dirname, resolve } from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import { DEFAULT_CONFIG, type GeneratorConfig } from "../config.js";
import { isMarkedPresent, parseEventEntries } from "../core/entries.js";
import { generateControls } from "../core/inference.js";
import { countDefinitionTypes, renderModuleFile } from "../core/serializer.js";
import { VariableTable } from "../core/variable-table.js";
import { categoryDescription, parseCategoryText } from "../data/category-file.js";
import { parseVariableText } from "../data/variable-file.js";
import type { GeneratedControl } from "../types.js";
import { resolveSource } from "../utils/resolve-source.js";

export interface GenerateDefinitionsInput {
  source: string;
  variables?: string;
  description?: string;
  variablePrefix?: string;
  outputPath?: string;
}

export interface GenerateDefinitionsResult {
  category: string;
  content: string;
  controls: GeneratedControl[];
  /** Events fed to the generator */
  eventCount: number;
  /** Entries skipped because they were marked present */
  skippedCount: number;
  typeCounts: Record<string, number>;
  writtenTo?: string;
}

/** Reject output paths that are not .yaml files or that climb directories. */
export function validateOutputPath(outputPath: string): string {
  if (!/\.ya?ml$/.test(outputPath)) {
    throw new Error("outputPath must end with .yaml or .yml");
  }
  if (outputPath.includes("..")) {
    throw new Error("outputPath must not contain path traversal (..)");
  }
  return resolve(outputPath);
}

/**
 * Execute definition generation for one category.
 */
export async function executeGenerateDefinitions(
  input: GenerateDefinitionsInput,
  config: GeneratorConfig = DEFAULT_CONFIG,
): Promise<GenerateDefinitionsResult> {
  const prefix = input.variablePrefix ?? config.variablePrefix;

  const source = await resolveSource(input.source);
  const doc = parseCategoryText(source.text, source.filePath ?? "inline category");

  let variables = new VariableTable({}, { prefix });
  if (input.variables) {
    const varSource = await resolveSource(input.variables);
    variables = parseVariableText(varSource.text, varSource.filePath ?? "inline variables", prefix);
  }

  const events = parseEventEntries(doc.events);
  const controls = generateControls(events, variables);
  const content = renderModuleFile(controls, {
    title: config.title,
    description: input.description ?? categoryDescription(doc),
    referenceLinks: config.referenceLinks,
    variableScope: config.variableScope,
  });

  let writtenTo: string | undefined;
  if (input.outputPath) {
    const resolved = validateOutputPath(input.outputPath);
    await mkdir(dirname(resolved), { recursive: true });
    await writeFile(resolved, content, "utf-8");
    writtenTo = resolved;
  }

  return {
    category: doc.category,
    content,
    controls,
    eventCount: events.length,
    skippedCount: doc.events.filter(isMarkedPresent).length,
    typeCounts: countDefinitionTypes(controls),
    writtenTo,
  };
}

/**
 * Format the result as text for MCP response.
 */
export function formatGenerateResult(result: GenerateDefinitionsResult): string {
  const lines: string[] = [];

  if (result.writtenTo) {
    lines.push(`FILE WRITTEN SUCCESSFULLY to: ${result.writtenTo}`);
    lines.push("");
  }

  lines.push(
    `Generated definitions for ${result.category}: ${result.eventCount} event(s) → ` +
      `${result.controls.length} control(s), ${result.skippedCount} skipped as present.`,
  );
  for (const [type, count] of Object.entries(result.typeCounts)) {
    lines.push(`  - ${type}: ${count}`);
  }
  lines.push("");

  lines.push("```yaml");
  lines.push(result.content.trimEnd());
  lines.push("```");

  return lines.join("\n");
}
