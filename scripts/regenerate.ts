/**
 * Regeneration pipeline used by regenerate-all.ts.
 *
 * 1. Clear " // present" markers from every category file and write it back
 * 2. Generate one YAML file per category (split) or a single merged file
 * 3. Check every category against the written output and mark found events
 */

import { existsSync } from "node:fs";
import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";

import type { GeneratorConfig } from "../src/config.js";
import { checkCoverage, summarizeCoverage, type CoverageSummary } from "../src/core/coverage.js";
import { entryName, parseEventEntries } from "../src/core/entries.js";
import { generateControls } from "../src/core/inference.js";
import { countDefinitionTypes, renderModuleFile } from "../src/core/serializer.js";
import { VariableTable } from "../src/core/variable-table.js";
import {
  categoryDescription,
  clearCategoryMarkers,
  loadCategoryFile,
  markCategoryEvents,
  writeCategoryFile,
  type CategoryDocument,
} from "../src/data/category-file.js";
import { loadVariableTable } from "../src/data/variable-file.js";
import type { CoverageResult, GeneratedControl } from "../src/types.js";

export const VARIABLES_FILE = "variables.json";

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

export interface RegenerateArgs {
  dataDir: string;
  outputDir: string;
  split: boolean;
}

/**
 * Parse `[dataDir] [--split] [--output-path|--output DIR]`.
 * Directories resolve against the working directory.
 */
export function parseRegenerateArgs(
  args: readonly string[],
  defaults: { dataDir: string; outputDir: string },
): RegenerateArgs {
  let outputDir = defaults.outputDir;
  let dataDir: string | undefined;
  let split = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--split") {
      split = true;
    } else if (arg === "--output-path" || arg === "--output") {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`${arg} requires a directory argument`);
      }
      outputDir = value;
      i++;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option ${arg}. Available: --split, --output-path, --output`);
    } else {
      dataDir ??= arg;
    }
  }

  return { dataDir: resolve(dataDir ?? defaults.dataDir), outputDir: resolve(outputDir), split };
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface RegenerateOptions extends RegenerateArgs {
  config: GeneratorConfig;
  log?: (line: string) => void;
  warn?: (line: string) => void;
}

export interface CategoryOutcome {
  path: string;
  category: string;
  coverage: CoverageResult;
}

export interface RegenerateResult {
  /** Definition files written, in write order */
  written: string[];
  categories: CategoryOutcome[];
  failures: { path: string; message: string }[];
  summary: CoverageSummary;
}

async function loadVariables(options: RegenerateOptions): Promise<VariableTable> {
  const { config, dataDir, log = console.log, warn = console.error } = options;
  const path = join(dataDir, VARIABLES_FILE);
  if (!existsSync(path)) {
    warn(`Warning: ${VARIABLES_FILE} not found at ${path}`);
    return new VariableTable({}, { prefix: config.variablePrefix });
  }
  const variables = await loadVariableTable(path, config.variablePrefix);
  log(`Loaded ${variables.size} variables from ${VARIABLES_FILE}`);
  return variables;
}

/** Category files of a data directory, sorted by name. */
export async function listCategoryFiles(dataDir: string): Promise<string[]> {
  return (await readdir(dataDir))
    .filter((name) => name.endsWith(".json") && name !== VARIABLES_FILE)
    .sort()
    .map((name) => join(dataDir, name));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the whole pipeline over a data directory. A category that fails to load
 * or generate is reported in `failures`; the others still run.
 */
export async function regenerateCategories(options: RegenerateOptions): Promise<RegenerateResult> {
  const { config, outputDir, split, log = console.log } = options;
  const failures: RegenerateResult["failures"] = [];

  const variables = await loadVariables(options);

  // Every readable category is written back without markers before generation.
  const cleared: { path: string; doc: CategoryDocument }[] = [];
  for (const path of await listCategoryFiles(options.dataDir)) {
    try {
      const doc = clearCategoryMarkers(await loadCategoryFile(path));
      await writeCategoryFile(path, doc);
      cleared.push({ path, doc });
    } catch (error) {
      failures.push({ path, message: errorMessage(error) });
    }
  }
  log(`Cleared markers in ${cleared.length} category file(s)`);

  await mkdir(outputDir, { recursive: true });
  const written: string[] = [];
  const merged: GeneratedControl[] = [];

  for (const { path, doc } of cleared) {
    try {
      const events = parseEventEntries(doc.events);
      if (events.length === 0) {
        log(`  Skipping ${doc.category} (no events)`);
        continue;
      }

      const controls = generateControls(events, variables);
      const countText = Object.entries(countDefinitionTypes(controls))
        .map(([type, n]) => `${n} ${type}`)
        .join(", ");
      log(`  Generated: ${doc.category} (${events.length} events: ${countText})`);

      if (!split) {
        merged.push(...controls);
        continue;
      }

      const file = join(outputDir, `${doc.category}.yaml`);
      await writeFile(
        file,
        renderModuleFile(controls, {
          title: config.title,
          description: categoryDescription(doc),
          referenceLinks: config.referenceLinks,
          variableScope: config.variableScope,
        }),
        "utf-8",
      );
      written.push(file);
    } catch (error) {
      failures.push({ path, message: errorMessage(error) });
    }
  }

  if (!split) {
    const file = join(outputDir, `${config.title}.yaml`);
    await writeFile(
      file,
      renderModuleFile(merged, {
        title: config.title,
        description: "Definitions",
        referenceLinks: config.referenceLinks,
        variableScope: config.variableScope,
      }),
      "utf-8",
    );
    written.push(file);
    log(`Merged ${cleared.length} categories into ${file}`);
  }

  const corpus = (await Promise.all(written.map((f) => readFile(f, "utf-8")))).join("\n");
  const categories: CategoryOutcome[] = [];

  for (const { path, doc } of cleared) {
    const coverage = checkCoverage(doc.events.map(entryName), corpus);
    const found = coverage.entries.filter((e) => e.found).map((e) => e.event);
    await writeCategoryFile(path, markCategoryEvents(doc, found));
    categories.push({ path, category: doc.category, coverage });
    log(`  ${doc.category}: ${coverage.found}/${coverage.total} events present`);
  }

  return {
    written,
    categories,
    failures,
    summary: summarizeCoverage(categories.map((c) => c.coverage)),
  };
}
