/**
 * check_coverage MCP tool.
 *
 * Searches generated definition files for every event of a checklist and
 * reports which are still missing.
 */

import { checkCoverage } from "../core/coverage.js";
import { entryName } from "../core/entries.js";
import { markCategoryEvents, parseCategoryText, writeCategoryFile } from "../data/category-file.js";
import type { CoverageResult } from "../types.js";
import { resolveSource } from "../utils/resolve-source.js";

export interface CheckCoverageInput {
  checklist: string;
  corpus: string[];
  markPresent?: boolean;
}

export interface CheckCoverageResult {
  category: string;
  result: CoverageResult;
  /** Checklist file rewritten with presence markers */
  updatedFile?: string;
}

/**
 * Execute the coverage check. Every corpus source must be readable;
 * a missing file rejects the whole check.
 */
export async function executeCheckCoverage(input: CheckCoverageInput): Promise<CheckCoverageResult> {
  const source = await resolveSource(input.checklist);
  const doc = parseCategoryText(source.text, source.filePath ?? "inline checklist");

  const corpusParts = await Promise.all(input.corpus.map((c) => resolveSource(c)));
  const corpus = corpusParts.map((part) => part.text).join("\n");

  const result = checkCoverage(doc.events.map(entryName), corpus);

  let updatedFile: string | undefined;
  if (input.markPresent && source.filePath) {
    const found = result.entries.filter((e) => e.found).map((e) => e.event);
    await writeCategoryFile(source.filePath, markCategoryEvents(doc, found));
    updatedFile = source.filePath;
  }

  return { category: doc.category, result, updatedFile };
}

/**
 * Format the result as text for MCP response.
 */
export function formatCoverageResult(outcome: CheckCoverageResult): string {
  const { result } = outcome;
  const lines: string[] = [];

  lines.push(`# Coverage: ${outcome.category}`);
  lines.push(`Found: ${result.found}/${result.total} (${result.percentage.toFixed(1)}%)`);
  if (outcome.updatedFile) {
    lines.push(`Checklist updated: ${outcome.updatedFile}`);
  }
  lines.push("");

  const missing = result.entries.filter((e) => !e.found);
  if (missing.length === 0) {
    lines.push("All checklist events are present.");
    return lines.join("\n");
  }

  lines.push(`## Missing (${missing.length})`);
  for (const entry of missing) {
    lines.push(`  - ${entry.event}`);
  }
  return lines.join("\n");
}
