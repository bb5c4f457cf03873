/**
 * Coverage checker — which checklist events already appear in generated output.
 */

import type { CoverageResult } from "../types.js";
import { PRESENT_MARKER, stripPresentMarker } from "./entries.js";

/** Percentage with one decimal place; an empty checklist is 0. */
export function coveragePercentage(found: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((found / total) * 1000) / 10;
}

/**
 * Check every checklist entry against the corpus text.
 *
 * Matching is an exact substring search on the entry name (markers are
 * stripped first). Blank entries are ignored. Pure: the checklist is not
 * modified.
 */
export function checkCoverage(checklist: readonly string[], corpus: string): CoverageResult {
  const entries = checklist
    .map(stripPresentMarker)
    .filter((event) => event.length > 0)
    .map((event) => ({ event, found: corpus.includes(event) }));

  const found = entries.filter((e) => e.found).length;
  return {
    entries,
    found,
    total: entries.length,
    percentage: coveragePercentage(found, entries.length),
  };
}

/**
 * Rewrite a checklist so found entries carry the presence marker and
 * missing ones do not. Entries are matched by name.
 */
export function markPresent(checklist: readonly string[], result: CoverageResult): string[] {
  const found = new Set(result.entries.filter((e) => e.found).map((e) => e.event));
  return checklist.map((entry) => {
    const name = stripPresentMarker(entry);
    return found.has(name) ? `${name}${PRESENT_MARKER}` : name;
  });
}

export interface CoverageSummary {
  found: number;
  total: number;
  percentage: number;
}

/** Totals across several checklists. */
export function summarizeCoverage(results: readonly CoverageResult[]): CoverageSummary {
  const found = results.reduce((sum, r) => sum + r.found, 0);
  const total = results.reduce((sum, r) => sum + r.total, 0);
  return { found, total, percentage: coveragePercentage(found, total) };
}
