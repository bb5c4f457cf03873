#!/usr/bin/env tsx
/**
 * Regenerate definitions for every category file and report coverage.
 *
 * Usage: npm run regenerate -- [dataDir] [--split] [--output-path DIR]
 */

import { join, resolve } from "node:path";

import { CONFIG_FILENAME, loadConfig } from "../src/config.js";
import { parseRegenerateArgs, regenerateCategories } from "./regenerate.js";

const ROOT = resolve(import.meta.dirname, "..");

try {
  const config = await loadConfig(join(ROOT, CONFIG_FILENAME));
  const args = parseRegenerateArgs(process.argv.slice(2), {
    dataDir: join(ROOT, "data"),
    outputDir: config.outputPath ?? join(ROOT, "definitions"),
  });

  console.log("=".repeat(60));
  console.log(`REGENERATING ALL CATEGORIES (${args.split ? "SPLIT" : "MERGED"} MODE)`);
  console.log("=".repeat(60));

  const result = await regenerateCategories({ ...args, config });

  for (const { path, message } of result.failures) {
    console.error(`  ERROR in ${path}: ${message}`);
  }
  if (result.failures.length > 0) process.exitCode = 1;

  const { summary } = result;
  console.log("\n" + "=".repeat(60));
  console.log(`FINAL SUMMARY: ${summary.found}/${summary.total} events are present in YAML files`);
  if (summary.total > 0) {
    console.log(`Coverage: ${summary.percentage.toFixed(1)}%`);
  }
  console.log("=".repeat(60));
} catch (error) {
  console.error("Regeneration failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
