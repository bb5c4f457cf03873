/**
 * Category files: one panel's event list plus bookkeeping counts.
 *
 * {
 *   "category": "center_panel",
 *   "description": "Center Panel",
 *   "events": ["CTR_PARK_GRD_LEFT_BUTTON_DOWN // present", { "event": "...", "unreliable": true }]
 * }
 */

import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { PRESENT_MARKER, entryName, stripPresentMarker } from "../core/entries.js";
import { titleCase } from "../core/labels.js";
import { formatZodIssues, parseJsonText } from "./json.js";

const overrideValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const eventEntrySchema = z.union([
  z.string(),
  z
    .object({
      event: z.string().min(1),
      type: z.string().optional(),
      unreliable: z.boolean().optional(),
      use_calculator: z.boolean().optional(),
      add_by: z.number().optional(),
      multiply_by: z.number().optional(),
      increment_by: z.number().optional(),
      cancel_h_events: z.boolean().optional(),
    })
    .catchall(overrideValueSchema),
]);

export const categoryDocumentSchema = z
  .object({
    category: z.string().min(1),
    description: z.string().optional(),
    events: z.array(eventEntrySchema),
    present_count: z.number().int().nonnegative().optional(),
    total_count: z.number().int().nonnegative().optional(),
  })
  .passthrough();

export type CategoryDocument = z.infer<typeof categoryDocumentSchema>;

/** Validate a parsed category document. */
export function parseCategoryDocument(raw: unknown, source: string): CategoryDocument {
  const result = categoryDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid category file ${source}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

/** Parse category JSON text. */
export function parseCategoryText(text: string, source: string): CategoryDocument {
  return parseCategoryDocument(parseJsonText(text, source), source);
}

export async function loadCategoryFile(path: string): Promise<CategoryDocument> {
  const text = await readFile(path, "utf-8");
  return parseCategoryText(text, path);
}

export async function writeCategoryFile(path: string, doc: CategoryDocument): Promise<void> {
  await writeFile(path, JSON.stringify(doc, null, 2) + "\n", "utf-8");
}

/** Description for headers; falls back to the title-cased category name. */
export function categoryDescription(doc: CategoryDocument): string {
  return doc.description ?? titleCase(doc.category.replace(/_/g, " "));
}

/** Copy of the document with every presence marker removed. */
export function clearCategoryMarkers(doc: CategoryDocument): CategoryDocument {
  const events = doc.events.map((entry) =>
    typeof entry === "string" ? stripPresentMarker(entry) : entry,
  );
  return { ...doc, events, present_count: 0, total_count: events.length };
}

/**
 * Copy of the document with the given events marked present.
 * Object entries keep their shape; only string entries carry the marker.
 */
export function markCategoryEvents(doc: CategoryDocument, names: Iterable<string>): CategoryDocument {
  const present = new Set(names);
  let presentCount = 0;

  const events = doc.events.map((entry) => {
    const name = entryName(entry);
    if (!present.has(name)) return typeof entry === "string" ? name : entry;
    presentCount++;
    return typeof entry === "string" ? `${name}${PRESENT_MARKER}` : entry;
  });

  return { ...doc, events, present_count: presentCount, total_count: events.length };
}
