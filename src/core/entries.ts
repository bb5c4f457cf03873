/**
 * Input-side handling of category event entries.
 *
 * Entries are either plain names or `{ event, ...overrides }` objects.
 * A string entry ending in the presence marker was already confirmed by a
 * coverage run and is dropped before grouping.
 */

import type { EventEntry, EventOverrides, RawEvent } from "../types.js";

export const PRESENT_MARKER = " // present";

/** True when a string entry carries the presence marker. */
export function isMarkedPresent(entry: EventEntry): boolean {
  return typeof entry === "string" && entry.trimEnd().endsWith(PRESENT_MARKER.trim());
}

/** Remove the presence marker (and surrounding whitespace) from an entry name. */
export function stripPresentMarker(entry: string): string {
  const trimmed = entry.trim();
  const marker = PRESENT_MARKER.trim();
  return trimmed.endsWith(marker) ? trimmed.slice(0, -marker.length).trim() : trimmed;
}

/** Event name of an entry, without any presence marker. */
export function entryName(entry: EventEntry): string {
  return typeof entry === "string" ? stripPresentMarker(entry) : entry.event.trim();
}

/** Override fields of an entry (everything but `event`). */
export function entryOverrides(entry: EventEntry): EventOverrides {
  if (typeof entry === "string") return {};
  const { event: _event, ...overrides } = entry;
  return overrides;
}

/**
 * Convert category entries into a batch of raw events.
 *
 * Blank names are skipped and marked-present strings are filtered out.
 * Throws on a name that occurs twice in the batch.
 */
export function parseEventEntries(entries: readonly EventEntry[]): RawEvent[] {
  const events: RawEvent[] = [];
  const seen = new Set<string>();

  for (const entry of entries) {
    if (isMarkedPresent(entry)) continue;

    const name = entryName(entry);
    if (!name) continue;

    if (seen.has(name)) {
      throw new Error(
        `Duplicate event "${name}" in one batch. Remove the repeated entry or merge its overrides.`,
      );
    }
    seen.add(name);
    events.push({ name, overrides: entryOverrides(entry) });
  }

  return events;
}
