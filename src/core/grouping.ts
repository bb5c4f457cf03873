/**
 * Grouping engine: collects classified events into one group per physical control.
 */

import type { ControlGroup, ControlKind, RawEvent } from "../types.js";
import { classifyEvent } from "./classifier.js";

/** Group key: a button and a switch with the same prefix stay apart. */
function groupKey(kind: ControlKind, base: string): string {
  return `${kind}:${base}`;
}

/**
 * Group raw events in a single pass.
 *
 * Output order follows the first appearance of each (kind, base) key in the
 * input. Every input event ends up in exactly one group.
 */
export function groupEvents(events: readonly RawEvent[]): ControlGroup[] {
  const groups = new Map<string, ControlGroup>();

  for (const event of events) {
    const { base, kind, role } = classifyEvent(event.name);
    const key = groupKey(kind, base);

    let group = groups.get(key);
    if (!group) {
      group = { base, kind, members: [] };
      groups.set(key, group);
    }
    group.members.push({ event, role });
  }

  return [...groups.values()];
}
