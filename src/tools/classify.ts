/**
 * classify_events MCP tool.
 *
 * Shows how each event name is classified and which control group it joins.
 */

import { classifyEvent } from "../core/classifier.js";
import { groupEvents } from "../core/grouping.js";

/**
 * Execute the classify_events tool.
 * @returns Markdown table of base, kind and role per event
 */
export function executeClassifyEvents(events: string[]): string {
  const names = events.map((e) => e.trim()).filter((e) => e.length > 0);
  const groups = groupEvents(names.map((name) => ({ name, overrides: {} })));

  const lines: string[] = [];
  lines.push("# Event Classification");
  lines.push(`${names.length} event(s) → ${groups.length} control group(s)`);
  lines.push("");
  lines.push("| Event | Base | Kind | Role |");
  lines.push("| --- | --- | --- | --- |");

  for (const name of names) {
    const { base, kind, role, qualifier } = classifyEvent(name);
    const kindCell = qualifier ? `${kind} (${qualifier})` : kind;
    lines.push(`| ${name} | ${base} | ${kindCell} | ${role} |`);
  }

  return lines.join("\n");
}
