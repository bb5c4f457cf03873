/**
 * YAML writer for generated controls.
 *
 * Emits the `shared:` list of a simulator definition file. Each control
 * opens with a `- # <label>` item; further definitions of the same control
 * follow as bare `-` items, and a blank line closes the control.
 */

import type { ControlDefinition, GeneratedControl, OverrideValue } from "../types.js";

export interface RenderOptions {
  /** Written in front of variable names, e.g. "L:" */
  variableScope: string;
}

export interface ModuleFileOptions extends RenderOptions {
  title: string;
  description: string;
  referenceLinks: readonly string[];
}

const ITEM_INDENT = "  ";
const FIELD_INDENT = "    ";

// Plain scalars YAML would read as something other than the same string.
const RESERVED_SCALAR = /^(?:true|false|yes|no|on|off|null|~)$/i;
const NUMERIC_SCALAR = /^[-+]?(?:\d|\.\d)/;
const INDICATOR_START = /^[-?:,[\]{}#&*!|>'"%@`]/;

function needsQuoting(value: string): boolean {
  return (
    value.length === 0 ||
    value !== value.trim() ||
    /[\n\r]/.test(value) ||
    RESERVED_SCALAR.test(value) ||
    NUMERIC_SCALAR.test(value) ||
    INDICATOR_START.test(value) ||
    value.includes(": ") ||
    value.includes(" #")
  );
}

/** Format a scalar the way the definition files write it. */
export function formatScalar(value: OverrideValue): string {
  if (typeof value !== "string") return String(value);
  return needsQuoting(value) ? JSON.stringify(value) : value;
}

function field(key: string, value: OverrideValue): string {
  return `${FIELD_INDENT}${key}: ${formatScalar(value)}`;
}

function definitionFields(def: ControlDefinition, scope: string): string[] {
  const lines = [field("type", def.type)];

  switch (def.kind) {
    case "event":
      lines.push(field("event_name", def.eventName));
      break;
    case "toggle":
      lines.push(field("var_name", `${scope}${def.variable.name}`));
      lines.push(field("var_units", "Bool"));
      lines.push(field("var_type", "bool"));
      lines.push(field("event_name", def.eventName));
      if (def.offEventName) lines.push(field("off_event_name", def.offEventName));
      break;
    case "increment":
      lines.push(field("var_name", `${scope}${def.variable.name}`));
      lines.push(field("var_units", "Number"));
      lines.push(field("var_type", "f64"));
      lines.push(field("up_event_name", def.upEventName));
      lines.push(field("down_event_name", def.downEventName));
      lines.push(field("increment_by", def.incrementBy));
      break;
  }

  for (const key of Object.keys(def.options).sort()) {
    lines.push(field(key, def.options[key]));
  }
  return lines;
}

function controlLines(control: GeneratedControl, options: RenderOptions): string[] {
  const lines: string[] = [];
  control.definitions.forEach((def, index) => {
    lines.push(index === 0 ? `${ITEM_INDENT}- # ${control.label}` : `${ITEM_INDENT}-`);
    lines.push(...definitionFields(def, options.variableScope));
  });
  lines.push("");
  return lines;
}

/** Entries of the `shared:` list, without the key itself. */
export function renderSharedEntries(
  controls: readonly GeneratedControl[],
  options: RenderOptions,
): string {
  const lines = controls.flatMap((control) => controlLines(control, options));
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines.join("\n");
}

/** A complete definition file: header comments, then the shared list. */
export function renderModuleFile(
  controls: readonly GeneratedControl[],
  options: ModuleFileOptions,
): string {
  const header = [
    `# ${options.title} ${options.description}`.trimEnd(),
    ...options.referenceLinks.map((link) => `# ${link}`),
    "",
  ];

  const entries = renderSharedEntries(controls, options);
  const body = entries ? ["shared:", entries] : ["shared: []"];
  return [...header, ...body].join("\n") + "\n";
}

/** Number of definitions per emitted type, e.g. { ToggleSwitch: 3, event: 12 }. */
export function countDefinitionTypes(controls: readonly GeneratedControl[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const control of controls) {
    for (const def of control.definitions) {
      counts[def.type] = (counts[def.type] ?? 0) + 1;
    }
  }
  return counts;
}
