/**
 * Type inference: turns a control group into its definitions.
 *
 * Strategy:
 *   1. Boolean variable + an on-trigger  → ToggleSwitch (off-trigger when present)
 *   2. Numeric variable + complete wheel → NumIncrement (step 1 unless overridden)
 *   3. Otherwise                         → one plain event per member
 *   4. Overrides win over inferred values
 */

import type {
  ControlDefinition,
  ControlGroup,
  ControlRole,
  DefinitionOptions,
  EventDefinition,
  EventOverrides,
  GeneratedControl,
  RawEvent,
  VariableRef,
} from "../types.js";
import { groupEvents } from "./grouping.js";
import { controlLabel } from "./labels.js";
import type { VariableTable } from "./variable-table.js";

export const DEFAULT_TYPES = {
  event: "event",
  toggle: "ToggleSwitch",
  increment: "NumIncrement",
} as const;

export const DEFAULT_INCREMENT_STEP = 1;

const ON_ROLES: readonly ControlRole[] = ["button_down", "switch_left", "ground_button"];
const OFF_ROLES: readonly ControlRole[] = ["button_up", "switch_right"];

/** Emission order of plain events within one control. */
const ROLE_ORDER: Record<ControlRole, number> = {
  button_down: 0,
  wheel_down: 0,
  switch_left: 0,
  button_up: 1,
  wheel_up: 1,
  switch_right: 2,
  ground_button: 3,
  standalone: 4,
};

/** Merge the overrides of every member; later members win on conflicts. */
export function mergeGroupOverrides(group: ControlGroup): EventOverrides {
  const merged: EventOverrides = {};
  for (const { event } of group.members) {
    Object.assign(merged, event.overrides);
  }
  return merged;
}

function findRole(group: ControlGroup, roles: readonly ControlRole[]): string | undefined {
  return group.members.find((m) => roles.includes(m.role))?.event.name;
}

/** Overrides that land on every definition as-is. */
function passThroughOptions(overrides: EventOverrides): DefinitionOptions {
  const options: DefinitionOptions = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (key === "type" || key === "increment_by" || value === undefined) continue;
    options[key] = value;
  }
  return options;
}

function plainEvents(group: ControlGroup, type: string, options: DefinitionOptions): EventDefinition[] {
  const ordered = group.members
    .map((member, index) => ({ member, index }))
    .sort((a, b) => ROLE_ORDER[a.member.role] - ROLE_ORDER[b.member.role] || a.index - b.index);

  const seen = new Set<string>();
  const definitions: EventDefinition[] = [];
  for (const { member } of ordered) {
    const eventName = member.event.name;
    if (seen.has(eventName)) continue;
    seen.add(eventName);
    definitions.push({ kind: "event", type, eventName, options: { ...options } });
  }
  return definitions;
}

function inferDefinitions(
  group: ControlGroup,
  variable: VariableRef,
  overrides: EventOverrides,
): ControlDefinition[] {
  const options = passThroughOptions(overrides);

  if (variable.kind === "boolean" && group.kind !== "wheel") {
    const on = findRole(group, ON_ROLES);
    if (on) {
      const off = findRole(group, OFF_ROLES);
      return [
        {
          kind: "toggle",
          type: overrides.type ?? DEFAULT_TYPES.toggle,
          variable,
          eventName: on,
          ...(off ? { offEventName: off } : {}),
          options,
        },
      ];
    }
  }

  if (variable.kind === "numeric" && group.kind === "wheel") {
    const up = findRole(group, ["wheel_up"]);
    const down = findRole(group, ["wheel_down"]);
    if (up && down) {
      return [
        {
          kind: "increment",
          type: overrides.type ?? DEFAULT_TYPES.increment,
          variable,
          upEventName: up,
          downEventName: down,
          incrementBy: overrides.increment_by ?? DEFAULT_INCREMENT_STEP,
          options,
        },
      ];
    }
  }

  return plainEvents(group, overrides.type ?? DEFAULT_TYPES.event, options);
}

/**
 * Infer the definitions of one control group.
 *
 * `overrides` defaults to the merged overrides of the group's members.
 * Keys that do not apply to the inferred kind are ignored.
 */
export function inferControl(
  group: ControlGroup,
  variables: VariableTable,
  overrides: EventOverrides = mergeGroupOverrides(group),
): GeneratedControl {
  const variable = variables.resolve(group.base);
  return {
    base: group.base,
    kind: group.kind,
    label: controlLabel(group.members[0]?.event.name ?? group.base),
    definitions: inferDefinitions(group, variable, overrides),
  };
}

/** Classify, group and infer a whole batch. */
export function generateControls(
  events: readonly RawEvent[],
  variables: VariableTable,
): GeneratedControl[] {
  return groupEvents(events).map((group) => inferControl(group, variables));
}
