/**
 * Event classifier — derives the control role and base identifier of an event name.
 *
 * Rules are tried in order, most specific first, because one name can match
 * several patterns (a ground button also ends in _LEFT_BUTTON_DOWN).
 *   1. Ground button        X_GRD_LEFT_BUTTON_DOWN     → base X_GRD
 *   2. Brightness wheel     X_BRT_KB_WHEEL_UP|DOWN     → base X_BRT_KB
 *   3. Wheel                X_WHEEL_UP|DOWN            → base X
 *   4. Switch right         X_SW_RIGHT_BUTTON_DOWN     → base X (joins the left press)
 *   5. Switch left          X_SW_LEFT_BUTTON_DOWN      → base X
 *   6. Button               X_LEFT_BUTTON_DOWN|UP      → base X
 *   7. Anything else is a standalone event named after itself.
 */

import type { Classification, ControlKind, ControlRole } from "../types.js";

interface ClassifierRule {
  pattern: RegExp;
  kind: ControlKind;
  /** Role from the direction capture (group 2), when the pattern has one. */
  role: (direction: string | undefined) => ControlRole;
  qualifier?: string;
}

const wheelRole = (direction: string | undefined): ControlRole =>
  direction === "UP" ? "wheel_up" : "wheel_down";

export const CLASSIFIER_RULES: readonly ClassifierRule[] = [
  {
    pattern: /^(.+_GRD)_LEFT_BUTTON_DOWN$/,
    kind: "ground_button",
    role: () => "ground_button",
  },
  {
    pattern: /^(.+_BRT_KB)_WHEEL_(UP|DOWN)$/,
    kind: "wheel",
    role: wheelRole,
    qualifier: "BRT",
  },
  {
    pattern: /^(.+)_WHEEL_(UP|DOWN)$/,
    kind: "wheel",
    role: wheelRole,
  },
  {
    pattern: /^(.+)_SW_RIGHT_BUTTON_DOWN$/,
    kind: "switch",
    role: () => "switch_right",
  },
  {
    pattern: /^(.+)_SW_LEFT_BUTTON_DOWN$/,
    kind: "switch",
    role: () => "switch_left",
  },
  {
    pattern: /^(.+)_LEFT_BUTTON_(DOWN|UP)$/,
    kind: "button",
    role: (direction) => (direction === "UP" ? "button_up" : "button_down"),
  },
];

/**
 * Classify one event name. Never fails: names matching no rule become
 * standalone events whose base is the whole name.
 */
export function classifyEvent(name: string): Classification {
  for (const rule of CLASSIFIER_RULES) {
    const match = rule.pattern.exec(name);
    if (!match) continue;

    const classification: Classification = {
      base: match[1],
      kind: rule.kind,
      role: rule.role(match[2]),
    };
    if (rule.qualifier) classification.qualifier = rule.qualifier;
    return classification;
  }

  return { base: name, kind: "standalone", role: "standalone" };
}
