/**
 * Core types for event classification, grouping and definition output.
 */

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

/** Scalar value an override may carry. */
export type OverrideValue = string | number | boolean;

/** Caller-supplied data that takes precedence over inferred values. */
export interface EventOverrides {
  /** Replaces the emitted definition type, e.g. "NumSet" */
  type?: string;
  unreliable?: boolean;
  use_calculator?: boolean;
  add_by?: number;
  multiply_by?: number;
  /** Step size, only honoured on increment definitions */
  increment_by?: number;
  cancel_h_events?: boolean;
  [key: string]: OverrideValue | undefined;
}

/** Event entry as written in a category file: a name or an object with overrides. */
export type EventEntry = string | ({ event: string } & EventOverrides);

/** One named event of an input batch. */
export interface RawEvent {
  name: string;
  overrides: EventOverrides;
}

// ---------------------------------------------------------------------------
// Classification & grouping
// ---------------------------------------------------------------------------

/** Physical interaction category of a control. */
export type ControlKind = "button" | "switch" | "wheel" | "ground_button" | "standalone";

/** Part an event plays within its control. */
export type ControlRole =
  | "button_down"
  | "button_up"
  | "wheel_up"
  | "wheel_down"
  | "switch_left"
  | "switch_right"
  | "ground_button"
  | "standalone";

export interface Classification {
  /** Normalized prefix shared by every event of one physical control */
  base: string;
  kind: ControlKind;
  role: ControlRole;
  /** Sub-control marker kept in the base, e.g. "BRT" for brightness wheels */
  qualifier?: string;
}

export interface GroupMember {
  event: RawEvent;
  role: ControlRole;
}

/** Events that belong to one logical control, keyed by (kind, base). */
export interface ControlGroup {
  base: string;
  kind: ControlKind;
  members: GroupMember[];
}

// ---------------------------------------------------------------------------
// Variables
// ---------------------------------------------------------------------------

export type VariableKind = "boolean" | "numeric" | "unknown";

export interface VariableRef {
  /** Identifier without scope, e.g. "MD11_APU_MASTER" */
  name: string;
  kind: VariableKind;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

/** Overrides that travel onto a definition unchanged. */
export type DefinitionOptions = Record<string, OverrideValue>;

export interface EventDefinition {
  kind: "event";
  type: string;
  eventName: string;
  options: DefinitionOptions;
}

export interface ToggleDefinition {
  kind: "toggle";
  type: string;
  variable: VariableRef;
  /** Fires to switch on */
  eventName: string;
  /** Fires to switch off; absent for on-only toggles */
  offEventName?: string;
  options: DefinitionOptions;
}

export interface IncrementDefinition {
  kind: "increment";
  type: string;
  variable: VariableRef;
  upEventName: string;
  downEventName: string;
  incrementBy: number;
  options: DefinitionOptions;
}

export type ControlDefinition = EventDefinition | ToggleDefinition | IncrementDefinition;

/** Definitions produced from one ControlGroup. */
export interface GeneratedControl {
  base: string;
  kind: ControlKind;
  /** Readable name written as the entry comment */
  label: string;
  definitions: ControlDefinition[];
}

// ---------------------------------------------------------------------------
// Coverage
// ---------------------------------------------------------------------------

export interface CoverageEntry {
  event: string;
  found: boolean;
}

export interface CoverageResult {
  entries: CoverageEntry[];
  found: number;
  total: number;
  /** found / total in percent, one decimal place */
  percentage: number;
}
