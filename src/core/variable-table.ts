/**
 * Immutable table of known simulator variables and their data kind.
 */

import type { VariableKind, VariableRef } from "../types.js";

export const DEFAULT_VARIABLE_PREFIX = "MD11_";

export interface VariableTableOptions {
  /** Prepended to a control's base identifier to name its variable. */
  prefix?: string;
}

export class VariableTable {
  readonly prefix: string;
  private readonly kinds: ReadonlyMap<string, Exclude<VariableKind, "unknown">>;

  constructor(
    entries: Record<string, Exclude<VariableKind, "unknown">> = {},
    options: VariableTableOptions = {},
  ) {
    this.prefix = options.prefix ?? DEFAULT_VARIABLE_PREFIX;
    this.kinds = new Map(Object.entries(entries));
  }

  get size(): number {
    return this.kinds.size;
  }

  /** Kind of an identifier; absent identifiers are "unknown". */
  lookup(name: string): VariableKind {
    return this.kinds.get(name) ?? "unknown";
  }

  /** Candidate variable of a control base identifier, with its kind. */
  resolve(base: string): VariableRef {
    const name = `${this.prefix}${base}`;
    return { name, kind: this.lookup(name) };
  }
}
