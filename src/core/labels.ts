/**
 * Readable control names for entry comments.
 */

// Panel token, then the control name up to its type marker.
const CONTROL_NAME = /^[^_]+_(.+?)_(?:BT|SW|KB|GRD)_/;

/** Capitalize the first letter of every word (letters after non-letters). */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

/**
 * Label for the control an event belongs to.
 *
 * "OVHD_APU_MASTER_BT_LEFT_BUTTON_DOWN" → "Apu Master". Names without a
 * panel token or type marker are returned unchanged.
 */
export function controlLabel(eventName: string): string {
  const match = CONTROL_NAME.exec(eventName);
  if (!match) return eventName;
  return titleCase(match[1].replace(/_/g, " "));
}
