/**
 * Shared source resolution utility.
 *
 * Tool inputs accept either inline content or a file path. A single line
 * ending in .json, .yaml or .yml is a path; anything else is content.
 */

import fs from "node:fs/promises";
import path from "node:path";

export interface ResolvedSource {
  text: string;
  filePath?: string;
}

const INLINE_PREFIXES = ["{", "[", "#", "shared:"];
const PATH_EXTENSION = /\.(?:json|ya?ml)$/i;

/** True when the source is content rather than a path. */
export function isInlineSource(source: string): boolean {
  const trimmed = source.trim();
  return (
    trimmed.includes("\n") ||
    INLINE_PREFIXES.some((prefix) => trimmed.startsWith(prefix)) ||
    !PATH_EXTENSION.test(trimmed)
  );
}

/**
 * Resolve a source string to its text content.
 * A path that cannot be read rejects with the path in the message.
 */
export async function resolveSource(source: string): Promise<ResolvedSource> {
  if (isInlineSource(source)) {
    return { text: source };
  }

  const filePath = path.resolve(source.trim());
  try {
    const text = await fs.readFile(filePath, "utf-8");
    return { text, filePath };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not read ${filePath}: ${msg}`);
  }
}
