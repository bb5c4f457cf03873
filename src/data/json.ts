/**
 * Shared JSON/zod helpers for data documents.
 */

import type { ZodError } from "zod";

/** Parse JSON text, naming the source on failure. */
export function parseJsonText(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not parse JSON from ${source}: ${msg}`);
  }
}

/** One line per issue: "events.3: Expected string, received number". */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
