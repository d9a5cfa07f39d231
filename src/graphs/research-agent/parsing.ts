/**
 * Best-effort parsing of structured (JSON) replies from the text generator.
 *
 * Precedence:
 *   1. Strip a ```json fence, else the first plain ``` fence.
 *   2. `JSON.parse` the stripped text.
 *   3. Otherwise try the outermost `{...}` span of the raw reply.
 *   4. Validate the decoded value against the caller's zod schema.
 *
 * Nothing here throws: callers get a tagged outcome and apply their own
 * fallback value.
 */

import type { z } from "zod";

export type ParseOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

const JSON_FENCE = "```json";
const PLAIN_FENCE = "```";

/** Regex for the outermost brace-delimited span in freeform text. */
const BRACE_SPAN_RE = /\{[\s\S]*\}/;

/**
 * Remove code-fence markers around a reply.
 *
 * @example
 *   stripCodeFences("```json\n{\"a\":1}\n```") // → '{"a":1}'
 *   stripCodeFences("plain")                  // → "plain"
 */
export function stripCodeFences(text: string): string {
  if (text.includes(JSON_FENCE)) {
    const afterMarker = text.split(JSON_FENCE)[1] ?? "";
    return (afterMarker.split(PLAIN_FENCE)[0] ?? "").trim();
  }
  if (text.includes(PLAIN_FENCE)) {
    return (text.split(PLAIN_FENCE)[1] ?? "").trim();
  }
  return text.trim();
}

/**
 * Decode the JSON payload of a reply. Returns `null` when none is found.
 */
export function extractJson(text: string): unknown {
  if (!text) return null;

  try {
    return JSON.parse(stripCodeFences(text));
  } catch {
    // Fall through to brace extraction.
  }

  const match = BRACE_SPAN_RE.exec(text);
  if (match) {
    try {
      return JSON.parse(match[0]);
    } catch {
      return null;
    }
  }
  return null;
}

/**
 * Parse a reply into the shape described by `schema`.
 */
export function parseStructuredReply<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
): ParseOutcome<z.output<S>> {
  const decoded = extractJson(text);
  if (decoded === null) {
    return { ok: false, reason: "reply contained no JSON payload" };
  }

  const result = schema.safeParse(decoded);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    return {
      ok: false,
      reason: `reply did not match the expected shape${where}: ${issue?.message ?? "invalid"}`,
    };
  }
  return { ok: true, value: result.data };
}
