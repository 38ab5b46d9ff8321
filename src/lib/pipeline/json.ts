/**
 * Recover the JSON object a model wrapped in prose or a ```json fence.
 *
 * Only locates and parses the first top-level object; anything else is the
 * caller's validation problem.
 */

export type JsonParseResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: "no_object" | "invalid_json"; detail: string };

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * First balanced `{...}` substring of the text, ignoring braces inside
 * string literals. Fenced blocks are searched first.
 */
export function extractFirstJsonObjectFromText(text: string): string | null {
  const fenced = text.match(FENCE_PATTERN);
  const raw = fenced ? fenced[1] : text;
  const start = raw.indexOf("{");
  if (start < 0) return fenced ? extractFirstJsonObjectFromText(text.replace(FENCE_PATTERN, "")) : null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];

    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
      continue;
    }
    if (ch === "{") depth++;
    if (ch === "}") depth--;
    if (depth === 0) return raw.slice(start, i + 1);
  }

  return null;
}

export function parseFirstJsonObject(text: string): JsonParseResult {
  const jsonStr = extractFirstJsonObjectFromText(text);
  if (!jsonStr) {
    return { ok: false, reason: "no_object", detail: "response contains no JSON object" };
  }
  try {
    const value: unknown = JSON.parse(jsonStr);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, reason: "invalid_json", detail: err instanceof Error ? err.message : String(err) };
  }
}
