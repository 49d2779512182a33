import type { JsonValue } from "../contracts/json";
import type { Outcome } from "../contracts/error";

const FENCE = "```";

/** Body of the first fenced block, or the text itself when it does not open with a fence. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith(FENCE)) return trimmed;
  const body: string[] = [];
  let inBlock = false;
  for (const line of trimmed.split("\n")) {
    if (line.startsWith(FENCE)) {
      if (inBlock) break;
      inBlock = true;
      continue;
    }
    if (inBlock) body.push(line);
  }
  return body.join("\n");
}

/**
 * Pulls a JSON object out of free-form model output: fence stripped, then
 * the span from the first `{` to the last `}` parsed.
 */
export function extractJsonObject(text: string): Outcome<{ [key: string]: JsonValue }> {
  const body = stripCodeFence(text);
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end < start) {
    return { ok: false, error: "No JSON object found in response" };
  }
  let data: JsonValue;
  try {
    data = JSON.parse(body.slice(start, end + 1));
  } catch (error) {
    return { ok: false, error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return { ok: false, error: "Response must be a JSON object" };
  }
  return { ok: true, value: data };
}
