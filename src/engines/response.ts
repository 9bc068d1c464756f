import { MalformedResponseError } from "../errors.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  if (!isRecord(value) || !Object.hasOwn(value, key)) return undefined;
  return value[key];
}

function first(value: unknown): unknown {
  if (!Array.isArray(value) || value.length === 0) return undefined;
  const head: unknown = value[0];
  return head;
}

/**
 * Pulls the generated text out of a `generateContent` response.
 *
 * Only `candidates[0].content.parts[0].text` is read; any further candidates
 * or parts are ignored. Throws {@link MalformedResponseError} on the first
 * missing or mistyped link.
 */
export function extractText(response: unknown): string {
  const candidate = first(field(response, "candidates"));
  const part = first(field(field(candidate, "content"), "parts"));
  const text = field(part, "text");

  if (typeof text !== "string") {
    throw new MalformedResponseError(response);
  }

  return text.trim();
}
