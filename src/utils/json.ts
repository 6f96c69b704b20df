import { ParsingError } from "./errors";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Serialises a value with object keys sorted at every depth, so that two
 * structurally equal values always produce the same string.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === "object" && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const child: unknown = Reflect.get(value, key);
      if (child !== undefined) {
        sorted[key] = sortKeys(child);
      }
    }
    return sorted;
  }
  return value;
}

function tryParseObject(text: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Parses a model response that should be a JSON object. Falls back to the
 * outermost `{...}` block when the text carries prose or code fences.
 * @throws {ParsingError} If no JSON object can be recovered.
 */
export function parseJsonObject(text: string): JsonObject {
  const trimmed = text.trim();
  const direct = tryParseObject(trimmed);
  if (direct) {
    return direct;
  }

  const block = trimmed.match(/\{[\s\S]*\}/);
  if (block) {
    const salvaged = tryParseObject(block[0]);
    if (salvaged) {
      return salvaged;
    }
  }

  throw new ParsingError("response is not a valid JSON object", trimmed);
}
