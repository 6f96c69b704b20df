import type { JsonObject, JsonValue } from "../utils/json";
import type { FieldSchema } from "./types";

function isNullString(value: JsonValue): boolean {
  return typeof value === "string" && value.trim().toLowerCase() === "null";
}

function cleanValue(value: JsonValue): JsonValue {
  if (isNullString(value)) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.map(cleanValue).filter((item) => item !== null);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, child]): [string, JsonValue] => [key, cleanValue(child)]),
    );
  }
  return value;
}

/**
 * Post-processes a parsed model response so that its shape does not depend on
 * what the model chose to emit:
 * - string `"null"` literals (any case, trimmed) become real nulls,
 * - nulls are dropped from arrays,
 * - every schema field is present at the top level, defaulting to null.
 */
export function normalizeExtractedData(raw: JsonObject, schema: FieldSchema): JsonObject {
  const entries = Object.entries(raw).map(([key, value]): [string, JsonValue] => [
    key,
    cleanValue(value),
  ]);
  const present = new Set(entries.map(([key]) => key));
  for (const field of Object.keys(schema)) {
    if (!present.has(field)) {
      entries.push([field, null]);
    }
  }
  // fromEntries defines own keys, so names such as `__proto__` stay plain data
  return Object.fromEntries(entries);
}

/**
 * Names of top-level fields whose value is null.
 */
export function nullFields(data: JsonObject): string[] {
  return Object.entries(data)
    .filter(([, value]) => value === null)
    .map(([key]) => key);
}
