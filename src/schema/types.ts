/**
 * Caller-supplied mapping from output field name to a type token such as
 * `string`, `number` or `array<url>`.
 */
export type FieldSchema = Record<string, string>;

export const SCALAR_FIELD_TYPES = [
  "string",
  "text",
  "number",
  "integer",
  "boolean",
  "array",
  "object",
  "date",
  "url",
  "email",
] as const;

export type ScalarFieldType = (typeof SCALAR_FIELD_TYPES)[number];

/**
 * Parsed form of a type token. A bare `array` token is an array of strings.
 */
export type FieldType =
  | { kind: "scalar"; name: Exclude<ScalarFieldType, "array"> }
  | { kind: "array"; items: FieldType };
