import { SchemaValidationError } from "../utils/errors";
import {
  type FieldSchema,
  type FieldType,
  SCALAR_FIELD_TYPES,
  type ScalarFieldType,
} from "./types";

const ARRAY_TYPE_PATTERN = /^array\s*<(.+)>$/;

/** Human-readable list of accepted type tokens, used in error messages. */
export const SUPPORTED_TYPES_DESCRIPTION = [...SCALAR_FIELD_TYPES, "array<T>"].join(", ");

function isScalarFieldType(token: string): token is ScalarFieldType {
  return SCALAR_FIELD_TYPES.some((type) => type === token);
}

/**
 * Parses a type token (case and surrounding whitespace ignored).
 * Returns undefined for tokens outside the supported set.
 */
export function parseFieldType(token: string): FieldType | undefined {
  const normalized = token.trim().toLowerCase();

  const arrayMatch = normalized.match(ARRAY_TYPE_PATTERN);
  if (arrayMatch) {
    const items = parseFieldType(arrayMatch[1]);
    return items ? { kind: "array", items } : undefined;
  }

  if (!isScalarFieldType(normalized)) {
    return undefined;
  }
  if (normalized === "array") {
    return { kind: "array", items: { kind: "scalar", name: "string" } };
  }
  return { kind: "scalar", name: normalized };
}

export function isSupportedFieldType(token: string): boolean {
  return parseFieldType(token) !== undefined;
}

/**
 * Checks that the schema is usable for extraction.
 * @throws {SchemaValidationError} Naming the offending field and the allowed types
 */
export function validateFieldSchema(schema: FieldSchema): void {
  const entries = Object.entries(schema);
  if (entries.length === 0) {
    throw new SchemaValidationError("Schema cannot be empty");
  }

  for (const [field, type] of entries) {
    if (field.trim() === "") {
      throw new SchemaValidationError("Schema field names cannot be empty");
    }
    if (typeof type !== "string" || type.trim() === "") {
      throw new SchemaValidationError(
        `Schema field type cannot be empty for field "${field}"`,
        field,
      );
    }
    if (!isSupportedFieldType(type)) {
      throw new SchemaValidationError(
        `Unsupported schema type "${type}" for field "${field}". Supported types: ${SUPPORTED_TYPES_DESCRIPTION}`,
        field,
      );
    }
  }
}

/**
 * Trims field names (keeping their case) and trims and lower-cases type tokens.
 */
export function normalizeFieldSchema(schema: FieldSchema): FieldSchema {
  const normalized: FieldSchema = {};
  for (const [field, type] of Object.entries(schema)) {
    normalized[field.trim()] = type.trim().toLowerCase();
  }
  return normalized;
}

/**
 * Validates the schema, then returns its normalized form. Field names that
 * collide after trimming are rejected.
 */
export function validateAndNormalizeFieldSchema(schema: FieldSchema): FieldSchema {
  validateFieldSchema(schema);
  const normalized = normalizeFieldSchema(schema);
  if (Object.keys(normalized).length !== Object.keys(schema).length) {
    throw new SchemaValidationError("Schema field names must be unique after trimming");
  }
  return normalized;
}

/**
 * Renders the schema as the JSON-like block shown to completion models.
 */
export function describeFieldSchema(schema: FieldSchema): string {
  const lines = Object.entries(schema).map(([field, type]) => `  "${field}": "${type}"`);
  return `{\n${lines.join(",\n")}\n}`;
}
