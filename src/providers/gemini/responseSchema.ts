import { type Schema, Type } from "@google/genai";
import {
  type FieldSchema,
  type FieldType,
  parseFieldType,
  validateAndNormalizeFieldSchema,
} from "../../schema";
import { SchemaValidationError } from "../../utils/errors";

export const OBJECT_FIELD_DESCRIPTION = "Complex object data as JSON string or structured text";

/**
 * Maps one field type onto Gemini's schema dialect. Objects become strings
 * because Gemini rejects object schemas without declared properties.
 */
export function fieldTypeToSchema(type: FieldType): Schema {
  if (type.kind === "array") {
    return { type: Type.ARRAY, items: fieldTypeToSchema(type.items) };
  }

  switch (type.name) {
    case "number":
      return { type: Type.NUMBER };
    case "integer":
      return { type: Type.INTEGER };
    case "boolean":
      return { type: Type.BOOLEAN };
    case "date":
      return { type: Type.STRING, description: "Date in ISO 8601 format" };
    case "url":
      return { type: Type.STRING, description: "Valid URL" };
    case "email":
      return { type: Type.STRING, description: "Valid email address" };
    case "object":
      return { type: Type.STRING, description: OBJECT_FIELD_DESCRIPTION };
    case "string":
    case "text":
      return { type: Type.STRING };
  }
}

/**
 * Builds the structured response schema for a field schema. Every field is
 * required and keeps its declared order.
 */
export function toGeminiResponseSchema(schema: FieldSchema): Schema {
  const normalized = validateAndNormalizeFieldSchema(schema);
  const properties: Record<string, Schema> = {};

  for (const [field, token] of Object.entries(normalized)) {
    const type = parseFieldType(token);
    if (!type) {
      throw new SchemaValidationError(`Unsupported schema type "${token}" for field "${field}"`, field);
    }
    properties[field] = fieldTypeToSchema(type);
  }

  const fields = Object.keys(properties);
  return {
    type: Type.OBJECT,
    properties,
    required: fields,
    propertyOrdering: fields,
  };
}
