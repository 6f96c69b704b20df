import { describe, expect, it } from "vitest";
import { SchemaValidationError } from "../utils/errors";
import {
  SUPPORTED_TYPES_DESCRIPTION,
  describeFieldSchema,
  normalizeFieldSchema,
  parseFieldType,
  validateAndNormalizeFieldSchema,
  validateFieldSchema,
} from "./FieldSchema";

describe("FieldSchema", () => {
  describe("validateFieldSchema", () => {
    it("should accept every supported scalar type", () => {
      expect(() =>
        validateFieldSchema({
          a: "string",
          b: "text",
          c: "number",
          d: "integer",
          e: "boolean",
          f: "array",
          g: "object",
          h: "date",
          i: "url",
          j: "email",
        }),
      ).not.toThrow();
    });

    it("should accept typed and nested arrays", () => {
      expect(() =>
        validateFieldSchema({ tags: "array<string>", grid: "ARRAY<array<number>>" }),
      ).not.toThrow();
    });

    it("should be case and whitespace insensitive for type tokens", () => {
      expect(() => validateFieldSchema({ title: "  STRING " })).not.toThrow();
    });

    it("should reject an empty schema", () => {
      expect(() => validateFieldSchema({})).toThrow(
        new SchemaValidationError("Schema cannot be empty"),
      );
    });

    it("should reject blank field names", () => {
      expect(() => validateFieldSchema({ "  ": "string" })).toThrow(
        "Schema field names cannot be empty",
      );
    });

    it("should reject blank type tokens", () => {
      expect(() => validateFieldSchema({ title: " " })).toThrow(
        'Schema field type cannot be empty for field "title"',
      );
    });

    it("should name the field and the allowed types for unknown tokens", () => {
      expect(() => validateFieldSchema({ price: "foo" })).toThrow(
        `Unsupported schema type "foo" for field "price". Supported types: ${SUPPORTED_TYPES_DESCRIPTION}`,
      );
      expect(SUPPORTED_TYPES_DESCRIPTION).toBe(
        "string, text, number, integer, boolean, array, object, date, url, email, array<T>",
      );
    });

    it("should reject arrays of unknown item types", () => {
      expect(() => validateFieldSchema({ items: "array<money>" })).toThrow(SchemaValidationError);
    });

    it("should record the offending field on the error", () => {
      let caught: unknown;
      try {
        validateFieldSchema({ when: "datetime" });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(SchemaValidationError);
      expect(caught).toMatchObject({ field: "when" });
    });
  });

  describe("normalizeFieldSchema", () => {
    it("should trim names and trim and lower-case types", () => {
      expect(normalizeFieldSchema({ " Title ": " STRING " })).toEqual({ Title: "string" });
    });

    it("should keep field name case", () => {
      expect(normalizeFieldSchema({ productName: "Text" })).toEqual({ productName: "text" });
    });
  });

  describe("validateAndNormalizeFieldSchema", () => {
    it("should validate and normalize in one step", () => {
      expect(validateAndNormalizeFieldSchema({ " Price": "NUMBER" })).toEqual({ Price: "number" });
    });

    it("should reject names that collide after trimming", () => {
      expect(() => validateAndNormalizeFieldSchema({ a: "string", " a ": "number" })).toThrow(
        "Schema field names must be unique after trimming",
      );
    });
  });

  describe("parseFieldType", () => {
    it("should parse scalar tokens", () => {
      expect(parseFieldType("Integer")).toEqual({ kind: "scalar", name: "integer" });
    });

    it("should treat a bare array as an array of strings", () => {
      expect(parseFieldType("array")).toEqual({
        kind: "array",
        items: { kind: "scalar", name: "string" },
      });
    });

    it("should parse nested array item types", () => {
      expect(parseFieldType("array<array<url>>")).toEqual({
        kind: "array",
        items: { kind: "array", items: { kind: "scalar", name: "url" } },
      });
    });

    it("should return undefined for unknown tokens", () => {
      expect(parseFieldType("foo")).toBeUndefined();
      expect(parseFieldType("array<>")).toBeUndefined();
    });
  });

  describe("describeFieldSchema", () => {
    it("should render one quoted entry per line", () => {
      expect(describeFieldSchema({ title: "string", price: "number" })).toBe(
        '{\n  "title": "string",\n  "price": "number"\n}',
      );
    });
  });
});
