import fs from "node:fs/promises";
import { InvalidArgumentError } from "commander";
import { z } from "zod";
import { isAiProvider } from "./providers/models";
import type { FieldSchema } from "./schema";
import { ValidationError } from "./utils/errors";

const fieldSchemaSchema = z.record(z.string(), z.string());

/**
 * Commander argument parser for non-negative integers.
 */
export function parseNonNegativeInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

/**
 * Commander argument parser for integers of at least one.
 */
export function parsePositiveInteger(value: string): number {
  const parsed = parseNonNegativeInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError("Expected an integer of at least 1.");
  }
  return parsed;
}

export function parseProvider(value: string): string {
  const provider = value.trim().toLowerCase();
  if (!isAiProvider(provider)) {
    throw new InvalidArgumentError("Expected one of: openai, gemini.");
  }
  return provider;
}

/**
 * Reads a field schema given inline as JSON, or from a file as `@path`.
 * @throws {ValidationError} When the text is not a JSON object of strings
 */
export async function loadFieldSchema(argument: string): Promise<FieldSchema> {
  const text = argument.startsWith("@")
    ? await fs.readFile(argument.slice(1), "utf8")
    : argument;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      `Schema is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = fieldSchemaSchema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError(
      'Schema must be a JSON object mapping field names to type names, e.g. {"title":"string"}',
    );
  }
  return result.data;
}
