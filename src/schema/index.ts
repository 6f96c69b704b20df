export {
  SUPPORTED_TYPES_DESCRIPTION,
  describeFieldSchema,
  isSupportedFieldType,
  normalizeFieldSchema,
  parseFieldType,
  validateAndNormalizeFieldSchema,
  validateFieldSchema,
} from "./FieldSchema";
export { normalizeExtractedData, nullFields } from "./normalize";
export { SCALAR_FIELD_TYPES } from "./types";
export type { FieldSchema, FieldType, ScalarFieldType } from "./types";
