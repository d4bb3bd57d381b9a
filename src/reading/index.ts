/**
 * Reading Module - Public API
 */

// Types
export type { Reading } from "./schema.js";

// Schemas
export { INHERITED_READING_FIELDS, ReadingSchema } from "./schema.js";

// Pure transformations
export {
  applyReadingInheritance,
  checkCumulatedLoss,
  checkReadingFieldGroup,
  parseReading,
  serializeReading,
} from "./transform.js";
