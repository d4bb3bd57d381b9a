/**
 * Payload Module - Public API
 */

// Types
export type {
  Identification,
  LossCompensation,
  Payload,
  PayloadCore,
  PayloadDraft,
  PayloadExtensions,
} from "./schema.js";
export type { TransactionState } from "./transform.js";

// Schemas
export {
  DEFAULT_VALIDATION_POLICY,
  IdentificationSchema,
  LossCompensationSchema,
  PayloadStructureSchema,
} from "./schema.js";

// Pure transformations
export {
  checkCumulatedLosses,
  checkIdentificationFlags,
  checkPagination,
  checkReadingFieldGroups,
  checkSerialNumbers,
  checkTransactionSequence,
  nextTransactionState,
  parsePayload,
  parsePayloadStructure,
  refineIdentification,
  serializePayload,
} from "./transform.js";
