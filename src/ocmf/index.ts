/**
 * OCMF Module - Public API
 */

// Types
export type {
  ComplianceOptions,
  Ocmf,
  ParsedOcmf,
  RecordReport,
  SerializeOptions,
  VerifyRecordOptions,
} from "./schema.js";

// Constants
export { OCMF_HEADER, OCMF_PREFIX } from "./schema.js";

// Pure transformations
export { parseOcmfString, serializeOcmf } from "./transform.js";

// Service
export {
  checkCompliance,
  exitCodeFor,
  isCompliant,
  parse,
  verify,
  verifyRecord,
} from "./service.js";
