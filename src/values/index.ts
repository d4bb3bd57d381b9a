/**
 * Values Module - Public API
 */

// Types
export type {
  CurrentType,
  CurveName,
  HashAlgorithm,
  IdentificationFlag,
  IdentificationFlagGroup,
  IdentificationLevel,
  IdentificationType,
  MeterStatus,
  OcmfTimestamp,
  Pagination,
  ReadingReason,
  SignatureEncoding,
  TimeStatus,
  Unit,
} from "./schema.js";

// Enumerations
export {
  CURVE_NAMES,
  DEFAULT_SIGNATURE_METHOD,
  END_READING_REASONS,
  HASH_ALGORITHMS,
  IDENTIFICATION_FLAG_GROUPS,
  IDENTIFICATION_LEVELS,
  IDENTIFICATION_TYPES,
  INVALID_IDENTIFICATION_LEVELS,
  METER_STATUSES,
  READING_REASONS,
  TIME_STATUSES,
  UNITS,
} from "./schema.js";

// Pure transformations
export {
  compareTimestamps,
  decodeBase64,
  decodeHex,
  encodeBase64,
  encodeHex,
  formatPagination,
  formatTimestamp,
  isEndReading,
  isInvalidIdentificationLevel,
  isRecord,
  omitNulls,
  parsePagination,
  parseTimestamp,
} from "./transform.js";
