/**
 * Values Module - Schemas and Types
 *
 * Enumerations and small value types shared by readings, payloads and
 * signatures. Each enumeration is a frozen tuple with a matching zod enum.
 */
import { z } from "zod";

// =============================================================================
// Reading Enumerations
// =============================================================================

/**
 * Reading reason (TX). E, L, R, A and P close a transaction.
 */
export const READING_REASONS = ["B", "C", "X", "E", "L", "R", "A", "P", "S", "T"] as const;
export const ReadingReasonSchema = z.enum(READING_REASONS);
export type ReadingReason = z.infer<typeof ReadingReasonSchema>;

export const END_READING_REASONS: ReadonlyArray<ReadingReason> = ["E", "L", "R", "A", "P"];

/**
 * Meter status (ST). G is the only OK state.
 */
export const METER_STATUSES = ["N", "G", "T", "D", "R", "M", "X", "I", "O", "S", "E", "F"] as const;
export const MeterStatusSchema = z.enum(METER_STATUSES);
export type MeterStatus = z.infer<typeof MeterStatusSchema>;

/**
 * Time synchronization status, the trailing letter of TM.
 * U unknown/unsynchronized, I informative, S synchronized, R relative.
 */
export const TIME_STATUSES = ["U", "I", "S", "R"] as const;
export const TimeStatusSchema = z.enum(TIME_STATUSES);
export type TimeStatus = z.infer<typeof TimeStatusSchema>;

export const CURRENT_TYPES = ["AC", "DC"] as const;
export const CurrentTypeSchema = z.enum(CURRENT_TYPES);
export type CurrentType = z.infer<typeof CurrentTypeSchema>;

export const RESISTANCE_UNITS = ["mOhm", "Ohm"] as const;
export const ResistanceUnitSchema = z.enum(RESISTANCE_UNITS);

export const UNITS = ["kWh", "Wh", ...RESISTANCE_UNITS, "sec", "min", "h"] as const;
export const UnitSchema = z.enum(UNITS);
export type Unit = z.infer<typeof UnitSchema>;

// =============================================================================
// Identification Enumerations
// =============================================================================

export const IDENTIFICATION_LEVELS = [
  "NONE",
  "HEARSAY",
  "TRUSTED",
  "VERIFIED",
  "CERTIFIED",
  "SECURE",
  "MISMATCH",
  "INVALID",
  "OUTDATED",
  "UNKNOWN",
] as const;
export const IdentificationLevelSchema = z.enum(IDENTIFICATION_LEVELS);
export type IdentificationLevel = z.infer<typeof IdentificationLevelSchema>;

/**
 * Levels reporting a failed identification.
 */
export const INVALID_IDENTIFICATION_LEVELS: ReadonlyArray<IdentificationLevel> = [
  "MISMATCH",
  "INVALID",
  "OUTDATED",
  "UNKNOWN",
];

/**
 * Identification flags (IF), grouped by the method table they belong to.
 */
export const IDENTIFICATION_FLAG_GROUPS = {
  RFID: ["RFID_NONE", "RFID_PLAIN", "RFID_RELATED", "RFID_PSK"],
  OCPP: [
    "OCPP_NONE",
    "OCPP_RS",
    "OCPP_AUTH",
    "OCPP_RS_TLS",
    "OCPP_AUTH_TLS",
    "OCPP_CACHE",
    "OCPP_WHITELIST",
    "OCPP_CERTIFIED",
  ],
  ISO15118: ["ISO15118_NONE", "ISO15118_PNC"],
  PLMN: ["PLMN_NONE", "PLMN_RING", "PLMN_SMS"],
} as const;

export type IdentificationFlagGroup = keyof typeof IDENTIFICATION_FLAG_GROUPS;

export type IdentificationFlag =
  (typeof IDENTIFICATION_FLAG_GROUPS)[IdentificationFlagGroup][number];

export const IDENTIFICATION_FLAGS = [
  ...IDENTIFICATION_FLAG_GROUPS.RFID,
  ...IDENTIFICATION_FLAG_GROUPS.OCPP,
  ...IDENTIFICATION_FLAG_GROUPS.ISO15118,
  ...IDENTIFICATION_FLAG_GROUPS.PLMN,
] as const;
export const IdentificationFlagSchema = z.enum(IDENTIFICATION_FLAGS);

export const IDENTIFICATION_TYPES = [
  "NONE",
  "DENIED",
  "UNDEFINED",
  "ISO14443",
  "ISO15693",
  "EMAID",
  "EVCCID",
  "EVCOID",
  "ISO7812",
  "CARD_TXN_NR",
  "CENTRAL",
  "CENTRAL_1",
  "CENTRAL_2",
  "LOCAL",
  "LOCAL_1",
  "LOCAL_2",
  "PHONE_NUMBER",
  "KEY_CODE",
] as const;
export const IdentificationTypeSchema = z.enum(IDENTIFICATION_TYPES);
export type IdentificationType = z.infer<typeof IdentificationTypeSchema>;

// =============================================================================
// Signature Enumerations
// =============================================================================

export const SIGNATURE_ENCODINGS = ["hex", "base64"] as const;
export const SignatureEncodingSchema = z.enum(SIGNATURE_ENCODINGS);
export type SignatureEncoding = z.infer<typeof SignatureEncodingSchema>;

export const SIGNATURE_MIME_TYPES = ["application/x-der"] as const;

export const HASH_ALGORITHMS = ["SHA256", "SHA512"] as const;
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export const CURVE_NAMES = [
  "secp192k1",
  "secp256k1",
  "secp192r1",
  "secp256r1",
  "secp384r1",
  "secp521r1",
  "brainpool256r1",
  "brainpoolP256r1",
  "brainpool384r1",
] as const;
export type CurveName = (typeof CURVE_NAMES)[number];

export const DEFAULT_SIGNATURE_METHOD = "ECDSA-secp256r1-SHA256";

// =============================================================================
// Timestamp
// =============================================================================

/**
 * OCMF timestamp: local time with UTC offset and sync status,
 * e.g. `2023-06-15T14:30:45,123+0200 S`.
 */
export type OcmfTimestamp = Readonly<{
  /** Instant in milliseconds since the epoch */
  epochMs: number;
  /** UTC offset of the local time, in minutes */
  offsetMinutes: number;
  status: TimeStatus;
}>;

// =============================================================================
// Pagination
// =============================================================================

/**
 * Pagination token (PG): T = transaction context, F = fiscal context.
 */
export type Pagination = Readonly<{
  context: "T" | "F";
  index: number;
}>;
