/**
 * Values Module - Pure Transformations
 *
 * Parse and format the small value types that OCMF writes as strings:
 * timestamps, pagination tokens, hex and base64 byte strings.
 */
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { err, ok, type Result } from "neverthrow";

import { encodingError, type OcmfError } from "../errors.js";
import {
  END_READING_REASONS,
  INVALID_IDENTIFICATION_LEVELS,
  type IdentificationLevel,
  type OcmfTimestamp,
  type Pagination,
  type ReadingReason,
  TimeStatusSchema,
} from "./schema.js";

// =============================================================================
// Timestamp
// =============================================================================

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2}),(\d{3})([+-])(\d{2})(\d{2}) ([UISR])$/;

const MS_PER_MINUTE = 60_000;

/**
 * Parse an OCMF timestamp string.
 *
 * @example
 * parseTimestamp("2019-08-13T10:03:15,000+0000 I")
 * // ok({ epochMs: 1565690595000, offsetMinutes: 0, status: "I" })
 */
export function parseTimestamp(value: string): Result<OcmfTimestamp, string> {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return err(`Invalid OCMF timestamp: '${value}'`);
  }

  const [, y, mo, d, h, mi, s, ms, sign, offH, offM, flag] = match;
  const status = TimeStatusSchema.safeParse(flag);
  if (!status.success) {
    return err(`Invalid OCMF timestamp: '${value}'`);
  }

  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const offsetHours = Number(offH);
  const offsetMins = Number(offM);

  if (hour > 23 || minute > 59 || second > 59 || offsetHours > 23 || offsetMins > 59) {
    return err(`Invalid OCMF timestamp: '${value}'`);
  }

  // setUTCFullYear keeps years below 100 as written
  const check = new Date(0);
  check.setUTCFullYear(year, month - 1, day);
  check.setUTCHours(hour, minute, second, Number(ms));
  const localMs = check.getTime();
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return err(`Invalid calendar date in OCMF timestamp: '${value}'`);
  }

  const offsetMinutes = (sign === "-" ? -1 : 1) * (offsetHours * 60 + offsetMins);

  return ok({
    epochMs: localMs - offsetMinutes * MS_PER_MINUTE,
    offsetMinutes,
    status: status.data,
  });
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Render a timestamp in OCMF notation (comma before milliseconds).
 */
export function formatTimestamp(timestamp: OcmfTimestamp): string {
  const local = new Date(timestamp.epochMs + timestamp.offsetMinutes * MS_PER_MINUTE);
  const offset = Math.abs(timestamp.offsetMinutes);
  const sign = timestamp.offsetMinutes < 0 ? "-" : "+";

  return (
    `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1, 2)}-${pad(local.getUTCDate(), 2)}` +
    `T${pad(local.getUTCHours(), 2)}:${pad(local.getUTCMinutes(), 2)}:${pad(local.getUTCSeconds(), 2)}` +
    `,${pad(local.getUTCMilliseconds(), 3)}` +
    `${sign}${pad(Math.floor(offset / 60), 2)}${pad(offset % 60, 2)} ${timestamp.status}`
  );
}

/**
 * Order two timestamps by instant; offsets and status are ignored.
 */
export function compareTimestamps(a: OcmfTimestamp, b: OcmfTimestamp): number {
  return a.epochMs - b.epochMs;
}

// =============================================================================
// Pagination
// =============================================================================

const PAGINATION_PATTERN = /^([TF])([1-9][0-9]*)$/;

/**
 * Parse a pagination token. The counter starts at 1 and has no leading zero.
 */
export function parsePagination(value: string): Result<Pagination, string> {
  const match = PAGINATION_PATTERN.exec(value);
  const context = match?.[1];
  const digits = match?.[2];
  if ((context !== "T" && context !== "F") || digits === undefined) {
    return err(`Invalid pagination '${value}', expected T<n> or F<n> with n >= 1`);
  }
  return ok({ context, index: Number(digits) });
}

export function formatPagination(pagination: Pagination): string {
  return `${pagination.context}${pagination.index}`;
}

// =============================================================================
// Byte Encodings
// =============================================================================

const HEX_PATTERN = /^[0-9a-fA-F]+$/;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function isHex(value: string): boolean {
  return HEX_PATTERN.test(value) && value.length % 2 === 0;
}

export function isBase64(value: string): boolean {
  return value.length > 0 && BASE64_PATTERN.test(value);
}

/**
 * Decode a hex string (either case) to bytes.
 */
export function decodeHex(value: string): Result<Uint8Array, OcmfError> {
  if (!HEX_PATTERN.test(value)) {
    return err(encodingError("hex", "invalid hexadecimal string"));
  }
  if (value.length % 2 !== 0) {
    return err(encodingError("hex", "hexadecimal string has odd length"));
  }
  return ok(hexToBytes(value.toLowerCase()));
}

/**
 * Decode standard padded base64 to bytes.
 */
export function decodeBase64(value: string): Result<Uint8Array, OcmfError> {
  if (!isBase64(value)) {
    return err(encodingError("base64", "invalid base64 string"));
  }
  return ok(new Uint8Array(Buffer.from(value, "base64")));
}

/**
 * Lowercase hex of the given bytes.
 */
export function encodeHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

// =============================================================================
// JSON Objects
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Copy of a JSON object without its null-valued keys.
 * OCMF treats an explicit null the same as an absent field.
 */
export function omitNulls(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== null));
}

// =============================================================================
// Enumeration Predicates
// =============================================================================

export function isEndReading(reason: ReadingReason): boolean {
  return END_READING_REASONS.includes(reason);
}

export function isInvalidIdentificationLevel(level: IdentificationLevel): boolean {
  return INVALID_IDENTIFICATION_LEVELS.includes(level);
}
