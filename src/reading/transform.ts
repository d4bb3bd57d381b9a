/**
 * Reading Module - Pure Transformations
 *
 * Conditional reading rules, field inheritance across the RD list and
 * JSON serialization. No I/O, no logging.
 */
import { err, ok, type Result } from "neverthrow";

import { fromZodIssues, validationError, type ValidationError } from "../errors.js";
import { isAccumulationRegister } from "../obis/transform.js";
import { formatTimestamp, isRecord, omitNulls } from "../values/transform.js";
import {
  INHERITED_READING_FIELDS,
  type Reading,
  READING_KEY_ORDER,
  ReadingSchema,
} from "./schema.js";

function readingField(index: number, field: string): string {
  return `RD[${index}].${field}`;
}

// =============================================================================
// Conditional Rules
// =============================================================================

/**
 * RI and RU form a field group; RU is required and RV must accompany RI.
 */
export function checkReadingFieldGroup(
  reading: Reading,
  index: number,
): Result<Reading, ValidationError> {
  const hasRI = reading.RI !== undefined;
  const hasRU = reading.RU !== undefined;

  if (hasRI !== hasRU) {
    return err(
      validationError(
        readingField(index, "RI/RU"),
        "RI (Reading Identification) and RU (Reading Unit) must both be present or both absent",
        { expected: "RI and RU together", actual: hasRI ? "RI only" : "RU only" },
      ),
    );
  }

  if (!hasRU) {
    return err(validationError(readingField(index, "RU"), "RU (Reading Unit) is required"));
  }

  if (hasRI && reading.RV === undefined) {
    return err(
      validationError(
        readingField(index, "RV"),
        "RV (Reading Value) is required when RI is present",
      ),
    );
  }

  return ok(reading);
}

/**
 * CL is only legal on accumulation registers, must be 0 at TX=B and may
 * never be negative.
 */
export function checkCumulatedLoss(
  reading: Reading,
  index: number,
): Result<Reading, ValidationError> {
  const loss = reading.CL;
  if (loss === undefined) {
    return ok(reading);
  }

  const field = readingField(index, "CL");

  if (reading.RI === undefined || !isAccumulationRegister(reading.RI)) {
    return err(
      validationError(
        field,
        "CL (Cumulated Loss) can only appear when RI indicates an accumulation register (B0-B3, C0-C3)",
        { expected: "accumulation register", actual: reading.RI },
      ),
    );
  }

  if (reading.TX === "B" && loss !== 0) {
    return err(
      validationError(field, "CL (Cumulated Loss) must be 0 when TX=B (transaction begin)", {
        expected: "0",
        actual: loss,
      }),
    );
  }

  if (loss < 0) {
    return err(
      validationError(field, "CL (Cumulated Loss) must be non-negative", {
        expected: ">= 0",
        actual: loss,
      }),
    );
  }

  return ok(reading);
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Fill omitted TM, TX, RI, RU, RT, EF and ST from the previous reading.
 * Entries that are not JSON objects pass through for the schema to reject.
 */
export function applyReadingInheritance(readings: ReadonlyArray<unknown>): unknown[] {
  let previous: Record<string, unknown> = {};

  return readings.map((raw) => {
    if (!isRecord(raw)) {
      return raw;
    }

    const inherited: Record<string, unknown> = {};
    for (const field of INHERITED_READING_FIELDS) {
      if (!(field in raw) && field in previous) {
        inherited[field] = previous[field];
      }
    }

    const reading = { ...inherited, ...raw };
    previous = reading;
    return reading;
  });
}

/**
 * Structural parse of one reading, without its conditional rules.
 */
export function parseReadingStructure(
  raw: unknown,
  index: number,
): Result<Reading, ValidationError> {
  const parsed = ReadingSchema.safeParse(isRecord(raw) ? omitNulls(raw) : raw);
  if (!parsed.success) {
    return err(fromZodIssues(parsed.error.issues, ["RD", index]));
  }
  return ok(parsed.data);
}

/**
 * Parse and fully validate a standalone reading.
 */
export function parseReading(raw: unknown, index = 0): Result<Reading, ValidationError> {
  return parseReadingStructure(raw, index)
    .andThen((reading) => checkReadingFieldGroup(reading, index))
    .andThen((reading) => checkCumulatedLoss(reading, index));
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * JSON object for a reading, keys in wire order, absent fields omitted.
 */
export function serializeReading(reading: Reading): Record<string, unknown> {
  const json: Record<string, unknown> = {};
  for (const key of READING_KEY_ORDER) {
    const value = key === "TM" ? formatTimestamp(reading.TM) : reading[key];
    if (value !== undefined) {
      json[key] = value;
    }
  }
  return json;
}
