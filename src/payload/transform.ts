/**
 * Payload Module - Validation Pipeline and Serialization
 *
 * Parsing runs as an explicit ordered pipeline over a partially built
 * payload. Each step returns the refined value or the first violation:
 *
 *   inheritance -> structure -> serial numbers -> reading field groups
 *   -> cumulated loss -> flag mixing -> identification -> pagination
 *   -> transaction sequence
 */
import { err, ok, type Result } from "neverthrow";

import type { ValidationPolicy } from "../config.js";
import { fromZodIssues, validationError, type ValidationError } from "../errors.js";
import type { Reading } from "../reading/schema.js";
import {
  applyReadingInheritance,
  checkCumulatedLoss,
  checkReadingFieldGroup,
  serializeReading,
} from "../reading/transform.js";
import {
  IDENTIFICATION_FLAG_GROUPS,
  type IdentificationFlagGroup,
  type ReadingReason,
} from "../values/schema.js";
import { isEndReading, isRecord, omitNulls, parsePagination } from "../values/transform.js";
import {
  DEFAULT_VALIDATION_POLICY,
  IdentificationSchema,
  type Payload,
  PAYLOAD_KEY_ORDER,
  type PayloadDraft,
  type PayloadKey,
  PayloadStructureSchema,
} from "./schema.js";

const KNOWN_KEYS: ReadonlySet<string> = new Set(PAYLOAD_KEY_ORDER);

function isPayloadKey(key: string): key is PayloadKey {
  return KNOWN_KEYS.has(key);
}

// =============================================================================
// Structure
// =============================================================================

/**
 * Structural pass. Reading inheritance is applied to RD first; keys the
 * schema does not know are kept aside as extensions.
 */
export function parsePayloadStructure(raw: unknown): Result<PayloadDraft, ValidationError> {
  if (!isRecord(raw)) {
    return err(validationError("(root)", "Payload must be a JSON object"));
  }

  const input = omitNulls(raw);
  const readings = input["RD"];
  if (Array.isArray(readings)) {
    input["RD"] = applyReadingInheritance(readings).map((reading) =>
      isRecord(reading) ? omitNulls(reading) : reading,
    );
  }

  const parsed = PayloadStructureSchema.safeParse(input);
  if (!parsed.success) {
    return err(fromZodIssues(parsed.error.issues));
  }

  const extensions = Object.fromEntries(
    Object.entries(raw).filter(([key]) => !isPayloadKey(key)),
  );

  return ok({ ...parsed.data, extensions });
}

// =============================================================================
// Pipeline Steps
// =============================================================================

/**
 * At least one of GS/MS must be non-empty; the strict policy demands MS.
 */
export function checkSerialNumbers<T extends Pick<PayloadDraft, "GS" | "MS">>(
  payload: T,
  policy: ValidationPolicy = DEFAULT_VALIDATION_POLICY,
): Result<T, ValidationError> {
  if (policy.serialPolicy === "ms-required") {
    if (!payload.MS) {
      return err(validationError("MS", "Meter Serial (MS) must be provided"));
    }
    return ok(payload);
  }

  if (!payload.GS && !payload.MS) {
    return err(
      validationError("GS/MS", "Either Gateway Serial (GS) or Meter Serial (MS) must be provided"),
    );
  }
  return ok(payload);
}

function checkEachReading<T extends Pick<PayloadDraft, "RD">>(
  payload: T,
  check: (reading: Reading, index: number) => Result<Reading, ValidationError>,
): Result<T, ValidationError> {
  for (const [index, reading] of payload.RD.entries()) {
    const result = check(reading, index);
    if (result.isErr()) {
      return err(result.error);
    }
  }
  return ok(payload);
}

export function checkReadingFieldGroups<T extends Pick<PayloadDraft, "RD">>(
  payload: T,
): Result<T, ValidationError> {
  return checkEachReading(payload, checkReadingFieldGroup);
}

export function checkCumulatedLosses<T extends Pick<PayloadDraft, "RD">>(
  payload: T,
): Result<T, ValidationError> {
  return checkEachReading(payload, checkCumulatedLoss);
}

const FLAG_GROUP_NAMES: ReadonlyArray<IdentificationFlagGroup> = [
  "RFID",
  "OCPP",
  "ISO15118",
  "PLMN",
];

function flagGroupOf(flag: string): IdentificationFlagGroup | undefined {
  return FLAG_GROUP_NAMES.find((group) => {
    const members: ReadonlyArray<string> = IDENTIFICATION_FLAG_GROUPS[group];
    return members.includes(flag);
  });
}

/**
 * IF flags must come from a single method table unless all are `*_NONE`.
 */
export function checkIdentificationFlags<T extends Pick<PayloadDraft, "IF">>(
  payload: T,
): Result<T, ValidationError> {
  const flags = payload.IF;
  if (flags.length <= 1 || flags.every((flag) => flag.endsWith("_NONE"))) {
    return ok(payload);
  }

  const groups = new Set<string>();
  for (const flag of flags) {
    const group = flagGroupOf(flag);
    if (group) {
      groups.add(group);
    }
  }

  if (groups.size > 1) {
    const found = [...groups].sort().join(", ");
    return err(
      validationError(
        "IF",
        `IF (Identification Flags) cannot mix flags from different sources. Found: ${found}`,
        { expected: "flags from one source", actual: flags },
      ),
    );
  }
  return ok(payload);
}

/**
 * Refine IT/ID into the tagged identification variant.
 */
export function refineIdentification(draft: PayloadDraft): Result<Payload, ValidationError> {
  const { IT, ID, ...core } = draft;
  const identification = IdentificationSchema.safeParse(
    ID === undefined ? { IT } : { IT, ID },
  );
  if (!identification.success) {
    const error = fromZodIssues(identification.error.issues);
    return err({ ...error, expected: `ID format for ${IT}`, actual: ID });
  }
  return ok({ ...core, ...identification.data });
}

export function checkPagination<T extends Pick<PayloadDraft, "PG">>(
  payload: T,
): Result<T, ValidationError> {
  const pagination = parsePagination(payload.PG);
  if (pagination.isErr()) {
    return err(
      validationError("PG", pagination.error, {
        expected: "T<n> or F<n>, n >= 1 without leading zero",
        actual: payload.PG,
      }),
    );
  }
  return ok(payload);
}

// =============================================================================
// Transaction Sequence
// =============================================================================

/**
 * MID: no transaction seen yet. BEGIN: after TX=B. END: after an end reason.
 */
export type TransactionState = "MID" | "BEGIN" | "END";

export function nextTransactionState(
  state: TransactionState,
  tx: ReadingReason,
  index: number,
): Result<TransactionState, ValidationError> {
  const field = `RD[${index}].TX`;

  if (tx === "B") {
    if (state === "END") {
      return err(
        validationError(field, `Reading ${index}: TX=B (Begin) cannot appear after transaction end`),
      );
    }
    return ok("BEGIN");
  }

  if (isEndReading(tx)) {
    if (state === "MID") {
      return err(
        validationError(field, `Reading ${index}: TX=${tx} (End) requires TX=B (Begin) first`),
      );
    }
    return ok("END");
  }

  if (state === "END") {
    return err(
      validationError(field, `Reading ${index}: TX=${tx} cannot appear after transaction end`),
    );
  }
  return ok(state);
}

/**
 * Walk RD through the transaction state machine. Readings without TX are
 * skipped; a list of fewer than two readings is not checked, so a lone
 * end record is legal.
 */
export function checkTransactionSequence<T extends Pick<PayloadDraft, "RD">>(
  payload: T,
): Result<T, ValidationError> {
  if (payload.RD.length < 2) {
    return ok(payload);
  }

  let state: TransactionState = "MID";
  for (const [index, reading] of payload.RD.entries()) {
    if (reading.TX === undefined) {
      continue;
    }
    const next = nextTransactionState(state, reading.TX, index);
    if (next.isErr()) {
      return err(next.error);
    }
    state = next.value;
  }
  return ok(payload);
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Parse and validate a payload JSON value. The first violation wins.
 */
export function parsePayload(
  raw: unknown,
  policy: ValidationPolicy = DEFAULT_VALIDATION_POLICY,
): Result<Payload, ValidationError> {
  return parsePayloadStructure(raw)
    .andThen((draft) => checkSerialNumbers(draft, policy))
    .andThen((draft) => checkReadingFieldGroups(draft))
    .andThen((draft) => checkCumulatedLosses(draft))
    .andThen((draft) => checkIdentificationFlags(draft))
    .andThen((draft) => refineIdentification(draft))
    .andThen((payload) => checkPagination(payload))
    .andThen((payload) => checkTransactionSequence(payload));
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * JSON object for a payload: known keys in wire order, absent fields
 * omitted, extensions appended in their original order.
 */
export function serializePayload(payload: Payload): Record<string, unknown> {
  const json: Record<string, unknown> = {};
  const fields: Readonly<Record<string, unknown>> = payload;

  for (const key of PAYLOAD_KEY_ORDER) {
    if (key === "RD") {
      json[key] = payload.RD.map(serializeReading);
      continue;
    }
    const value = fields[key];
    if (value !== undefined) {
      json[key] = value;
    }
  }

  for (const [key, value] of Object.entries(payload.extensions)) {
    if (!(key in json)) {
      json[key] = value;
    }
  }
  return json;
}
