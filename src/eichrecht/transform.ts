/**
 * Eichrecht Module - Pure Transformations
 *
 * Billing checks for single readings and for begin/end transaction pairs.
 * Checks never fail; every finding comes back as an issue.
 *
 * The billing-relevant readings of a transaction are the first reading of
 * the begin record and the last reading of the end record.
 */
import type { CompliancePolicy } from "../config.js";
import { normalizeObis } from "../obis/transform.js";
import type { Ocmf } from "../ocmf/schema.js";
import type { Payload } from "../payload/schema.js";
import type { Reading } from "../reading/schema.js";
import {
  compareTimestamps,
  formatTimestamp,
  isEndReading,
  isInvalidIdentificationLevel,
  parsePagination,
} from "../values/transform.js";
import { DEFAULT_COMPLIANCE_POLICY, type EichrechtIssue, type IssueCode } from "./schema.js";

function issue(
  code: IssueCode,
  message: string,
  field: string,
  severity: EichrechtIssue["severity"] = "error",
): EichrechtIssue {
  return { code, message, field, severity };
}

function show(value: string | number | undefined): string {
  return value === undefined ? "(none)" : String(value);
}

// =============================================================================
// Single Reading
// =============================================================================

/**
 * Check one reading against the billing rules.
 *
 * @param isBegin - the reading opens a transaction, so CL must be 0
 */
export function checkReading(reading: Reading, isBegin = false): EichrechtIssue[] {
  const issues: EichrechtIssue[] = [];

  if (reading.ST !== "G") {
    issues.push(
      issue(
        "METER_STATUS",
        `Meter status must be 'G' (OK) for billing-relevant readings, got '${reading.ST}'`,
        "ST",
      ),
    );
  }

  if (reading.EF !== undefined && reading.EF.trim() !== "") {
    issues.push(
      issue(
        "ERROR_FLAGS",
        `Error flags must be empty for billing-relevant readings, got '${reading.EF}'`,
        "EF",
      ),
    );
  }

  if (reading.TM.status !== "S") {
    issues.push(
      issue(
        "TIME_SYNC",
        `Time should be synchronized (status 'S') for billing, got '${reading.TM.status}'`,
        "TM",
        "warning",
      ),
    );
  }

  if (reading.CL !== undefined) {
    if (isBegin && reading.CL !== 0) {
      issues.push(
        issue(
          "CL_BEGIN",
          `Cumulated loss (CL) must be 0 at transaction begin, got ${reading.CL}`,
          "CL",
        ),
      );
    }
    if (reading.CL < 0) {
      issues.push(
        issue("CL_NEGATIVE", `Cumulated loss (CL) must be non-negative, got ${reading.CL}`, "CL"),
      );
    }
  }

  return issues;
}

/**
 * Check every reading of a standalone record. Fields are prefixed with the
 * reading's position; only a leading TX=B reading counts as a begin.
 */
export function checkPayload(payload: Pick<Payload, "RD">): EichrechtIssue[] {
  if (payload.RD.length === 0) {
    return [issue("NO_READINGS", "No readings (RD) present in payload", "RD")];
  }

  return payload.RD.flatMap((reading, index) =>
    checkReading(reading, index === 0 && reading.TX === "B").map((found) => ({
      ...found,
      field: `RD[${index}].${show(found.field)}`,
    })),
  );
}

// =============================================================================
// Transaction Pair
// =============================================================================

function checkMatch(
  code: IssueCode,
  description: string,
  field: string,
  begin: string | undefined,
  end: string | undefined,
  same: boolean = begin === end,
): EichrechtIssue | null {
  if (same) {
    return null;
  }
  return issue(
    code,
    `${description} must match: begin='${show(begin)}', end='${show(end)}'`,
    field,
  );
}

function checkPaginationOrder(begin: Payload, end: Payload): EichrechtIssue | null {
  const first = parsePagination(begin.PG);
  const second = parsePagination(end.PG);
  if (first.isErr() || second.isErr()) {
    return issue(
      "PAGINATION_INCONSISTENT",
      `Failed to parse pagination numbers: begin='${begin.PG}', end='${end.PG}'`,
      "PG",
    );
  }
  if (second.value.index !== first.value.index + 1) {
    return issue(
      "PAGINATION_INCONSISTENT",
      `Pagination must be consecutive: begin='${begin.PG}', end='${end.PG}'`,
      "PG",
    );
  }
  return null;
}

function checkIdentificationLevel(
  payload: Payload,
  context: "begin" | "end",
): EichrechtIssue | null {
  if (payload.IL === undefined || !isInvalidIdentificationLevel(payload.IL)) {
    return null;
  }
  return issue(
    "ID_LEVEL_INVALID",
    `Identification level '${payload.IL}' indicates error and is not acceptable for billing (${context})`,
    "IL",
  );
}

/**
 * Check a begin/end record pair for billing.
 *
 * Missing readings on either side stop the check with NO_READINGS.
 * An ID mismatch is reported with the severity the policy names.
 */
export function checkTransaction(
  begin: Payload,
  end: Payload,
  policy: CompliancePolicy = DEFAULT_COMPLIANCE_POLICY,
): EichrechtIssue[] {
  const beginReading = begin.RD[0];
  const endIndex = end.RD.length - 1;
  const endReading = end.RD[endIndex];
  if (beginReading === undefined || endReading === undefined) {
    return [
      issue("NO_READINGS", "Both begin and end payloads must contain readings (RD)", "RD"),
    ];
  }

  const issues: EichrechtIssue[] = [];

  if (beginReading.TX !== "B") {
    issues.push(
      issue(
        "BEGIN_TX",
        `Begin reading must have TX='B', got '${show(beginReading.TX)}'`,
        "RD[0].TX",
      ),
    );
  }
  if (endReading.TX === undefined || !isEndReading(endReading.TX)) {
    issues.push(
      issue(
        "END_TX",
        `'${show(endReading.TX)}' is not a valid end reading type`,
        `RD[${endIndex}].TX`,
      ),
    );
  }

  issues.push(...checkReading(beginReading, true), ...checkReading(endReading, false));

  const beginObis = beginReading.RI === undefined ? undefined : normalizeObis(beginReading.RI);
  const endObis = endReading.RI === undefined ? undefined : normalizeObis(endReading.RI);

  const mismatches = [
    checkMatch(
      "SERIAL_MISMATCH",
      "Serial numbers",
      "GS/MS",
      begin.GS || begin.MS,
      end.GS || end.MS,
    ),
    checkMatch(
      "OBIS_MISMATCH",
      "OBIS codes",
      "RI",
      beginReading.RI,
      endReading.RI,
      beginObis === endObis,
    ),
    checkMatch("UNIT_MISMATCH", "Units", "RU", beginReading.RU, endReading.RU),
  ];
  for (const mismatch of mismatches) {
    if (mismatch) {
      issues.push(mismatch);
    }
  }

  if (
    beginReading.RV !== undefined &&
    endReading.RV !== undefined &&
    endReading.RV < beginReading.RV
  ) {
    issues.push(
      issue(
        "VALUE_REGRESSION",
        `End value (${endReading.RV}) must be >= begin value (${beginReading.RV})`,
        "RV",
      ),
    );
  }

  if (compareTimestamps(endReading.TM, beginReading.TM) < 0) {
    issues.push(
      issue(
        "TIME_REGRESSION",
        `End timestamp (${formatTimestamp(endReading.TM)}) must be >= begin timestamp (${formatTimestamp(beginReading.TM)})`,
        "TM",
      ),
    );
  }

  const trailing = [
    checkIdentificationLevel(begin, "begin"),
    checkIdentificationLevel(end, "end"),
    checkPaginationOrder(begin, end),
  ];
  for (const found of trailing) {
    if (found) {
      issues.push(found);
    }
  }

  const idMismatch = checkMatch(
    "ID_MISMATCH",
    "Identification data",
    "ID",
    begin.ID ?? "",
    end.ID ?? "",
  );
  if (idMismatch) {
    issues.push({ ...idMismatch, severity: policy.idMismatchSeverity });
  }

  return issues;
}

/**
 * True when the pair has no error-severity issue.
 */
export function validateTransactionPair(
  begin: Ocmf,
  end: Ocmf,
  policy: CompliancePolicy = DEFAULT_COMPLIANCE_POLICY,
): boolean {
  return filterErrors(checkTransaction(begin.payload, end.payload, policy)).length === 0;
}

// =============================================================================
// Reporting
// =============================================================================

export function filterErrors(issues: ReadonlyArray<EichrechtIssue>): EichrechtIssue[] {
  return issues.filter((found) => found.severity === "error");
}

/**
 * @example
 * formatIssue(issue) // "[ST] Meter status must be 'G' ... (METER_STATUS)"
 */
export function formatIssue(found: EichrechtIssue): string {
  const prefix = found.field ? `[${found.field}] ` : "";
  return `${prefix}${found.message} (${found.code})`;
}
