/**
 * Eichrecht Module - Schemas and Types
 *
 * Billing-rule issues raised against readings and transaction pairs under
 * German calibration law.
 */
import type { CompliancePolicy } from "../config.js";

// =============================================================================
// Issue Codes
// =============================================================================

export const READING_ISSUE_CODES = [
  "METER_STATUS",
  "ERROR_FLAGS",
  "TIME_SYNC",
  "CL_BEGIN",
  "CL_NEGATIVE",
] as const;

export const TRANSACTION_ISSUE_CODES = [
  "NO_READINGS",
  "BEGIN_TX",
  "END_TX",
  "SERIAL_MISMATCH",
  "OBIS_MISMATCH",
  "UNIT_MISMATCH",
  "VALUE_REGRESSION",
  "TIME_REGRESSION",
  "ID_MISMATCH",
  "ID_LEVEL_INVALID",
  "PAGINATION_INCONSISTENT",
] as const;

export type IssueCode =
  | (typeof READING_ISSUE_CODES)[number]
  | (typeof TRANSACTION_ISSUE_CODES)[number];

export type IssueSeverity = "error" | "warning";

// =============================================================================
// Issue
// =============================================================================

/**
 * A single compliance finding. Warnings never make a record non-billable.
 */
export type EichrechtIssue = Readonly<{
  code: IssueCode;
  message: string;
  field?: string;
  severity: IssueSeverity;
}>;

export const DEFAULT_COMPLIANCE_POLICY: CompliancePolicy = Object.freeze({
  idMismatchSeverity: "warning",
});
