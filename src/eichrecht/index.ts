/**
 * Eichrecht Module - Public API
 */

// Types
export type { EichrechtIssue, IssueCode, IssueSeverity } from "./schema.js";

// Constants
export {
  DEFAULT_COMPLIANCE_POLICY,
  READING_ISSUE_CODES,
  TRANSACTION_ISSUE_CODES,
} from "./schema.js";

// Pure transformations
export {
  checkPayload,
  checkReading,
  checkTransaction,
  filterErrors,
  formatIssue,
  validateTransactionPair,
} from "./transform.js";
