/**
 * OCMF Module - Service Layer
 *
 * Entry points for callers (CLI, transparency-file readers): parse,
 * verify and check records with the configured policies, logging each
 * operation.
 */
import { err, ok, type Result } from "neverthrow";

import {
  type CompliancePolicy,
  getCompliancePolicy,
  getValidationPolicy,
  type ValidationPolicy,
} from "../config.js";
import type { PublicKeyMaterial } from "../crypto/service.js";
import { verifySignature } from "../crypto/service.js";
import type { EichrechtIssue } from "../eichrecht/schema.js";
import { checkPayload, checkTransaction, filterErrors } from "../eichrecht/transform.js";
import { formatOcmfError, type OcmfError, verificationError } from "../errors.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type {
  ComplianceOptions,
  Ocmf,
  ParsedOcmf,
  RecordReport,
  VerifyRecordOptions,
} from "./schema.js";
import { parseOcmfString } from "./transform.js";

const log = createLogger("ocmf");

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a plain or hex-encoded OCMF string.
 */
export function parse(
  input: string,
  policy: ValidationPolicy = getValidationPolicy(),
): Result<ParsedOcmf, OcmfError> {
  const operation = "parse";
  const startTime = Date.now();
  logOperationStart(log, operation, { length: input.length });

  const result = parseOcmfString(input, policy);
  if (result.isErr()) {
    logOperationFailed(log, operation, formatOcmfError(result.error));
    return result;
  }

  logOperationComplete(log, operation, startTime, {
    gateway: result.value.record.payload.GI,
    readings: result.value.record.payload.RD.length,
  });
  return result;
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Verify the record's signature. Without an explicit key the embedded PK
 * is used.
 */
export function verify(
  parsed: ParsedOcmf,
  publicKey?: PublicKeyMaterial,
): Result<boolean, OcmfError> {
  const key = publicKey ?? parsed.record.signature.PK;
  if (key === undefined) {
    const error = verificationError(
      "No public key supplied and the signature has no embedded public key (PK)",
    );
    logOperationFailed(log, "verify", error.message);
    return err(error);
  }

  if (publicKey === undefined) {
    log.debug("Using public key embedded in the signature");
  }
  return verifySignature(parsed.originalPayload, parsed.record.signature, key);
}

// =============================================================================
// Compliance
// =============================================================================

/**
 * Eichrecht issues for one record, or for a begin/end pair when `other`
 * is given.
 */
export function checkCompliance(
  record: Ocmf,
  other?: Ocmf,
  options: ComplianceOptions = {},
  policy: CompliancePolicy = getCompliancePolicy(),
): EichrechtIssue[] {
  const operation = "checkCompliance";
  const startTime = Date.now();
  logOperationStart(log, operation, { transaction: other !== undefined });

  const issues = other
    ? checkTransaction(record.payload, other.payload, policy)
    : checkPayload(record.payload);
  const errors = filterErrors(issues);

  logOperationComplete(log, operation, startTime, {
    errors: errors.length,
    warnings: issues.length - errors.length,
  });
  return options.errorsOnly ? errors : issues;
}

/**
 * True when the record (or pair) has no error-severity issue.
 */
export function isCompliant(
  record: Ocmf,
  other?: Ocmf,
  policy: CompliancePolicy = getCompliancePolicy(),
): boolean {
  return checkCompliance(record, other, { errorsOnly: true }, policy).length === 0;
}

/**
 * Signature check plus, on request, the compliance check.
 */
export function verifyRecord(
  parsed: ParsedOcmf,
  publicKey?: PublicKeyMaterial,
  options: VerifyRecordOptions = {},
): Result<RecordReport, OcmfError> {
  return verify(parsed, publicKey).andThen((signatureValid) => {
    const runCompliance = options.eichrecht === true || options.other !== undefined;
    const issues = runCompliance ? checkCompliance(parsed.record, options.other) : [];

    if (!signatureValid) {
      log.warn({ operation: "verifyRecord" }, "Signature does not match payload");
    }
    return ok({ signatureValid, issues });
  });
}

/**
 * Process exit code for a verification outcome: 0 when the signature is
 * valid and no error-severity issue was found, otherwise 1.
 */
export function exitCodeFor(result: Result<RecordReport, OcmfError>): 0 | 1 {
  if (result.isErr()) {
    return 1;
  }
  const { signatureValid, issues } = result.value;
  return signatureValid && filterErrors(issues).length === 0 ? 0 : 1;
}
