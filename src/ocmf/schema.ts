/**
 * OCMF Module - Schemas and Types
 *
 * A record is `OCMF|<payload JSON>|<signature JSON>`, optionally hex-encoded
 * as a whole.
 */
import type { EichrechtIssue } from "../eichrecht/schema.js";
import type { Payload } from "../payload/schema.js";
import type { Signature } from "../signature/schema.js";

export const OCMF_HEADER = "OCMF";

export const OCMF_PREFIX = `${OCMF_HEADER}|`;

export type Ocmf = Readonly<{
  header: typeof OCMF_HEADER;
  payload: Payload;
  signature: Signature;
}>;

/**
 * A parsed record plus the payload section exactly as it appeared on the
 * wire. Signatures are checked against this text, never a re-serialization.
 */
export type ParsedOcmf = Readonly<{
  record: Ocmf;
  originalPayload: string;
}>;

export type SerializeOptions = Readonly<{
  /** Emit lowercase hex of the UTF-8 bytes */
  hex?: boolean;
}>;

// =============================================================================
// Facade Results
// =============================================================================

export type ComplianceOptions = Readonly<{
  /** Drop warnings from the result */
  errorsOnly?: boolean;
}>;

export type VerifyRecordOptions = Readonly<{
  /** Counterpart record for a transaction check */
  other?: Ocmf;
  /** Run the Eichrecht checks next to the signature check */
  eichrecht?: boolean;
}>;

export type RecordReport = Readonly<{
  signatureValid: boolean;
  issues: ReadonlyArray<EichrechtIssue>;
}>;
