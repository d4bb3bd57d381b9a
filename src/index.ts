/**
 * OCMF Toolkit - Library Entry Point
 *
 * Parse, validate, serialize and verify Open Charge Metering Format
 * records, and check them against Eichrecht billing rules.
 *
 * @example
 * import { parse, verify } from "ocmf-toolkit";
 *
 * const parsed = parse(record);
 * if (parsed.isOk()) {
 *   const valid = verify(parsed.value, publicKeyHex);
 * }
 */

// Facade and wire codec
export * from "./ocmf/index.js";

// Record model
export * from "./payload/index.js";
export * from "./reading/index.js";
export * from "./signature/index.js";
export * from "./values/index.js";
export * from "./obis/index.js";

// Verification
export * from "./crypto/index.js";
export * from "./eichrecht/index.js";

// Errors
export type { EncodingName, OcmfError, OcmfErrorType, ValidationError } from "./errors.js";
export { formatOcmfError } from "./errors.js";

// Configuration
export type { CompliancePolicy, SerialPolicy, ValidationPolicy } from "./config.js";
export { getCompliancePolicy, getValidationPolicy } from "./config.js";
