/**
 * Signature Module - Public API
 */

// Types
export type { Signature } from "./schema.js";

// Schemas
export { SignatureSchema } from "./schema.js";

// Pure transformations
export { decodeSignatureData, parseSignature, serializeSignature } from "./transform.js";
