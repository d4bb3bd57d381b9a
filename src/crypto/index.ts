/**
 * Crypto Module - Public API
 */

// Types
export type { CurveSpec, PublicKeyInfo, SignatureMethod } from "./schema.js";
export type { PublicKeyMaterial } from "./service.js";

// Tables
export { CURVES, CURVES_BY_OPENSSL_NAME, NODE_HASH_NAMES } from "./schema.js";

// Pure transformations
export {
  curvesMatch,
  decodeKeyMaterial,
  formatPublicKey,
  keyTypeIdentifier,
  publicKeyMatchesSignatureMethod,
  resolveSignatureMethod,
} from "./transform.js";

// Service
export { decodePublicKey, verifySignature } from "./service.js";
