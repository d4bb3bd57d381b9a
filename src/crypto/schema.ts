/**
 * Crypto Module - Schemas and Types
 *
 * Curve and hash tables for the ECDSA methods OCMF names in SA, and the
 * metadata extracted from a decoded public key.
 */
import type { CurveName, HashAlgorithm } from "../values/schema.js";

// =============================================================================
// Curves
// =============================================================================

export type CurveSpec = Readonly<{
  name: CurveName;
  /** OpenSSL name, as reported by node:crypto for a loaded key */
  opensslName: string;
  keySizeBits: number;
}>;

function curve(
  name: CurveName,
  opensslName: string,
  keySizeBits: number,
): readonly [CurveName, CurveSpec] {
  return [name, Object.freeze({ name, opensslName, keySizeBits })];
}

export const CURVES: ReadonlyMap<CurveName, CurveSpec> = new Map([
  curve("secp192k1", "secp192k1", 192),
  curve("secp256k1", "secp256k1", 256),
  curve("secp192r1", "prime192v1", 192),
  curve("secp256r1", "prime256v1", 256),
  curve("secp384r1", "secp384r1", 384),
  curve("secp521r1", "secp521r1", 521),
  curve("brainpool256r1", "brainpoolP256r1", 256),
  curve("brainpoolP256r1", "brainpoolP256r1", 256),
  curve("brainpool384r1", "brainpoolP384r1", 384),
]);

/**
 * OpenSSL curve name -> OCMF curve name for decoded keys.
 * brainpoolP256r1 maps to its explicit spelling; both spellings match it.
 */
export const CURVES_BY_OPENSSL_NAME: ReadonlyMap<string, CurveSpec> = new Map(
  [...CURVES.values()]
    .filter((spec) => spec.name !== "brainpool256r1")
    .map((spec): [string, CurveSpec] => [spec.opensslName, spec]),
);

// =============================================================================
// Hashes
// =============================================================================

export const NODE_HASH_NAMES: Readonly<Record<HashAlgorithm, string>> = Object.freeze({
  SHA256: "sha256",
  SHA512: "sha512",
});

// =============================================================================
// Signature Method
// =============================================================================

/**
 * Resolved `ECDSA-<curve>-<hash>` signature method.
 */
export type SignatureMethod = Readonly<{
  id: string;
  curve: CurveSpec;
  hash: HashAlgorithm;
}>;

// =============================================================================
// Public Key
// =============================================================================

/**
 * Metadata of a decoded EC public key.
 */
export type PublicKeyInfo = Readonly<{
  curve: CurveName;
  keySizeBits: number;
  blockLengthBytes: number;
  /** DER SubjectPublicKeyInfo */
  der: Uint8Array;
}>;

/**
 * SPKI header for an uncompressed P-256 point, used to wrap raw X||Y keys.
 */
export const P256_SPKI_PREFIX = "3059301306072a8648ce3d020106082a8648ce3d030107034200";

export const RAW_P256_KEY_LENGTH = 64;
