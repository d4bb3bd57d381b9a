/**
 * Crypto Module - Pure Transformations
 *
 * Signature method resolution and key material handling. Everything here
 * is table lookups and byte shuffling; the actual key parsing and ECDSA
 * verification live in service.ts.
 */
import { hexToBytes } from "@noble/hashes/utils";
import { err, ok, type Result } from "neverthrow";

import { type OcmfError, publicKeyError, verificationError } from "../errors.js";
import { CURVE_NAMES, HASH_ALGORITHMS } from "../values/schema.js";
import {
  decodeBase64,
  decodeHex,
  encodeBase64,
  encodeHex,
  isBase64,
  isHex,
} from "../values/transform.js";
import {
  CURVES,
  type CurveSpec,
  P256_SPKI_PREFIX,
  type PublicKeyInfo,
  RAW_P256_KEY_LENGTH,
  type SignatureMethod,
} from "./schema.js";

// =============================================================================
// Signature Method
// =============================================================================

const SIGNATURE_METHOD_PATTERN = new RegExp(
  `^ECDSA-(${CURVE_NAMES.join("|")})-(${HASH_ALGORITHMS.join("|")})$`,
);

function findCurve(name: string | undefined): CurveSpec | undefined {
  const known = CURVE_NAMES.find((candidate) => candidate === name);
  return known ? CURVES.get(known) : undefined;
}

/**
 * Resolve curve and hash from an SA value such as `ECDSA-secp256r1-SHA256`.
 */
export function resolveSignatureMethod(id: string): Result<SignatureMethod, OcmfError> {
  const match = SIGNATURE_METHOD_PATTERN.exec(id);
  const curve = findCurve(match?.[1]);
  const hash = HASH_ALGORITHMS.find((name) => name === match?.[2]);

  if (!curve || !hash) {
    return err(verificationError(`Unsupported signature method: '${id}'`));
  }
  return ok({ id, curve, hash });
}

/**
 * Curves are equal when they resolve to the same OpenSSL curve, so the
 * brainpool256r1 and brainpoolP256r1 spellings match each other.
 */
export function curvesMatch(a: string, b: string): boolean {
  const left = findCurve(a);
  const right = findCurve(b);
  return left !== undefined && right !== undefined && left.opensslName === right.opensslName;
}

/**
 * True when the key's curve is the one the signature method names.
 */
export function publicKeyMatchesSignatureMethod(
  key: PublicKeyInfo,
  signatureMethod: string,
): boolean {
  const method = resolveSignatureMethod(signatureMethod);
  return method.isOk() && curvesMatch(key.curve, method.value.curve.name);
}

// =============================================================================
// Key Material
// =============================================================================

/**
 * Decode textual key material: hex first, then base64.
 */
export function decodeKeyMaterial(material: string): Result<Uint8Array, OcmfError> {
  const text = material.trim();
  if (isHex(text)) {
    return decodeHex(text);
  }
  if (isBase64(text)) {
    return decodeBase64(text);
  }
  return err(publicKeyError("Invalid public key encoding: not valid hex or base64"));
}

export function isRawP256Key(bytes: Uint8Array): boolean {
  return bytes.length === RAW_P256_KEY_LENGTH;
}

/**
 * Wrap raw X||Y P-256 coordinates in a DER SubjectPublicKeyInfo.
 */
export function rawP256KeyToSpki(bytes: Uint8Array): Uint8Array {
  const prefix = hexToBytes(`${P256_SPKI_PREFIX}04`);
  const der = new Uint8Array(prefix.length + bytes.length);
  der.set(prefix);
  der.set(bytes, prefix.length);
  return der;
}

export function blockLengthBytes(keySizeBits: number): number {
  return Math.ceil(keySizeBits / 8);
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * OCMF key type identifier, e.g. `ECDSA-secp256r1`.
 */
export function keyTypeIdentifier(key: PublicKeyInfo): string {
  return `ECDSA-${key.curve}`;
}

export function formatPublicKey(key: PublicKeyInfo, encoding: "hex" | "base64" = "hex"): string {
  return encoding === "base64" ? encodeBase64(key.der) : encodeHex(key.der);
}
