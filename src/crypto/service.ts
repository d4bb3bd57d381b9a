/**
 * Crypto Module - Service Layer
 *
 * Key parsing and ECDSA verification through node:crypto. The signed
 * message is the payload section exactly as it appeared on the wire.
 */
import { createPublicKey, type KeyObject, verify } from "node:crypto";
import { err, ok, type Result } from "neverthrow";

import { type OcmfError, publicKeyError, toError, verificationError } from "../errors.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { Signature } from "../signature/schema.js";
import { decodeSignatureData } from "../signature/transform.js";
import { CURVES_BY_OPENSSL_NAME, NODE_HASH_NAMES, type PublicKeyInfo } from "./schema.js";
import {
  blockLengthBytes,
  curvesMatch,
  decodeKeyMaterial,
  isRawP256Key,
  rawP256KeyToSpki,
  resolveSignatureMethod,
} from "./transform.js";

const log = createLogger("crypto");

/**
 * Hex or base64 text, or the DER bytes themselves.
 */
export type PublicKeyMaterial = string | Uint8Array;

type LoadedKey = Readonly<{ info: PublicKeyInfo; key: KeyObject }>;

// =============================================================================
// Public Key Loading
// =============================================================================

function importSpki(der: Uint8Array): Result<KeyObject, Error> {
  try {
    return ok(createPublicKey({ key: Buffer.from(der), format: "der", type: "spki" }));
  } catch (thrown) {
    return err(toError(thrown));
  }
}

function loadPublicKey(material: PublicKeyMaterial): Result<LoadedKey, OcmfError> {
  const bytes: Result<Uint8Array, OcmfError> =
    typeof material === "string" ? decodeKeyMaterial(material) : ok(material);
  if (bytes.isErr()) {
    return err(bytes.error);
  }

  let imported = importSpki(bytes.value);
  if (imported.isErr() && isRawP256Key(bytes.value)) {
    log.debug("Treating 64-byte key as raw P-256 coordinates");
    imported = importSpki(rawP256KeyToSpki(bytes.value));
  }
  if (imported.isErr()) {
    return err(
      publicKeyError(`Failed to parse public key: ${imported.error.message}`, imported.error),
    );
  }

  const key = imported.value;
  if (key.asymmetricKeyType !== "ec") {
    return err(publicKeyError("Public key is not an elliptic curve key"));
  }

  const opensslName = key.asymmetricKeyDetails?.namedCurve ?? "unknown";
  const curve = CURVES_BY_OPENSSL_NAME.get(opensslName);
  if (!curve) {
    return err(publicKeyError(`Unsupported elliptic curve: '${opensslName}'`));
  }

  const der = new Uint8Array(key.export({ type: "spki", format: "der" }));
  return ok({
    info: {
      curve: curve.name,
      keySizeBits: curve.keySizeBits,
      blockLengthBytes: blockLengthBytes(curve.keySizeBits),
      der,
    },
    key,
  });
}

/**
 * Decode a public key (DER SubjectPublicKeyInfo as hex, base64 or bytes)
 * and report its curve and sizes. 64 raw bytes are taken as a P-256 point.
 */
export function decodePublicKey(material: PublicKeyMaterial): Result<PublicKeyInfo, OcmfError> {
  const loaded = loadPublicKey(material);
  if (loaded.isErr()) {
    log.debug({ error: loaded.error.message }, "Public key rejected");
    return err(loaded.error);
  }
  log.debug({ curve: loaded.value.info.curve }, "Public key decoded");
  return ok(loaded.value.info);
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Verify the signature over the payload text.
 *
 * Returns ok(false) for a well-formed signature that does not match;
 * err for anything that prevents verification from running.
 */
export function verifySignature(
  originalPayload: string,
  signature: Signature,
  publicKey: PublicKeyMaterial,
): Result<boolean, OcmfError> {
  const operation = "verifySignature";
  const startTime = Date.now();
  logOperationStart(log, operation, { method: signature.SA });

  const result = resolveSignatureMethod(signature.SA).andThen((method) =>
    decodeSignatureData(signature).andThen((signatureBytes) =>
      loadPublicKey(publicKey).andThen(({ info, key }) => {
        if (!curvesMatch(info.curve, method.curve.name)) {
          return err(
            verificationError(
              `Public key curve mismatch: signature algorithm specifies '${method.curve.name}' but public key uses '${info.curve}'`,
            ),
          );
        }
        try {
          return ok(
            verify(
              NODE_HASH_NAMES[method.hash],
              Buffer.from(originalPayload, "utf8"),
              { key, dsaEncoding: "der" },
              signatureBytes,
            ),
          );
        } catch (thrown) {
          const cause = toError(thrown);
          return err(verificationError(`Signature verification failed: ${cause.message}`, cause));
        }
      }),
    ),
  );

  if (result.isErr()) {
    logOperationFailed(log, operation, result.error.message);
  } else {
    logOperationComplete(log, operation, startTime, { valid: result.value });
  }
  return result;
}
