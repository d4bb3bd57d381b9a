/**
 * Signature Module - Pure Transformations
 */
import { err, ok, type Result } from "neverthrow";

import { fromZodIssues, type OcmfError, validationError, type ValidationError } from "../errors.js";
import { decodeBase64, decodeHex, isRecord, omitNulls } from "../values/transform.js";
import { type Signature, SIGNATURE_KEY_ORDER, SignatureSchema } from "./schema.js";

/**
 * Parse and validate the signature JSON value. Defaults are filled in for
 * SA, SE and SM.
 */
export function parseSignature(raw: unknown): Result<Signature, ValidationError> {
  if (!isRecord(raw)) {
    return err(validationError("(root)", "Signature must be a JSON object"));
  }

  const parsed = SignatureSchema.safeParse(omitNulls(raw));
  if (!parsed.success) {
    return err(fromZodIssues(parsed.error.issues));
  }
  return ok(parsed.data);
}

/**
 * Signature bytes decoded per SE.
 */
export function decodeSignatureData(signature: Signature): Result<Uint8Array, OcmfError> {
  return signature.SE === "base64" ? decodeBase64(signature.SD) : decodeHex(signature.SD);
}

export function serializeSignature(signature: Signature): Record<string, unknown> {
  const json: Record<string, unknown> = {};
  for (const key of SIGNATURE_KEY_ORDER) {
    const value = signature[key];
    if (value !== undefined) {
      json[key] = value;
    }
  }
  return json;
}
