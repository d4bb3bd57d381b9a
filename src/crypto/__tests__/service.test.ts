/**
 * Crypto Service Tests
 *
 * Keys other than the KEBA meter's are generated in-process.
 */
import { generateKeyPairSync, type KeyObject, sign } from "node:crypto";
import { describe, expect, it, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

import {
  KEBA_PAYLOAD,
  KEBA_PUBLIC_KEY,
  KEBA_RAW_PUBLIC_KEY,
  KEBA_SIGNATURE_DATA,
} from "../../__fixtures__/ocmf.js";
import { parseSignature } from "../../signature/transform.js";
import { decodePublicKey, verifySignature } from "../service.js";
import { formatPublicKey } from "../transform.js";

function ecKeyPair(namedCurve: string): { privateKey: KeyObject; der: Uint8Array } {
  const { privateKey, publicKey } = generateKeyPairSync("ec", { namedCurve });
  return { privateKey, der: new Uint8Array(publicKey.export({ type: "spki", format: "der" })) };
}

function signPayload(payload: string, privateKey: KeyObject, hash: string): Buffer {
  return sign(hash, Buffer.from(payload, "utf8"), { key: privateKey, dsaEncoding: "der" });
}

const KEBA_SIGNATURE = parseSignature({ SD: KEBA_SIGNATURE_DATA })._unsafeUnwrap();

describe("Crypto Service", () => {
  // ===========================================================================
  // decodePublicKey
  // ===========================================================================

  describe("decodePublicKey", () => {
    it("decodes a hex P-256 key", () => {
      const key = decodePublicKey(KEBA_PUBLIC_KEY)._unsafeUnwrap();

      expect(key.curve).toBe("secp256r1");
      expect(key.keySizeBits).toBe(256);
      expect(key.blockLengthBytes).toBe(32);
      expect(formatPublicKey(key)).toBe(KEBA_PUBLIC_KEY.toLowerCase());
    });

    it("decodes a base64 key", () => {
      const base64 = Buffer.from(KEBA_PUBLIC_KEY, "hex").toString("base64");

      expect(decodePublicKey(base64)._unsafeUnwrap().curve).toBe("secp256r1");
    });

    it("wraps raw 64-byte coordinates as a P-256 key", () => {
      const key = decodePublicKey(KEBA_RAW_PUBLIC_KEY)._unsafeUnwrap();

      expect(formatPublicKey(key)).toBe(KEBA_PUBLIC_KEY.toLowerCase());
    });

    it("reports secp192r1 sizes", () => {
      const key = decodePublicKey(ecKeyPair("prime192v1").der)._unsafeUnwrap();

      expect(key.curve).toBe("secp192r1");
      expect(key.keySizeBits).toBe(192);
      expect(key.blockLengthBytes).toBe(24);
    });

    it("rounds the secp521r1 block length up", () => {
      const key = decodePublicKey(ecKeyPair("secp521r1").der)._unsafeUnwrap();

      expect(key.curve).toBe("secp521r1");
      expect(key.blockLengthBytes).toBe(66);
    });

    it("names brainpool keys with the explicit spelling", () => {
      expect(decodePublicKey(ecKeyPair("brainpoolP256r1").der)._unsafeUnwrap().curve).toBe(
        "brainpoolP256r1",
      );
    });

    it("rejects text that is neither hex nor base64", () => {
      const error = decodePublicKey("not a key!")._unsafeUnwrapErr();

      expect(error.type).toBe("PUBLIC_KEY_ERROR");
      expect(error.message).toBe("Invalid public key encoding: not valid hex or base64");
    });

    it("rejects bytes that are not a DER key", () => {
      const error = decodePublicKey("00ff")._unsafeUnwrapErr();

      expect(error.type).toBe("PUBLIC_KEY_ERROR");
      expect(error.message.startsWith("Failed to parse public key:")).toBe(true);
    });

    it("rejects keys that are not elliptic curve keys", () => {
      const { publicKey } = generateKeyPairSync("ed25519");
      const der = new Uint8Array(publicKey.export({ type: "spki", format: "der" }));

      expect(decodePublicKey(der)._unsafeUnwrapErr().message).toBe(
        "Public key is not an elliptic curve key",
      );
    });
  });

  // ===========================================================================
  // verifySignature
  // ===========================================================================

  describe("verifySignature", () => {
    it("verifies the KEBA record", () => {
      expect(verifySignature(KEBA_PAYLOAD, KEBA_SIGNATURE, KEBA_PUBLIC_KEY)._unsafeUnwrap()).toBe(
        true,
      );
    });

    it("verifies with the raw key form", () => {
      expect(
        verifySignature(KEBA_PAYLOAD, KEBA_SIGNATURE, KEBA_RAW_PUBLIC_KEY)._unsafeUnwrap(),
      ).toBe(true);
    });

    it("returns false for a tampered payload", () => {
      const tampered = KEBA_PAYLOAD.replace('"RV":0.2596', '"RV":999.9999');

      expect(verifySignature(tampered, KEBA_SIGNATURE, KEBA_PUBLIC_KEY)._unsafeUnwrap()).toBe(false);
    });

    it("returns false for a different key on the same curve", () => {
      const other = ecKeyPair("prime256v1").der;

      expect(verifySignature(KEBA_PAYLOAD, KEBA_SIGNATURE, other)._unsafeUnwrap()).toBe(false);
    });

    it("verifies base64 SHA512 signatures", () => {
      const { privateKey, der } = ecKeyPair("prime256v1");
      const payload = '{"FV":"1.0","RD":[]}';
      const signature = parseSignature({
        SA: "ECDSA-secp256r1-SHA512",
        SE: "base64",
        SD: signPayload(payload, privateKey, "sha512").toString("base64"),
      })._unsafeUnwrap();

      expect(verifySignature(payload, signature, der)._unsafeUnwrap()).toBe(true);
    });

    it("verifies brainpool signatures under the short curve name", () => {
      const { privateKey, der } = ecKeyPair("brainpoolP256r1");
      const payload = '{"FV":"1.0"}';
      const signature = parseSignature({
        SA: "ECDSA-brainpool256r1-SHA256",
        SD: signPayload(payload, privateKey, "sha256").toString("hex"),
      })._unsafeUnwrap();

      expect(verifySignature(payload, signature, der)._unsafeUnwrap()).toBe(true);
    });

    it("rejects a key on another curve", () => {
      const error = verifySignature(
        KEBA_PAYLOAD,
        KEBA_SIGNATURE,
        ecKeyPair("prime192v1").der,
      )._unsafeUnwrapErr();

      expect(error.type).toBe("SIGNATURE_VERIFICATION_ERROR");
      expect(error.message).toBe(
        "Public key curve mismatch: signature algorithm specifies 'secp256r1' but public key uses 'secp192r1'",
      );
    });

    it("rejects unsupported signature methods", () => {
      const signature = parseSignature({ SA: "RSA-SHA256", SD: KEBA_SIGNATURE_DATA })._unsafeUnwrap();

      expect(verifySignature(KEBA_PAYLOAD, signature, KEBA_PUBLIC_KEY)._unsafeUnwrapErr().message).toBe(
        "Unsupported signature method: 'RSA-SHA256'",
      );
    });

    it("propagates key errors", () => {
      expect(
        verifySignature(KEBA_PAYLOAD, KEBA_SIGNATURE, "not a key!")._unsafeUnwrapErr().type,
      ).toBe("PUBLIC_KEY_ERROR");
    });
  });
});
