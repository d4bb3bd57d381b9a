/**
 * Signature Module - Schemas and Types
 *
 * The JSON section after the second pipe: algorithm, encoding, MIME type,
 * signature bytes and an optional embedded public key.
 */
import { z } from "zod";

import {
  DEFAULT_SIGNATURE_METHOD,
  SIGNATURE_MIME_TYPES,
  SignatureEncodingSchema,
} from "../values/schema.js";
import { isBase64, isHex } from "../values/transform.js";

export const SignatureSchema = z
  .object({
    SA: z
      .string()
      .default(DEFAULT_SIGNATURE_METHOD)
      .describe("Signature algorithm, ECDSA-<curve>-<hash>"),
    SE: SignatureEncodingSchema.default("hex").describe("Signature encoding"),
    SM: z.enum(SIGNATURE_MIME_TYPES).default("application/x-der").describe("Signature MIME type"),
    SD: z.string().min(1).describe("Signature data"),
    PK: z.string().optional().describe("Embedded public key"),
    KT: z.string().optional().describe("Key type"),
  })
  .superRefine((signature, ctx) => {
    const valid = signature.SE === "hex" ? isHex(signature.SD) : isBase64(signature.SD);
    if (!valid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SD"],
        message: `SD is not valid ${signature.SE}`,
      });
    }
  });

export type Signature = Readonly<z.output<typeof SignatureSchema>>;

/**
 * Key order used when writing a signature back to JSON.
 */
export const SIGNATURE_KEY_ORDER = [
  "SA",
  "SE",
  "SM",
  "SD",
  "PK",
  "KT",
] as const satisfies ReadonlyArray<keyof Signature>;
