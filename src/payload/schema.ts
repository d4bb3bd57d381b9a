/**
 * Payload Module - Schemas and Types
 *
 * The JSON section between the two pipes of an OCMF string: gateway and
 * meter info, user identification, cable loss parameters, charge point
 * identity and the readings.
 */
import { isValidPhoneNumber } from "libphonenumber-js/max";
import { z } from "zod";

import type { SerialPolicy, ValidationPolicy } from "../config.js";
import { ReadingSchema } from "../reading/schema.js";
import {
  IdentificationFlagSchema,
  IdentificationLevelSchema,
  IdentificationTypeSchema,
  ResistanceUnitSchema,
} from "../values/schema.js";

// =============================================================================
// Loss Compensation
// =============================================================================

export const LossCompensationSchema = z.object({
  LN: z.string().max(20).optional().describe("Loss compensation naming"),
  LI: z.number().int().optional().describe("Loss compensation identification"),
  LR: z.number().describe("Cable resistance"),
  LU: ResistanceUnitSchema.describe("Cable resistance unit"),
});

export type LossCompensation = Readonly<z.infer<typeof LossCompensationSchema>>;

// =============================================================================
// Structure
// =============================================================================

/**
 * Structural payload schema: field presence, primitive types, enums and
 * lengths. Unknown keys are collected separately as extensions.
 */
export const PayloadStructureSchema = z.object({
  FV: z
    .union([z.string(), z.number().transform(String)])
    .optional()
    .describe("Format version"),
  GI: z.string().optional().describe("Gateway identification"),
  GS: z.string().optional().describe("Gateway serial"),
  GV: z.string().optional().describe("Gateway version"),
  PG: z.string().describe("Pagination"),
  MV: z.string().optional().describe("Meter vendor"),
  MM: z.string().optional().describe("Meter model"),
  MS: z.string().optional().describe("Meter serial"),
  MF: z.string().optional().describe("Meter firmware"),
  IS: z.boolean().describe("Identification status"),
  IL: IdentificationLevelSchema.optional().describe("Identification level"),
  IF: z.array(IdentificationFlagSchema).default([]).describe("Identification flags"),
  IT: IdentificationTypeSchema.default("NONE").describe("Identification type"),
  ID: z.string().optional().describe("Identification data"),
  TT: z.string().max(250).optional().describe("Tariff text"),
  CF: z.string().max(25).optional().describe("Charge controller firmware"),
  LC: LossCompensationSchema.optional().describe("Loss compensation"),
  CT: z
    .union([z.string(), z.number()])
    .optional()
    .transform((value) =>
      value === undefined || value === "" || value === 0 ? undefined : String(value),
    )
    .describe("Charge point identification type"),
  CI: z.string().optional().describe("Charge point identification"),
  RD: z.array(ReadingSchema).describe("Readings"),
});

export const PAYLOAD_KEY_ORDER = PayloadStructureSchema.keyof().options;

export type PayloadKey = (typeof PAYLOAD_KEY_ORDER)[number];

/**
 * Vendor extension keys, preserved verbatim in their original order.
 */
export type PayloadExtensions = Readonly<Record<string, unknown>>;

/**
 * Payload after the structural pass, before identification is refined.
 */
export type PayloadDraft = Readonly<
  z.output<typeof PayloadStructureSchema> & { extensions: PayloadExtensions }
>;

// =============================================================================
// Identification
// =============================================================================

function formatRule(pattern: RegExp) {
  return (id: string) => id === "" || pattern.test(id);
}

function formatMismatch(type: string) {
  return (id: string) => ({
    message: `ID value '${id}' does not match format for identification type '${type}'`,
  });
}

/**
 * IT/ID as a tagged variant: each identification type carries its own ID
 * format contract. An empty or absent ID is accepted for every type.
 */
export const IdentificationSchema = z.discriminatedUnion("IT", [
  z.object({
    IT: z.enum(["NONE", "DENIED", "UNDEFINED"]),
    ID: z
      .string()
      .refine((id) => id === "", {
        message: "ID must be empty when IT declares no assignment (NONE, DENIED, UNDEFINED)",
      })
      .optional(),
  }),
  z.object({
    IT: z.literal("ISO14443"),
    ID: z
      .string()
      .refine(formatRule(/^[0-9a-fA-F]{8}$|^[0-9a-fA-F]{14}$/), formatMismatch("ISO14443"))
      .optional(),
  }),
  z.object({
    IT: z.literal("ISO15693"),
    ID: z
      .string()
      .refine(formatRule(/^[0-9a-fA-F]{16}$/), formatMismatch("ISO15693"))
      .optional(),
  }),
  z.object({
    IT: z.literal("EMAID"),
    ID: z
      .string()
      .refine(formatRule(/^[A-Za-z0-9]{14,15}$/), formatMismatch("EMAID"))
      .optional(),
  }),
  z.object({
    IT: z.literal("EVCCID"),
    ID: z
      .string()
      .refine((id) => id.length <= 6, formatMismatch("EVCCID"))
      .optional(),
  }),
  z.object({
    IT: z.literal("EVCOID"),
    ID: z
      .string()
      .refine(formatRule(/^[A-Z]{2,3}-[A-Z0-9]{2,3}-[0-9]{6}-[0-9]$/), formatMismatch("EVCOID"))
      .optional(),
  }),
  z.object({
    IT: z.literal("ISO7812"),
    ID: z
      .string()
      .refine(formatRule(/^[0-9]{8,19}$/), formatMismatch("ISO7812"))
      .optional(),
  }),
  z.object({
    IT: z.literal("PHONE_NUMBER"),
    ID: z
      .string()
      .refine((id) => id === "" || isValidPhoneNumber(id), formatMismatch("PHONE_NUMBER"))
      .optional(),
  }),
  z.object({
    IT: z.enum([
      "CARD_TXN_NR",
      "CENTRAL",
      "CENTRAL_1",
      "CENTRAL_2",
      "LOCAL",
      "LOCAL_1",
      "LOCAL_2",
      "KEY_CODE",
    ]),
    ID: z.string().optional(),
  }),
]);

export type Identification = Readonly<z.output<typeof IdentificationSchema>>;

// =============================================================================
// Payload
// =============================================================================

export type PayloadCore = Omit<PayloadDraft, "IT" | "ID">;

/**
 * Fully validated payload.
 */
export type Payload = PayloadCore & Identification;

export const DEFAULT_SERIAL_POLICY: SerialPolicy = "gs-or-ms";

export const DEFAULT_VALIDATION_POLICY: ValidationPolicy = {
  serialPolicy: DEFAULT_SERIAL_POLICY,
};
