/**
 * Reading Module - Schemas and Types
 *
 * One meter sample inside a payload's RD list. The schema covers the
 * structural checks; conditional rules (RI/RU field group, cumulated loss)
 * run afterwards in transform.ts.
 */
import { z } from "zod";

import { ObisStringSchema } from "../obis/schema.js";
import {
  CurrentTypeSchema,
  MeterStatusSchema,
  ReadingReasonSchema,
  UnitSchema,
} from "../values/schema.js";
import { parseTimestamp } from "../values/transform.js";

// =============================================================================
// Field Schemas
// =============================================================================

/**
 * TM: `YYYY-MM-DDThh:mm:ss,fff+hhmm S`, parsed into an OcmfTimestamp.
 */
export const OcmfTimestampSchema = z.string().transform((value, ctx) => {
  const parsed = parseTimestamp(value);
  if (parsed.isErr()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
    return z.NEVER;
  }
  return parsed.value;
});

/**
 * EF: any combination of `E` (energy) and `t` (time) error flags.
 * The empty string means no errors and is dropped.
 */
export const ErrorFlagsSchema = z
  .string()
  .regex(/^[Et]*$/, "Error flags may only contain 'E' and 't'")
  .transform((value) => (value === "" ? undefined : value));

// =============================================================================
// Reading
// =============================================================================

export const ReadingSchema = z.object({
  TM: OcmfTimestampSchema.describe("Time with synchronization status"),
  TX: ReadingReasonSchema.optional().describe("Reading reason"),
  RV: z.number().optional().describe("Reading value"),
  RI: ObisStringSchema.optional().describe("Reading identification (OBIS)"),
  RU: UnitSchema.optional().describe("Reading unit"),
  RT: CurrentTypeSchema.optional().describe("Reading current type"),
  CL: z.number().optional().describe("Cumulated loss"),
  EF: ErrorFlagsSchema.optional().describe("Error flags"),
  ST: MeterStatusSchema.describe("Meter status"),
});

export type Reading = Readonly<z.output<typeof ReadingSchema>>;

/**
 * Reading fields a sample may omit and take over from the previous one.
 */
export const INHERITED_READING_FIELDS = ["TM", "TX", "RI", "RU", "RT", "EF", "ST"] as const;

/**
 * Key order used when writing a reading back to JSON.
 */
export const READING_KEY_ORDER = [
  "TM",
  "TX",
  "RV",
  "RI",
  "RU",
  "RT",
  "CL",
  "EF",
  "ST",
] as const satisfies ReadonlyArray<keyof Reading>;
