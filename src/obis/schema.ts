/**
 * OBIS Module - Schemas and Types
 *
 * OBIS codes (IEC 62056-6-1) name meter registers. OCMF readings carry them
 * in the RI field, either in the strict OCMF form (`01-00:B2.08.00*FF`) or
 * the looser IEC form (`1-b:1.8.0`).
 */
import { z } from "zod";

// =============================================================================
// Wire Grammar
// =============================================================================

/**
 * Strict OCMF form: six zero-padded upper-case hex byte pairs with suffix.
 */
export const OBIS_OCMF_PATTERN =
  /^[0-9A-F]{2}-[0-9A-F]{2}:[0-9A-F]{2}\.[0-9A-F]{2}\.[0-9A-F]{2}\*[0-9A-F]{2}$/;

/**
 * IEC 62056 form: one or two hex digits per group, optional suffix.
 */
export const OBIS_IEC_PATTERN =
  /^[0-9A-Fa-f]{1,2}-[0-9A-Fa-f]{1,2}:[0-9A-Fa-f]{1,2}\.[0-9A-Fa-f]{1,2}\.[0-9A-Fa-f]{1,2}(\*[0-9A-Fa-f]{1,3})?$/;

export const ObisStringSchema = z
  .string()
  .refine((value) => OBIS_OCMF_PATTERN.test(value) || OBIS_IEC_PATTERN.test(value), {
    message: "Invalid OBIS code",
  })
  .describe("OBIS register code in OCMF or IEC 62056 notation");

// =============================================================================
// OBIS Code
// =============================================================================

/**
 * Parsed OBIS code: the register part and the optional `*suffix`.
 */
export type ObisCode = Readonly<{
  code: string;
  suffix?: string;
}>;

// =============================================================================
// Registry Entries
// =============================================================================

export const OBIS_CATEGORIES = ["import", "export", "power", "other"] as const;

export type ObisCategory = (typeof OBIS_CATEGORIES)[number];

/**
 * Semantic information about a known register.
 */
export type ObisInfo = Readonly<{
  code: string;
  description: string;
  billingRelevant: boolean;
  category: ObisCategory;
}>;

/**
 * Outcome of checking a register for billing use.
 */
export type ObisBillingCheck =
  | { readonly billingRelevant: true; readonly info: ObisInfo | null }
  | { readonly billingRelevant: false; readonly reason: string };
