/**
 * OBIS Module - Registry and Classification
 *
 * Static lookup of the registers OCMF meters report, plus the pattern rules
 * used for codes the table does not know.
 */
import { err, ok, type Result } from "neverthrow";

import {
  OBIS_IEC_PATTERN,
  OBIS_OCMF_PATTERN,
  type ObisBillingCheck,
  type ObisCategory,
  type ObisCode,
  type ObisInfo,
} from "./schema.js";

// =============================================================================
// Registry
// =============================================================================

const ACCUMULATION_PATTERN = /^01-00:[BC][0-3]\.08\.00$/;
const TRANSACTION_PATTERN = /^01-00:[BC][23]\.08\.00$/;
const IEC_ENERGY_PATTERN = /^01-00:0[12]\.08\.00$/;

function entry(
  code: string,
  description: string,
  billingRelevant: boolean,
  category: ObisCategory,
): readonly [string, ObisInfo] {
  return [code, Object.freeze({ code, description, billingRelevant, category })];
}

/**
 * Known registers keyed by normalized code (no `*suffix`).
 * B0-B3 / C0-C3 are the OCMF reserved billing registers.
 */
export const OBIS_REGISTRY: ReadonlyMap<string, ObisInfo> = new Map([
  entry("01-00:B0.08.00", "Total Import Mains Energy (energy at meter)", true, "import"),
  entry("01-00:B1.08.00", "Total Import Device Energy (energy at device/car)", true, "import"),
  entry(
    "01-00:B2.08.00",
    "Transaction Import Mains Energy (session energy at meter)",
    true,
    "import",
  ),
  entry(
    "01-00:B3.08.00",
    "Transaction Import Device Energy (session energy at device)",
    true,
    "import",
  ),
  entry("01-00:C0.08.00", "Total Export Mains Energy", true, "export"),
  entry("01-00:C1.08.00", "Total Export Device Energy", true, "export"),
  entry("01-00:C2.08.00", "Transaction Export Mains Energy", true, "export"),
  entry("01-00:C3.08.00", "Transaction Export Device Energy", true, "export"),

  entry("01-00:00.08.06", "Charging duration (time-based)", false, "other"),
  entry("01-00:01.08.00", "Active energy import (+A) total", true, "import"),
  entry("01-00:02.08.00", "Active energy export (-A) total", true, "export"),
  entry("01-00:16.07.00", "Sum active power (total)", false, "power"),

  // Older meters
  entry("1-b:1.8.0", "Active energy import (+A) - legacy format", true, "import"),
  entry("1-b:2.8.0", "Active energy export (-A) - legacy format", true, "export"),
]);

// =============================================================================
// Parsing
// =============================================================================

/**
 * Strip the `*suffix` from an OBIS code.
 *
 * @example
 * normalizeObis("01-00:B0.08.00*FF") // "01-00:B0.08.00"
 */
export function normalizeObis(code: string): string {
  const star = code.indexOf("*");
  return star === -1 ? code : code.slice(0, star);
}

/**
 * Parse an OBIS string in either accepted notation.
 */
export function parseObis(value: string): Result<ObisCode, string> {
  if (!OBIS_OCMF_PATTERN.test(value) && !OBIS_IEC_PATTERN.test(value)) {
    return err(`Invalid OBIS code: '${value}'`);
  }

  const star = value.indexOf("*");
  if (star === -1) {
    return ok({ code: value });
  }
  return ok({ code: value.slice(0, star), suffix: value.slice(star + 1) });
}

/**
 * Render an OBIS code back to its wire form.
 */
export function formatObis(obis: ObisCode): string {
  return obis.suffix === undefined ? obis.code : `${obis.code}*${obis.suffix}`;
}

// =============================================================================
// Classification
// =============================================================================

export function getObisInfo(code: string): ObisInfo | null {
  return OBIS_REGISTRY.get(normalizeObis(code)) ?? null;
}

/**
 * True for the B0-B3 and C0-C3 energy registers, the only ones that may
 * carry a cumulated loss (CL).
 */
export function isAccumulationRegister(code: string): boolean {
  return ACCUMULATION_PATTERN.test(normalizeObis(code));
}

/**
 * True for session-scoped registers (B2, B3, C2, C3).
 */
export function isTransactionRegister(code: string): boolean {
  return TRANSACTION_PATTERN.test(normalizeObis(code));
}

export function isBillingRelevant(code: string): boolean {
  const normalized = normalizeObis(code);
  const info = OBIS_REGISTRY.get(normalized);
  if (info) {
    return info.billingRelevant;
  }
  return ACCUMULATION_PATTERN.test(normalized) || IEC_ENERGY_PATTERN.test(normalized);
}

/**
 * Check that a reading's register may be used for invoicing.
 */
export function validateObisForBilling(code: string | undefined): ObisBillingCheck {
  if (code === undefined) {
    return {
      billingRelevant: false,
      reason: "OBIS code (RI) is required for billing-relevant readings",
    };
  }

  if (!isBillingRelevant(code)) {
    return {
      billingRelevant: false,
      reason: `OBIS code '${normalizeObis(code)}' is not billing-relevant`,
    };
  }

  return { billingRelevant: true, info: getObisInfo(code) };
}
