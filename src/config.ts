/**
 * Typed configuration - all config lives in the environment, parsed with Zod
 * at startup. The process exits immediately on invalid config.
 *
 * Only OCMF_* keys are read, so a host application's own settings never
 * reach this schema.
 *
 * OCMF toolkit configuration covering:
 * - Runtime and log level
 * - Payload validation policy (serial number rule)
 * - Eichrecht compliance policy (identification mismatch severity)
 */
import { z } from "zod";

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  OCMF_ENV: z
    .enum(["development", "production", "test"])
    .default("production")
    .describe("Runtime environment; development enables pretty logs"),
  OCMF_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Validation Policy
  // ==========================================================================
  OCMF_SERIAL_POLICY: z
    .enum(["gs-or-ms", "ms-required"])
    .default("gs-or-ms")
    .describe(
      "gs-or-ms: Gateway Serial or Meter Serial suffices; ms-required: Meter Serial is mandatory",
    ),

  // ==========================================================================
  // Compliance Policy
  // ==========================================================================
  OCMF_ID_MISMATCH_SEVERITY: z
    .enum(["warning", "error"])
    .default("warning")
    .describe("Severity of an ID mismatch between paired transaction records"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

export type SerialPolicy = Config["OCMF_SERIAL_POLICY"];
export type IssueSeverityPolicy = Config["OCMF_ID_MISMATCH_SEVERITY"];

/**
 * Payload validation policy.
 */
export type ValidationPolicy = Readonly<{
  serialPolicy: SerialPolicy;
}>;

/**
 * Eichrecht compliance policy.
 */
export type CompliancePolicy = Readonly<{
  idMismatchSeverity: IssueSeverityPolicy;
}>;

export function getValidationPolicy(): ValidationPolicy {
  return { serialPolicy: config.OCMF_SERIAL_POLICY };
}

export function getCompliancePolicy(): CompliancePolicy {
  return { idMismatchSeverity: config.OCMF_ID_MISMATCH_SEVERITY };
}
