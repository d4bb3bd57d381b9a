/**
 * OCMF error types - one typed error union shared by every module.
 * Errors are values, not exceptions: each variant carries the context
 * (field, expected vs. actual, nested cause) needed for a precise diagnostic.
 */
import type { ZodIssue } from "zod";

export type EncodingName = "hex" | "base64";

/**
 * Errors that can occur while parsing, validating or verifying OCMF data.
 */
export type OcmfError =
  | {
      readonly type: "FORMAT_ERROR";
      readonly message: string;
    }
  | {
      readonly type: "ENCODING_ERROR";
      readonly encoding: EncodingName;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "PAYLOAD_ERROR";
      readonly field: string | null;
      readonly message: string;
      readonly cause: OcmfError | Error;
    }
  | {
      readonly type: "SIGNATURE_ERROR";
      readonly field: string | null;
      readonly message: string;
      readonly cause: OcmfError | Error;
    }
  | {
      readonly type: "VALIDATION_ERROR";
      readonly field: string;
      readonly message: string;
      readonly expected?: string;
      readonly actual?: unknown;
      readonly issues?: ReadonlyArray<ZodIssue>;
    }
  | {
      readonly type: "PUBLIC_KEY_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "SIGNATURE_VERIFICATION_ERROR";
      readonly message: string;
      readonly cause?: Error;
    };

export type OcmfErrorType = OcmfError["type"];

export type ValidationError = Extract<OcmfError, { type: "VALIDATION_ERROR" }>;

export function formatError(message: string): OcmfError {
  return { type: "FORMAT_ERROR", message };
}

export function encodingError(
  encoding: EncodingName,
  message: string,
  cause?: Error,
): OcmfError {
  if (cause) {
    return { type: "ENCODING_ERROR", encoding, message, cause };
  }
  return { type: "ENCODING_ERROR", encoding, message };
}

/**
 * Wrap a failure inside the payload section.
 * The field of a nested validation error is carried up to the section error.
 */
export function payloadError(cause: OcmfError | Error): OcmfError {
  return {
    type: "PAYLOAD_ERROR",
    field: fieldOf(cause),
    message: `Invalid payload: ${cause.message}`,
    cause,
  };
}

export function signatureSectionError(cause: OcmfError | Error): OcmfError {
  return {
    type: "SIGNATURE_ERROR",
    field: fieldOf(cause),
    message: `Invalid signature: ${cause.message}`,
    cause,
  };
}

export function validationError(
  field: string,
  message: string,
  details: Readonly<{
    expected?: string;
    actual?: unknown;
    issues?: ReadonlyArray<ZodIssue>;
  }> = {},
): ValidationError {
  return { type: "VALIDATION_ERROR", field, message, ...details };
}

export function publicKeyError(message: string, cause?: Error): OcmfError {
  if (cause) {
    return { type: "PUBLIC_KEY_ERROR", message, cause };
  }
  return { type: "PUBLIC_KEY_ERROR", message };
}

export function verificationError(message: string, cause?: Error): OcmfError {
  if (cause) {
    return { type: "SIGNATURE_VERIFICATION_ERROR", message, cause };
  }
  return { type: "SIGNATURE_VERIFICATION_ERROR", message };
}

/**
 * Render a zod issue path the way OCMF diagnostics name fields.
 *
 * @example
 * formatFieldPath(["RD", 1, "TM"]) // "RD[1].TM"
 */
export function formatFieldPath(path: ReadonlyArray<string | number>): string {
  const field = path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, "");
  return field || "(root)";
}

/**
 * Build a VALIDATION_ERROR from zod issues. The first issue names the field;
 * all issues are kept for callers that want the full list.
 */
export function fromZodIssues(
  issues: ReadonlyArray<ZodIssue>,
  basePath: ReadonlyArray<string | number> = [],
): ValidationError {
  const [first] = issues;
  if (!first) {
    return validationError(formatFieldPath(basePath), "Validation failed");
  }
  return validationError(formatFieldPath([...basePath, ...first.path]), first.message, {
    issues,
  });
}

/**
 * Turn an unknown thrown value into an Error.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

function fieldOf(cause: OcmfError | Error): string | null {
  if (cause instanceof Error) {
    return null;
  }
  switch (cause.type) {
    case "VALIDATION_ERROR":
      return cause.field;
    case "PAYLOAD_ERROR":
    case "SIGNATURE_ERROR":
      return cause.field;
    default:
      return null;
  }
}

/**
 * Format an OcmfError for logging.
 */
export function formatOcmfError(error: OcmfError): string {
  switch (error.type) {
    case "FORMAT_ERROR":
      return `Format error: ${error.message}`;
    case "ENCODING_ERROR":
      return `${error.encoding === "hex" ? "Hex" : "Base64"} decoding error: ${error.message}`;
    case "PAYLOAD_ERROR":
      return `Payload error${error.field ? ` [${error.field}]` : ""}: ${error.cause.message}`;
    case "SIGNATURE_ERROR":
      return `Signature error${error.field ? ` [${error.field}]` : ""}: ${error.cause.message}`;
    case "VALIDATION_ERROR":
      return `Validation error [${error.field}]: ${error.message}`;
    case "PUBLIC_KEY_ERROR":
      return `Public key error: ${error.message}`;
    case "SIGNATURE_VERIFICATION_ERROR":
      return `Signature verification error: ${error.message}`;
  }
}
