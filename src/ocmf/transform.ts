/**
 * OCMF Module - Pure Transformations
 *
 * Wire codec. Parsing keeps the payload section verbatim; serialization
 * produces value-identical, not byte-identical, output.
 */
import { err, ok, type Result } from "neverthrow";

import type { ValidationPolicy } from "../config.js";
import {
  encodingError,
  formatError,
  type OcmfError,
  payloadError,
  signatureSectionError,
  toError,
} from "../errors.js";
import { DEFAULT_VALIDATION_POLICY } from "../payload/schema.js";
import { parsePayload, serializePayload } from "../payload/transform.js";
import { parseSignature, serializeSignature } from "../signature/transform.js";
import { decodeHex, encodeHex } from "../values/transform.js";
import {
  OCMF_HEADER,
  OCMF_PREFIX,
  type Ocmf,
  type ParsedOcmf,
  type SerializeOptions,
} from "./schema.js";

// =============================================================================
// Parsing
// =============================================================================

type Sections = Readonly<{ header: string; payload: string; signature: string }>;

function decodeHexRecord(text: string): Result<string, OcmfError> {
  return decodeHex(text).andThen((bytes) => {
    try {
      return ok(new TextDecoder("utf-8", { fatal: true }).decode(bytes));
    } catch (thrown) {
      return err(encodingError("hex", "decoded bytes are not valid UTF-8", toError(thrown)));
    }
  });
}

/**
 * Split at the first two pipes. The signature section keeps any further pipes.
 */
function splitSections(text: string): Result<Sections, OcmfError> {
  const first = text.indexOf("|");
  const second = first === -1 ? -1 : text.indexOf("|", first + 1);
  if (second === -1) {
    return err(
      formatError("Expected three sections separated by '|': header, payload and signature"),
    );
  }

  const header = text.slice(0, first);
  if (header !== OCMF_HEADER) {
    return err(formatError(`Invalid header '${header}', expected '${OCMF_HEADER}'`));
  }

  return ok({
    header,
    payload: text.slice(first + 1, second),
    signature: text.slice(second + 1),
  });
}

function parseJson(text: string): Result<unknown, Error> {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (thrown) {
    return err(toError(thrown));
  }
}

/**
 * Parse an OCMF record, plain or hex-encoded.
 *
 * @example
 * parseOcmfString('OCMF|{"FV":"1.0",...}|{"SD":"3045..."}')
 */
export function parseOcmfString(
  input: string,
  policy: ValidationPolicy = DEFAULT_VALIDATION_POLICY,
): Result<ParsedOcmf, OcmfError> {
  const trimmed = input.trim();
  const text: Result<string, OcmfError> = trimmed.startsWith(OCMF_PREFIX)
    ? ok(trimmed)
    : decodeHexRecord(trimmed);

  return text.andThen(splitSections).andThen((sections): Result<ParsedOcmf, OcmfError> => {
    const payload = parseJson(sections.payload)
      .mapErr(payloadError)
      .andThen((json) => parsePayload(json, policy).mapErr(payloadError));
    if (payload.isErr()) {
      return err(payload.error);
    }

    const signature = parseJson(sections.signature)
      .mapErr(signatureSectionError)
      .andThen((json) => parseSignature(json).mapErr(signatureSectionError));
    if (signature.isErr()) {
      return err(signature.error);
    }

    return ok({
      record: { header: OCMF_HEADER, payload: payload.value, signature: signature.value },
      originalPayload: sections.payload,
    });
  });
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Compact wire form of a record. Never use the result for verification:
 * key order and number formatting may differ from the signed bytes.
 */
export function serializeOcmf(record: Ocmf, options: SerializeOptions = {}): string {
  const text = [
    record.header,
    JSON.stringify(serializePayload(record.payload)),
    JSON.stringify(serializeSignature(record.signature)),
  ].join("|");

  return options.hex ? encodeHex(new TextEncoder().encode(text)) : text;
}
