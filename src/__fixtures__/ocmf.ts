/**
 * Shared test data: a real meter record with its public key, and builders
 * for compliant readings, payload JSON and typed payloads.
 */
import type { Identification, Payload, PayloadCore } from "../payload/schema.js";
import type { Reading } from "../reading/schema.js";
import type { OcmfTimestamp } from "../values/schema.js";
import { parseTimestamp } from "../values/transform.js";

// =============================================================================
// KEBA KCP30 Record
// =============================================================================

export const KEBA_PAYLOAD =
  '{"FV":"1.0","GI":"KEBA_KCP30","GS":"17619300","GV":"2.8.5","PG":"T32","IS":false,"IL":"NONE","IF":["RFID_NONE","OCPP_NONE","ISO15118_NONE","PLMN_NONE"],"IT":"NONE","ID":"","RD":[{"TM":"2019-08-13T10:03:15,000+0000 I","TX":"B","EF":"","ST":"G","RV":0.2596,"RI":"1-b:1.8.0","RU":"kWh"},{"TM":"2019-08-13T10:03:36,000+0000 R","TX":"E","EF":"","ST":"G","RV":0.2597,"RI":"1-b:1.8.0","RU":"kWh"}]}';

export const KEBA_SIGNATURE_DATA =
  "304502200E2F107C987A300AC1695CA89EA149A8CDFA16188AF0A33EE64B67964AA943F9022100889A72B6D65364BEA8562E7F6A0253157ACFF84FE4929A93B5964D23C4265699";

export const KEBA_OCMF = `OCMF|${KEBA_PAYLOAD}|{"SD":"${KEBA_SIGNATURE_DATA}"}`;

/**
 * DER SubjectPublicKeyInfo of the KEBA meter (P-256), hex encoded.
 */
export const KEBA_PUBLIC_KEY =
  "3059301306072A8648CE3D020106082A8648CE3D030107034200043AEEB45C392357820A58FDFB0857BD77ADA31585C61C430531DFA53B440AFBFDD95AC887C658EA55260F808F55CA948DF235C2108A0D6DC7D4AB1A5E1A7955BE";

/**
 * Raw X||Y coordinates of the same key: the SPKI without its first 27 bytes
 * (DER header and the 0x04 point marker).
 */
export const KEBA_RAW_PUBLIC_KEY = KEBA_PUBLIC_KEY.slice(54);

export const KEBA_TAMPERED_OCMF = KEBA_OCMF.replace('"RV":0.2596', '"RV":999.9999');

// =============================================================================
// Builders
// =============================================================================

export function timestamp(wire: string): OcmfTimestamp {
  return parseTimestamp(wire)._unsafeUnwrap();
}

export const BEGIN_TIME = "2024-01-15T10:00:00,000+0100 S";
export const END_TIME = "2024-01-15T11:30:00,000+0100 S";

export function buildReading(overrides: Partial<Reading> = {}): Reading {
  return {
    TM: timestamp(BEGIN_TIME),
    TX: "B",
    RV: 1000.5,
    RI: "01-00:B2.08.00*FF",
    RU: "kWh",
    ST: "G",
    ...overrides,
  };
}

/**
 * Raw payload JSON value for the parser.
 */
export function buildPayloadJson(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    FV: "1.0",
    GI: "TEST_GATEWAY",
    GS: "GW-0001",
    PG: "T1",
    MS: "MS-0001",
    IS: true,
    IL: "VERIFIED",
    IF: ["RFID_PLAIN"],
    IT: "ISO14443",
    ID: "1A2B3C4D",
    RD: [
      {
        TM: BEGIN_TIME,
        TX: "B",
        RV: 1000.5,
        RI: "01-00:B2.08.00*FF",
        RU: "kWh",
        ST: "G",
      },
    ],
    ...overrides,
  };
}

/**
 * Typed payload with compliant defaults.
 */
export function buildPayload(
  overrides: Partial<PayloadCore> = {},
  identification: Identification = { IT: "ISO14443", ID: "1A2B3C4D" },
): Payload {
  return {
    FV: "1.0",
    GI: "TEST_GATEWAY",
    GS: "GW-0001",
    PG: "T1",
    MS: "MS-0001",
    IS: true,
    IL: "VERIFIED",
    IF: ["RFID_PLAIN"],
    RD: [buildReading()],
    extensions: {},
    ...overrides,
    ...identification,
  };
}

/**
 * Compliant begin/end payload pair: T1 -> T2, 1000.5 -> 1025.75 kWh.
 */
export function buildTransaction(
  begin: Partial<PayloadCore> = {},
  end: Partial<PayloadCore> = {},
): Readonly<{ begin: Payload; end: Payload }> {
  return {
    begin: buildPayload({ PG: "T1", ...begin }),
    end: buildPayload({
      PG: "T2",
      RD: [buildReading({ TM: timestamp(END_TIME), TX: "E", RV: 1025.75 })],
      ...end,
    }),
  };
}
