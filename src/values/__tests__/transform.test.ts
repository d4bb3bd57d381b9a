/**
 * Values Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  compareTimestamps,
  decodeBase64,
  decodeHex,
  encodeBase64,
  encodeHex,
  formatPagination,
  formatTimestamp,
  isEndReading,
  isInvalidIdentificationLevel,
  parsePagination,
  parseTimestamp,
} from "../transform.js";

describe("Values Transform", () => {
  // ===========================================================================
  // Timestamp
  // ===========================================================================

  describe("parseTimestamp", () => {
    it("parses a UTC timestamp with status", () => {
      const result = parseTimestamp("2019-08-13T10:03:15,000+0000 I");

      expect(result._unsafeUnwrap()).toEqual({
        epochMs: 1565690595000,
        offsetMinutes: 0,
        status: "I",
      });
    });

    it("applies the UTC offset", () => {
      const result = parseTimestamp("2023-06-15T14:30:45,123+0200 S");

      expect(result._unsafeUnwrap()).toEqual({
        epochMs: 1686832245123,
        offsetMinutes: 120,
        status: "S",
      });
    });

    it("handles negative offsets", () => {
      const result = parseTimestamp("2023-06-15T09:00:45,123-0330 U");

      expect(result._unsafeUnwrap().offsetMinutes).toBe(-210);
      expect(result._unsafeUnwrap().epochMs).toBe(1686832245123);
    });

    it("rejects a period before milliseconds", () => {
      expect(parseTimestamp("2023-06-15T14:30:45.123+0200 S").isErr()).toBe(true);
    });

    it("rejects a missing status flag", () => {
      expect(parseTimestamp("2023-06-15T14:30:45,123+0200").isErr()).toBe(true);
    });

    it("rejects impossible calendar dates", () => {
      expect(parseTimestamp("2023-02-30T10:00:00,000+0000 S")._unsafeUnwrapErr()).toBe(
        "Invalid calendar date in OCMF timestamp: '2023-02-30T10:00:00,000+0000 S'",
      );
    });

    it("keeps two-digit years as written", () => {
      const timestamp = parseTimestamp("0050-01-01T00:00:00,000+0000 S")._unsafeUnwrap();

      expect(new Date(timestamp.epochMs).getUTCFullYear()).toBe(50);
      expect(formatTimestamp(timestamp)).toBe("0050-01-01T00:00:00,000+0000 S");
    });

    it("rejects out-of-range clock fields", () => {
      expect(parseTimestamp("2023-06-15T24:00:00,000+0000 S").isErr()).toBe(true);
    });
  });

  describe("formatTimestamp", () => {
    it("writes the local time with a comma before milliseconds", () => {
      expect(
        formatTimestamp({ epochMs: 1686832245123, offsetMinutes: 120, status: "S" }),
      ).toBe("2023-06-15T14:30:45,123+0200 S");
    });

    it("restores the exact wire form of a parsed timestamp", () => {
      const wire = "2023-06-15T09:00:45,007-0330 R";

      expect(formatTimestamp(parseTimestamp(wire)._unsafeUnwrap())).toBe(wire);
    });
  });

  describe("compareTimestamps", () => {
    it("orders by instant across offsets", () => {
      const berlin = parseTimestamp("2023-06-15T14:30:00,000+0200 S")._unsafeUnwrap();
      const utc = parseTimestamp("2023-06-15T12:31:00,000+0000 S")._unsafeUnwrap();

      expect(compareTimestamps(berlin, utc)).toBeLessThan(0);
      expect(compareTimestamps(utc, berlin)).toBeGreaterThan(0);
    });

    it("is zero for the same instant", () => {
      const a = parseTimestamp("2023-06-15T14:30:00,000+0200 S")._unsafeUnwrap();
      const b = parseTimestamp("2023-06-15T12:30:00,000+0000 U")._unsafeUnwrap();

      expect(compareTimestamps(a, b)).toBe(0);
    });
  });

  // ===========================================================================
  // Pagination
  // ===========================================================================

  describe("parsePagination", () => {
    it.each([
      ["T1", { context: "T", index: 1 }],
      ["T999", { context: "T", index: 999 }],
      ["F42", { context: "F", index: 42 }],
    ])("accepts %s", (token, expected) => {
      expect(parsePagination(token)._unsafeUnwrap()).toEqual(expected);
    });

    it.each(["T0", "T01", "F00", "X1", "T", "t1", "T1a"])("rejects %s", (token) => {
      expect(parsePagination(token).isErr()).toBe(true);
    });
  });

  describe("formatPagination", () => {
    it("joins context and counter", () => {
      expect(formatPagination({ context: "F", index: 7 })).toBe("F7");
    });
  });

  // ===========================================================================
  // Byte Encodings
  // ===========================================================================

  describe("decodeHex", () => {
    it("decodes upper and lower case", () => {
      expect(Array.from(decodeHex("0aFF")._unsafeUnwrap())).toEqual([10, 255]);
    });

    it("rejects non-hex characters", () => {
      expect(decodeHex("zz")._unsafeUnwrapErr()).toEqual({
        type: "ENCODING_ERROR",
        encoding: "hex",
        message: "invalid hexadecimal string",
      });
    });

    it("rejects odd length", () => {
      expect(decodeHex("abc")._unsafeUnwrapErr()).toEqual({
        type: "ENCODING_ERROR",
        encoding: "hex",
        message: "hexadecimal string has odd length",
      });
    });
  });

  describe("decodeBase64", () => {
    it("decodes padded base64", () => {
      expect(Array.from(decodeBase64("AQID")._unsafeUnwrap())).toEqual([1, 2, 3]);
      expect(Array.from(decodeBase64("AQI=")._unsafeUnwrap())).toEqual([1, 2]);
    });

    it("rejects characters outside the alphabet", () => {
      expect(decodeBase64("AQ*D")._unsafeUnwrapErr().type).toBe("ENCODING_ERROR");
    });

    it("rejects missing padding", () => {
      expect(decodeBase64("AQI").isErr()).toBe(true);
    });
  });

  describe("encodeHex / encodeBase64", () => {
    it("encode bytes", () => {
      const bytes = new Uint8Array([0, 171, 255]);

      expect(encodeHex(bytes)).toBe("00abff");
      expect(encodeBase64(bytes)).toBe("AKv/");
    });
  });

  // ===========================================================================
  // Enumeration Predicates
  // ===========================================================================

  describe("isEndReading", () => {
    it("is true for transaction-closing reasons", () => {
      expect(isEndReading("E")).toBe(true);
      expect(isEndReading("L")).toBe(true);
      expect(isEndReading("R")).toBe(true);
      expect(isEndReading("A")).toBe(true);
      expect(isEndReading("P")).toBe(true);
    });

    it("is false for begin and intermediate reasons", () => {
      expect(isEndReading("B")).toBe(false);
      expect(isEndReading("C")).toBe(false);
      expect(isEndReading("T")).toBe(false);
    });
  });

  describe("isInvalidIdentificationLevel", () => {
    it("flags failed identification levels", () => {
      expect(isInvalidIdentificationLevel("MISMATCH")).toBe(true);
      expect(isInvalidIdentificationLevel("OUTDATED")).toBe(true);
      expect(isInvalidIdentificationLevel("VERIFIED")).toBe(false);
      expect(isInvalidIdentificationLevel("NONE")).toBe(false);
    });
  });
});
