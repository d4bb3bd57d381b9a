/**
 * Reading Transform Tests
 */
import { describe, expect, it } from "vitest";

import { buildReading, timestamp } from "../../__fixtures__/ocmf.js";
import {
  applyReadingInheritance,
  checkCumulatedLoss,
  checkReadingFieldGroup,
  parseReading,
  serializeReading,
} from "../transform.js";

const RAW_READING = {
  TM: "2024-01-15T10:00:00,000+0100 S",
  TX: "B",
  RV: 1000.5,
  RI: "01-00:B2.08.00*FF",
  RU: "kWh",
  ST: "G",
};

describe("Reading Transform", () => {
  // ===========================================================================
  // Structure
  // ===========================================================================

  describe("parseReading", () => {
    it("parses a complete reading", () => {
      const reading = parseReading(RAW_READING)._unsafeUnwrap();

      expect(reading).toEqual({
        TM: timestamp("2024-01-15T10:00:00,000+0100 S"),
        TX: "B",
        RV: 1000.5,
        RI: "01-00:B2.08.00*FF",
        RU: "kWh",
        ST: "G",
      });
    });

    it("drops an empty error flag string", () => {
      const reading = parseReading({ ...RAW_READING, EF: "" })._unsafeUnwrap();

      expect(reading.EF).toBeUndefined();
    });

    it("keeps non-empty error flags", () => {
      expect(parseReading({ ...RAW_READING, EF: "Et" })._unsafeUnwrap().EF).toBe("Et");
    });

    it("rejects error flags outside E and t", () => {
      const error = parseReading({ ...RAW_READING, EF: "X" }, 2)._unsafeUnwrapErr();

      expect(error.field).toBe("RD[2].EF");
      expect(error.message).toBe("Error flags may only contain 'E' and 't'");
    });

    it("rejects a timestamp with a period before milliseconds", () => {
      const error = parseReading({
        ...RAW_READING,
        TM: "2024-01-15T10:00:00.000+0100 S",
      })._unsafeUnwrapErr();

      expect(error.field).toBe("RD[0].TM");
      expect(error.message).toBe(
        "Invalid OCMF timestamp: '2024-01-15T10:00:00.000+0100 S'",
      );
    });

    it("requires a meter status", () => {
      const { ST: _status, ...withoutStatus } = RAW_READING;

      expect(parseReading(withoutStatus)._unsafeUnwrapErr().field).toBe("RD[0].ST");
    });

    it("rejects an unknown meter status", () => {
      expect(parseReading({ ...RAW_READING, ST: "Q" }).isErr()).toBe(true);
    });

    it("rejects a malformed OBIS code", () => {
      const error = parseReading({ ...RAW_READING, RI: "B2.08.00" })._unsafeUnwrapErr();

      expect(error.field).toBe("RD[0].RI");
      expect(error.message).toBe("Invalid OBIS code");
    });

    it("treats null fields as absent", () => {
      const reading = parseReading({ ...RAW_READING, CL: null, RT: null })._unsafeUnwrap();

      expect(reading.CL).toBeUndefined();
      expect(reading.RT).toBeUndefined();
    });
  });

  // ===========================================================================
  // Field Group
  // ===========================================================================

  describe("checkReadingFieldGroup", () => {
    it("accepts RI with RU and RV", () => {
      expect(checkReadingFieldGroup(buildReading(), 0).isOk()).toBe(true);
    });

    it("rejects RI without RU", () => {
      const error = checkReadingFieldGroup(buildReading({ RU: undefined }), 1)._unsafeUnwrapErr();

      expect(error).toEqual({
        type: "VALIDATION_ERROR",
        field: "RD[1].RI/RU",
        message:
          "RI (Reading Identification) and RU (Reading Unit) must both be present or both absent",
        expected: "RI and RU together",
        actual: "RI only",
      });
    });

    it("rejects RU without RI", () => {
      const error = checkReadingFieldGroup(buildReading({ RI: undefined }), 0)._unsafeUnwrapErr();

      expect(error.field).toBe("RD[0].RI/RU");
      expect(error.actual).toBe("RU only");
    });

    it("requires RU even when RI is absent", () => {
      const error = checkReadingFieldGroup(
        buildReading({ RI: undefined, RU: undefined }),
        0,
      )._unsafeUnwrapErr();

      expect(error.field).toBe("RD[0].RU");
      expect(error.message).toBe("RU (Reading Unit) is required");
    });

    it("requires RV when RI is present", () => {
      const error = checkReadingFieldGroup(buildReading({ RV: undefined }), 0)._unsafeUnwrapErr();

      expect(error.field).toBe("RD[0].RV");
    });
  });

  // ===========================================================================
  // Cumulated Loss
  // ===========================================================================

  describe("checkCumulatedLoss", () => {
    it("accepts CL=0 at begin on an accumulation register", () => {
      expect(checkCumulatedLoss(buildReading({ CL: 0 }), 0).isOk()).toBe(true);
    });

    it("accepts positive CL on an intermediate reading", () => {
      expect(checkCumulatedLoss(buildReading({ TX: "C", CL: 0.5 }), 0).isOk()).toBe(true);
    });

    it("rejects CL on a non-accumulation register", () => {
      const error = checkCumulatedLoss(
        buildReading({ RI: "01-00:16.07.00*FF", TX: "C", CL: 0.1 }),
        0,
      )._unsafeUnwrapErr();

      expect(error.field).toBe("RD[0].CL");
      expect(error.message).toBe(
        "CL (Cumulated Loss) can only appear when RI indicates an accumulation register (B0-B3, C0-C3)",
      );
    });

    it("rejects CL without RI", () => {
      expect(checkCumulatedLoss(buildReading({ RI: undefined, CL: 0 }), 0).isErr()).toBe(true);
    });

    it("rejects non-zero CL at transaction begin", () => {
      const error = checkCumulatedLoss(buildReading({ CL: 0.5 }), 0)._unsafeUnwrapErr();

      expect(error.message).toBe("CL (Cumulated Loss) must be 0 when TX=B (transaction begin)");
      expect(error.actual).toBe(0.5);
    });

    it("rejects negative CL", () => {
      const error = checkCumulatedLoss(
        buildReading({ TX: "E", CL: -0.1 }),
        3,
      )._unsafeUnwrapErr();

      expect(error.field).toBe("RD[3].CL");
      expect(error.message).toBe("CL (Cumulated Loss) must be non-negative");
    });
  });

  // ===========================================================================
  // Inheritance
  // ===========================================================================

  describe("applyReadingInheritance", () => {
    it("fills omitted fields from the previous reading", () => {
      const readings = applyReadingInheritance([
        { TM: "2024-01-15T10:00:00,000+0100 S", TX: "B", RV: 1, RI: "1-b:1.8.0", RU: "kWh", ST: "G" },
        { TM: "2024-01-15T11:00:00,000+0100 S", TX: "E", RV: 2 },
      ]);

      expect(readings[1]).toEqual({
        TM: "2024-01-15T11:00:00,000+0100 S",
        TX: "E",
        RV: 2,
        RI: "1-b:1.8.0",
        RU: "kWh",
        ST: "G",
      });
    });

    it("does not inherit values, losses or absent fields", () => {
      const readings = applyReadingInheritance([
        { TM: "2024-01-15T10:00:00,000+0100 S", RV: 1, CL: 0, RU: "kWh", ST: "G" },
        { RV: 2 },
      ]);

      expect(readings[1]).toEqual({
        TM: "2024-01-15T10:00:00,000+0100 S",
        RV: 2,
        RU: "kWh",
        ST: "G",
      });
    });

    it("carries inherited values forward across several readings", () => {
      const readings = applyReadingInheritance([{ ST: "G", RU: "Wh" }, { RV: 1 }, { RV: 2 }]);

      expect(readings[2]).toEqual({ ST: "G", RU: "Wh", RV: 2 });
    });

    it("passes non-object entries through", () => {
      expect(applyReadingInheritance(["x", { ST: "G" }])).toEqual(["x", { ST: "G" }]);
    });
  });

  // ===========================================================================
  // Serialization
  // ===========================================================================

  describe("serializeReading", () => {
    it("writes keys in wire order and omits absent fields", () => {
      const json = serializeReading(
        buildReading({ EF: "E", CL: 0, RT: "DC" }),
      );

      expect(Object.keys(json)).toEqual(["TM", "TX", "RV", "RI", "RU", "RT", "CL", "EF", "ST"]);
      expect(json["TM"]).toBe("2024-01-15T10:00:00,000+0100 S");
    });

    it("omits undefined optional fields", () => {
      expect(serializeReading(buildReading({ TX: undefined }))).toEqual({
        TM: "2024-01-15T10:00:00,000+0100 S",
        RV: 1000.5,
        RI: "01-00:B2.08.00*FF",
        RU: "kWh",
        ST: "G",
      });
    });
  });
});
