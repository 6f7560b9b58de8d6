/**
 * Bands Transform Tests
 */
import { describe, expect, it } from "vitest";

import { formatBandError } from "../errors.js";
import { type Band, LimitSchema } from "../schema.js";
import { limitToBand, matchBand, validateBands } from "../transform.js";

const band = (gt: number, lt: number, message = "m"): Band => ({
  gt,
  lt,
  message,
  cooldownSeconds: 60,
});

const windBands: Band[] = [
  band(10, 20, "Lite blåsigt"),
  band(20, 30, "Mycket blåsigt"),
  band(30, 40, "Jätteblåsigt!"),
  band(40, 1000, "STORM VARNING!"),
];

describe("Bands Transform", () => {
  // ===========================================================================
  // matchBand
  // ===========================================================================

  describe("matchBand", () => {
    it("returns the band containing the value", () => {
      expect(matchBand(windBands, 12)).toBe(0);
      expect(matchBand(windBands, 22)).toBe(1);
      expect(matchBand(windBands, 35)).toBe(2);
      expect(matchBand(windBands, 45)).toBe(3);
    });

    it("treats the lower bound as inclusive", () => {
      expect(matchBand(windBands, 10)).toBe(0);
      expect(matchBand(windBands, 20)).toBe(1);
    });

    it("treats the upper bound as exclusive", () => {
      expect(matchBand(windBands, 19.999)).toBe(0);
      expect(matchBand(windBands, 1000)).toBeNull();
    });

    it("returns null below the lowest band", () => {
      expect(matchBand(windBands, 8)).toBeNull();
    });

    it("returns null for values in a gap between bands", () => {
      const temperature = [band(-50, 0), band(10, 15), band(20, 40)];

      expect(matchBand(temperature, 17)).toBeNull();
      expect(matchBand(temperature, 5)).toBeNull();
    });

    it("picks the first declared band when bands overlap", () => {
      const overlapping = [band(30, 50, "severe"), band(10, 40, "mild")];

      expect(matchBand(overlapping, 35)).toBe(0);
      expect(matchBand(overlapping, 20)).toBe(1);
    });

    it("returns null for NaN", () => {
      expect(matchBand(windBands, Number.NaN)).toBeNull();
    });

    it("handles negative ranges", () => {
      expect(matchBand([band(-20, -5)], -5.5)).toBe(0);
    });
  });

  // ===========================================================================
  // validateBands
  // ===========================================================================

  describe("validateBands", () => {
    it("accepts ordered, gapped bands", () => {
      const bands = [band(0, 5), band(10, 20)];

      const result = validateBands(bands);

      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap()).toBe(bands);
    });

    it("rejects a band with gt equal to lt", () => {
      const result = validateBands([band(0, 5), band(7, 7)]);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "INVALID_RANGE",
        index: 1,
        gt: 7,
        lt: 7,
      });
    });

    it("rejects a band with gt greater than lt", () => {
      const result = validateBands([band(30, 20)]);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "INVALID_RANGE",
        index: 0,
        gt: 30,
        lt: 20,
      });
    });

    it("rejects an empty list", () => {
      expect(validateBands([])._unsafeUnwrapErr()).toEqual({
        type: "NO_BANDS",
      });
    });
  });

  // ===========================================================================
  // Limits
  // ===========================================================================

  describe("limitToBand", () => {
    it("maps msg_cooldown to cooldownSeconds", () => {
      const limit = LimitSchema.parse({
        gt: 40,
        lt: 1000,
        message: "STORM VARNING!",
        msg_cooldown: 3600,
      });

      expect(limitToBand(limit)).toEqual({
        gt: 40,
        lt: 1000,
        message: "STORM VARNING!",
        cooldownSeconds: 3600,
      });
    });

    it("defaults the cooldown to one day", () => {
      const limit = LimitSchema.parse({ gt: 1, lt: 2, message: "x" });

      expect(limitToBand(limit).cooldownSeconds).toBe(86_400);
    });
  });

  describe("formatBandError", () => {
    it("describes an invalid range", () => {
      expect(
        formatBandError({ type: "INVALID_RANGE", index: 2, gt: 5, lt: 1 }),
      ).toBe("Invalid limit range at index 2: gt=5, lt=1");
    });
  });
});
