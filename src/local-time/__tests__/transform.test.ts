/**
 * Local Time Transform Tests
 */
import { describe, expect, it } from "vitest";

import { TimeOfDaySchema } from "../schema.js";
import {
  formatLocalDateTime,
  isValidTimeZone,
  minutesSinceMidnight,
  parseTimeOfDay,
  toLocalDateTime,
} from "../transform.js";

describe("Local Time Transform", () => {
  describe("toLocalDateTime", () => {
    it("returns UTC wall-clock values", () => {
      const ts = Date.UTC(2024, 5, 15, 7, 5);

      expect(toLocalDateTime(ts, "UTC")).toEqual({
        date: "2024-06-15",
        hour: 7,
        minute: 5,
      });
    });

    it("applies summer time offset for Europe/Stockholm", () => {
      // 22:30 UTC on June 15 is 00:30 on June 16 in CEST (UTC+2)
      const ts = Date.UTC(2024, 5, 15, 22, 30);

      expect(toLocalDateTime(ts, "Europe/Stockholm")).toEqual({
        date: "2024-06-16",
        hour: 0,
        minute: 30,
      });
    });

    it("applies winter offset for Europe/Stockholm", () => {
      // 12:00 UTC in January is 13:00 CET (UTC+1)
      const ts = Date.UTC(2024, 0, 10, 12, 0);

      expect(toLocalDateTime(ts, "Europe/Stockholm")).toEqual({
        date: "2024-01-10",
        hour: 13,
        minute: 0,
      });
    });

    it("reports midnight as hour 0", () => {
      const ts = Date.UTC(2024, 2, 1, 0, 0);

      expect(toLocalDateTime(ts, "UTC").hour).toBe(0);
    });
  });

  describe("formatLocalDateTime", () => {
    it("formats as YYYY-MM-DD HH:MM", () => {
      const ts = Date.UTC(2024, 10, 3, 9, 4);

      expect(formatLocalDateTime(ts, "UTC")).toBe("2024-11-03 09:04");
    });
  });

  describe("parseTimeOfDay", () => {
    it("parses valid times into minutes since midnight", () => {
      expect(parseTimeOfDay("00:00")).toBe(0);
      expect(parseTimeOfDay("07:30")).toBe(450);
      expect(parseTimeOfDay("23:59")).toBe(1439);
    });

    it("rejects out-of-range and malformed values", () => {
      expect(parseTimeOfDay("24:00")).toBeNull();
      expect(parseTimeOfDay("12:60")).toBeNull();
      expect(parseTimeOfDay("7:30")).toBeNull();
      expect(parseTimeOfDay("noon")).toBeNull();
    });
  });

  describe("minutesSinceMidnight", () => {
    it("combines hour and minute", () => {
      expect(
        minutesSinceMidnight({ date: "2024-01-01", hour: 18, minute: 15 }),
      ).toBe(1095);
    });
  });

  describe("isValidTimeZone", () => {
    it("accepts IANA names", () => {
      expect(isValidTimeZone("Europe/Stockholm")).toBe(true);
      expect(isValidTimeZone("UTC")).toBe(true);
    });

    it("rejects unknown names", () => {
      expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
    });
  });

  describe("TimeOfDaySchema", () => {
    it("accepts 24-hour times", () => {
      expect(TimeOfDaySchema.safeParse("18:00").success).toBe(true);
    });

    it("rejects 12-hour style values", () => {
      expect(TimeOfDaySchema.safeParse("6pm").success).toBe(false);
      expect(TimeOfDaySchema.safeParse("25:00").success).toBe(false);
    });
  });
});
