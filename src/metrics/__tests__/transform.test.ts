/**
 * Metrics Transform Tests
 */
import { describe, expect, it } from "vitest";

import { getValueExtractor, readNumericField } from "../transform.js";

describe("Metrics Transform", () => {
  describe("readNumericField", () => {
    it("reads numbers", () => {
      expect(readNumericField({ temperature: -3.5 }, "temperature")).toBe(-3.5);
    });

    it("reads numeric strings", () => {
      expect(readNumericField({ precipitation: "1.2" }, "precipitation")).toBe(1.2);
    });

    it("returns null for missing fields", () => {
      expect(readNumericField({}, "temperature")).toBeNull();
    });

    it("returns null for null and non-numeric values", () => {
      expect(readNumericField({ t: null }, "t")).toBeNull();
      expect(readNumericField({ t: "n/a" }, "t")).toBeNull();
      expect(readNumericField({ t: "" }, "t")).toBeNull();
      expect(readNumericField({ t: true }, "t")).toBeNull();
      expect(readNumericField({ t: Number.NaN }, "t")).toBeNull();
    });

    it("accepts zero", () => {
      expect(readNumericField({ precipitation: 0 }, "precipitation")).toBe(0);
    });
  });

  describe("getValueExtractor", () => {
    it("wind reads wind_gust_speed", () => {
      const wind = getValueExtractor("wind");

      expect(wind.extract({ wind_gust_speed: 14.2, wind_speed: 6 })).toBe(14.2);
      expect(wind.unit).toBe("m/s");
      expect(wind.title).toBe("Wind Warning");
    });

    it("rain reads precipitation", () => {
      const rain = getValueExtractor("rain");

      expect(rain.extract({ precipitation: 3 })).toBe(3);
      expect(rain.unit).toBe("mm/h");
      expect(rain.description).toBe("Precipitation");
    });

    it("temperature reads temperature", () => {
      const temperature = getValueExtractor("temperature");

      expect(temperature.extract({ temperature: "21.5" })).toBe(21.5);
      expect(temperature.unit).toBe("°C");
      expect(temperature.title).toBe("Temperature Warning");
    });
  });
});
