/**
 * Forecast Transform Tests
 */
import { describe, expect, it } from "vitest";

import { getValueExtractor } from "../../metrics/index.js";
import {
  extractForecastRecords,
  parseForecastTime,
  toForecastSamples,
} from "../transform.js";

const hour = (h: number) => `2024-03-10T${h.toString().padStart(2, "0")}:00:00+00:00`;

describe("Forecast Transform", () => {
  // ===========================================================================
  // extractForecastRecords
  // ===========================================================================

  describe("extractForecastRecords", () => {
    it("unwraps service_response keyed by entity", () => {
      const response = {
        changed_states: [],
        service_response: {
          "weather.smhi_home": {
            forecast: [
              { datetime: hour(1), temperature: 3 },
              { datetime: hour(2), temperature: 4 },
            ],
          },
        },
      };

      expect(extractForecastRecords(response)).toEqual([
        { datetime: hour(1), temperature: 3 },
        { datetime: hour(2), temperature: 4 },
      ]);
    });

    it("accepts a bare forecast object", () => {
      const response = { forecast: [{ datetime: hour(5), precipitation: 0.4 }] };

      expect(extractForecastRecords(response)).toEqual([
        { datetime: hour(5), precipitation: 0.4 },
      ]);
    });

    it("accepts a single record", () => {
      expect(extractForecastRecords({ datetime: hour(3), temperature: 1 })).toEqual([
        { datetime: hour(3), temperature: 1 },
      ]);
    });

    it("accepts a list whose first item holds the forecast", () => {
      const response = [{ forecast: [{ datetime: hour(7) }] }];

      expect(extractForecastRecords(response)).toEqual([{ datetime: hour(7) }]);
    });

    it("accepts a plain list of records", () => {
      const response = [{ datetime: hour(1) }, { datetime: hour(2) }];

      expect(extractForecastRecords(response)).toEqual([
        { datetime: hour(1) },
        { datetime: hour(2) },
      ]);
    });

    it("drops items that are not records", () => {
      const response = { forecast: [{ datetime: hour(1) }, "junk", null, { temperature: 5 }] };

      expect(extractForecastRecords(response)).toEqual([{ datetime: hour(1) }]);
    });

    it("returns an empty list for an empty forecast", () => {
      expect(extractForecastRecords({ forecast: [] })).toEqual([]);
    });

    it("returns null for unrecognized shapes", () => {
      expect(extractForecastRecords(null)).toBeNull();
      expect(extractForecastRecords("forecast")).toBeNull();
      expect(extractForecastRecords({ status: "ok" })).toBeNull();
      expect(extractForecastRecords({ service_response: {} })).toBeNull();
    });
  });

  // ===========================================================================
  // Samples
  // ===========================================================================

  describe("parseForecastTime", () => {
    it("parses offsets and Z suffixes", () => {
      expect(parseForecastTime("2024-03-10T12:00:00+00:00")).toBe(Date.UTC(2024, 2, 10, 12));
      expect(parseForecastTime("2024-03-10T12:00:00Z")).toBe(Date.UTC(2024, 2, 10, 12));
      expect(parseForecastTime("2024-03-10T13:00:00+01:00")).toBe(Date.UTC(2024, 2, 10, 12));
    });

    it("returns null for garbage", () => {
      expect(parseForecastTime("tomorrow")).toBeNull();
    });
  });

  describe("toForecastSamples", () => {
    const wind = getValueExtractor("wind");

    it("extracts the metric and sorts chronologically", () => {
      const samples = toForecastSamples(
        [
          { datetime: hour(3), wind_gust_speed: 22 },
          { datetime: hour(1), wind_gust_speed: 8 },
          { datetime: hour(2), wind_gust_speed: "12" },
        ],
        wind,
      );

      expect(samples).toEqual([
        { timestamp: Date.UTC(2024, 2, 10, 1), rawValue: 8 },
        { timestamp: Date.UTC(2024, 2, 10, 2), rawValue: 12 },
        { timestamp: Date.UTC(2024, 2, 10, 3), rawValue: 22 },
      ]);
    });

    it("keeps hours without the metric as absent values", () => {
      const samples = toForecastSamples([{ datetime: hour(4), temperature: 2 }], wind);

      expect(samples).toEqual([{ timestamp: Date.UTC(2024, 2, 10, 4), rawValue: null }]);
    });

    it("drops records with an unparseable datetime", () => {
      const samples = toForecastSamples(
        [
          { datetime: "soon", wind_gust_speed: 50 },
          { datetime: hour(6), wind_gust_speed: 5 },
        ],
        wind,
      );

      expect(samples).toEqual([{ timestamp: Date.UTC(2024, 2, 10, 6), rawValue: 5 }]);
    });
  });
});
