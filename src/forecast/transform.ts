/**
 * Forecast Module - Pure Transformations
 *
 * Unwraps the various shapes a forecast response can take and turns
 * records into samples for one metric.
 */
import type { ValueExtractor } from "../metrics/index.js";
import type { ForecastRecord, ForecastSample } from "./schema.js";
import { ForecastRecordSchema } from "./schema.js";

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toRecords = (items: ReadonlyArray<unknown>): ForecastRecord[] =>
  items.flatMap((item) => {
    const parsed = ForecastRecordSchema.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  });

/**
 * Extract forecast records from a weather.get_forecasts response.
 *
 * Accepted shapes:
 * - `{ service_response: { "weather.x": { forecast: [...] } } }`
 * - `{ forecast: [...] }`
 * - a single record `{ datetime, ... }`
 * - a list of records, or a list whose first item holds `forecast`
 *
 * Items that are not records are dropped.
 *
 * @returns Records, or null if the shape is not recognized
 */
export function extractForecastRecords(
  response: unknown,
): ForecastRecord[] | null {
  if (Array.isArray(response)) {
    const first: unknown = response[0];
    if (isObject(first) && "forecast" in first) {
      return extractForecastRecords(first);
    }
    return toRecords(response);
  }

  if (!isObject(response)) {
    return null;
  }

  if (isObject(response.service_response)) {
    const entity = Object.values(response.service_response).find(
      (value) => isObject(value) && Array.isArray(value.forecast),
    );
    return entity === undefined ? null : extractForecastRecords(entity);
  }

  if (Array.isArray(response.forecast)) {
    return toRecords(response.forecast);
  }

  if ("datetime" in response) {
    return toRecords([response]);
  }

  return null;
}

/**
 * Parse a forecast datetime into epoch ms.
 */
export function parseForecastTime(datetime: string): number | null {
  const timestamp = Date.parse(datetime);
  return Number.isNaN(timestamp) ? null : timestamp;
}

/**
 * Turn records into chronologically ordered samples for one metric.
 * Records with an unparseable datetime are dropped.
 */
export function toForecastSamples(
  records: ReadonlyArray<ForecastRecord>,
  extractor: ValueExtractor,
): ForecastSample[] {
  return records
    .flatMap((record) => {
      const timestamp = parseForecastTime(record.datetime);
      if (timestamp === null) {
        return [];
      }
      return [{ timestamp, rawValue: extractor.extract(record) }];
    })
    .sort((a, b) => a.timestamp - b.timestamp);
}
