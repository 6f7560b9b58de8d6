/**
 * Forecast Module - Schemas and Types
 *
 * Defines the data shapes for Home Assistant hourly weather forecasts.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { ForecastError } from "./errors.js";

// =============================================================================
// Home Assistant API
// =============================================================================

/**
 * weather.get_forecasts service call payload.
 */
export const GetForecastsRequestSchema = z.object({
  device_id: z.string().describe("Device the weather entity belongs to"),
  type: z.literal("hourly").describe("Forecast granularity"),
});

export type GetForecastsRequest = z.infer<typeof GetForecastsRequestSchema>;

/**
 * One forecast record. Every record carries an ISO datetime; the other
 * fields (temperature, precipitation, wind_gust_speed, ...) depend on the
 * weather integration and are read by value extractors.
 */
export const ForecastRecordSchema = z
  .object({
    datetime: z.string().describe("ISO 8601 start of the forecast hour"),
  })
  .passthrough();

export type ForecastRecord = z.infer<typeof ForecastRecordSchema>;

// =============================================================================
// Samples
// =============================================================================

/**
 * One hourly data point for the metric an alarm watches.
 */
export type ForecastSample = Readonly<{
  /** Epoch ms */
  timestamp: number;
  /** null when the metric is absent for that hour */
  rawValue: number | null;
}>;

/**
 * Fetches the hourly forecast for a weather device.
 */
export type ForecastSource = (
  deviceId: string,
) => Promise<Result<ReadonlyArray<ForecastRecord>, ForecastError>>;
