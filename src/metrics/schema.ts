/**
 * Metrics Module - Schemas and Types
 *
 * A value extractor turns one raw forecast record into the scalar an alarm
 * watches, plus the strings used to describe that value in messages.
 */
import { z } from "zod";

/**
 * Weather parameters an alarm can watch.
 */
export const MetricKindSchema = z
  .enum(["wind", "rain", "temperature"])
  .describe("Forecast value the alarm watches");

export type MetricKind = z.infer<typeof MetricKindSchema>;

/**
 * Raw fields of one forecast record.
 */
export type ForecastFields = Readonly<Record<string, unknown>>;

/**
 * Pulls a numeric value out of a forecast record.
 * The strings are only used for formatting, never for control flow.
 */
export type ValueExtractor = Readonly<{
  kind: MetricKind;
  /** Returns null when the value is missing or not numeric */
  extract: (fields: ForecastFields) => number | null;
  unit: string;
  description: string;
  title: string;
}>;
