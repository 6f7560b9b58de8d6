/**
 * Metrics Module - Pure Transformations
 */
import type {
  ForecastFields,
  MetricKind,
  ValueExtractor,
} from "./schema.js";

/**
 * Read a numeric field. Numbers and numeric strings are accepted.
 */
export function readNumericField(
  fields: ForecastFields,
  field: string,
): number | null {
  const raw = fields[field];

  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }

  if (typeof raw === "string" && raw.trim() !== "") {
    const value = Number(raw);
    return Number.isFinite(value) ? value : null;
  }

  return null;
}

const fieldExtractor =
  (field: string) =>
  (fields: ForecastFields): number | null =>
    readNumericField(fields, field);

/**
 * Extractors for every supported weather parameter.
 */
export const VALUE_EXTRACTORS: Readonly<Record<MetricKind, ValueExtractor>> = {
  wind: {
    kind: "wind",
    extract: fieldExtractor("wind_gust_speed"),
    unit: "m/s",
    description: "Wind gust speed",
    title: "Wind Warning",
  },
  rain: {
    kind: "rain",
    extract: fieldExtractor("precipitation"),
    unit: "mm/h",
    description: "Precipitation",
    title: "Rain Warning",
  },
  temperature: {
    kind: "temperature",
    extract: fieldExtractor("temperature"),
    unit: "°C",
    description: "Temperature",
    title: "Temperature Warning",
  },
};

/**
 * Get the extractor for a weather parameter.
 */
export function getValueExtractor(kind: MetricKind): ValueExtractor {
  return VALUE_EXTRACTORS[kind];
}
