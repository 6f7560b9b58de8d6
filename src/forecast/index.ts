/**
 * Forecast Module - Public API
 */

// Types
export type {
  ForecastRecord,
  ForecastSample,
  ForecastSource,
  GetForecastsRequest,
} from "./schema.js";

export { ForecastRecordSchema, GetForecastsRequestSchema } from "./schema.js";

// Error types
export type { ForecastError } from "./errors.js";

export {
  formatForecastError,
  invalidResponse,
  networkError,
  notConfigured,
  requestFailed,
  timeout,
} from "./errors.js";

// Service functions
export { fetchHourlyForecast } from "./service.js";

// Pure transformations
export {
  extractForecastRecords,
  parseForecastTime,
  toForecastSamples,
} from "./transform.js";
