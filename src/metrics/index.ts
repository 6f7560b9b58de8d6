/**
 * Metrics Module - Public API
 */

// Types
export type {
  ForecastFields,
  MetricKind,
  ValueExtractor,
} from "./schema.js";

export { MetricKindSchema } from "./schema.js";

// Pure transformations
export {
  VALUE_EXTRACTORS,
  getValueExtractor,
  readNumericField,
} from "./transform.js";
