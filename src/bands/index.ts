/**
 * Bands Module - Public API
 */

// Types
export type { Band, BandSet, Limit } from "./schema.js";

export { DEFAULT_COOLDOWN_SECONDS, LimitSchema } from "./schema.js";

// Error types
export type { BandError } from "./errors.js";

export { formatBandError, invalidRange, noBands } from "./errors.js";

// Pure transformations
export { limitToBand, matchBand, validateBands } from "./transform.js";
