/**
 * Bands Module - Error Types
 */

/**
 * Errors raised while validating a band set.
 */
export type BandError =
  | {
      readonly type: "INVALID_RANGE";
      readonly index: number;
      readonly gt: number;
      readonly lt: number;
    }
  | { readonly type: "NO_BANDS" };

/**
 * Create an INVALID_RANGE error.
 */
export function invalidRange(index: number, gt: number, lt: number): BandError {
  return { type: "INVALID_RANGE", index, gt, lt };
}

/**
 * Create a NO_BANDS error.
 */
export function noBands(): BandError {
  return { type: "NO_BANDS" };
}

/**
 * Format a BandError for logging.
 */
export function formatBandError(error: BandError): string {
  switch (error.type) {
    case "INVALID_RANGE":
      return `Invalid limit range at index ${error.index}: gt=${error.gt}, lt=${error.lt}`;
    case "NO_BANDS":
      return "No limits configured";
  }
}
