/**
 * Bands Module - Pure Transformations
 *
 * Band validation and value matching. No side effects.
 */
import { type Result, err, ok } from "neverthrow";

import { type BandError, invalidRange, noBands } from "./errors.js";
import type { Band, BandSet, Limit } from "./schema.js";

/**
 * Convert a parsed limit into a band.
 */
export function limitToBand(limit: Limit): Band {
  return {
    gt: limit.gt,
    lt: limit.lt,
    message: limit.message,
    cooldownSeconds: limit.msg_cooldown,
  };
}

/**
 * Validate an ordered list of bands.
 *
 * Every band must satisfy gt < lt. Gaps and overlaps between bands are
 * allowed; overlaps resolve by declaration order in matchBand.
 */
export function validateBands(
  bands: ReadonlyArray<Band>,
): Result<BandSet, BandError> {
  if (bands.length === 0) {
    return err(noBands());
  }

  for (const [index, band] of bands.entries()) {
    if (!(band.gt < band.lt)) {
      return err(invalidRange(index, band.gt, band.lt));
    }
  }

  return ok(bands);
}

/**
 * Find the band a value falls into.
 *
 * @returns Index of the first band with gt <= value < lt, or null
 */
export function matchBand(bandSet: BandSet, value: number): number | null {
  const index = bandSet.findIndex(
    (band) => band.gt <= value && value < band.lt,
  );
  return index === -1 ? null : index;
}
