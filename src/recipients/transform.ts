/**
 * Recipients Module - Pure Transformations
 */
import type { Recipient, RecipientEntry } from "./schema.js";

/**
 * Expand the string shorthand and fill in absent options.
 */
export function normalizeRecipient(entry: RecipientEntry): Recipient {
  if (typeof entry === "string") {
    return {
      target: entry,
      startupMessage: false,
      timeOfDay: null,
      timeZone: null,
    };
  }

  return {
    target: entry.target,
    startupMessage: entry.startupMessage,
    timeOfDay: entry.timeOfDay ?? null,
    timeZone: entry.timeZone ?? null,
  };
}

/**
 * Time zone a recipient's wall-clock values are evaluated in.
 */
export function recipientTimeZone(
  recipient: Recipient,
  defaultTimeZone: string,
): string {
  return recipient.timeZone ?? defaultTimeZone;
}

/**
 * Targets that appear more than once, in first-seen order.
 */
export function findDuplicateTargets(
  recipients: ReadonlyArray<Recipient>,
): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const { target } of recipients) {
    if (seen.has(target)) {
      duplicates.add(target);
    }
    seen.add(target);
  }

  return [...duplicates];
}
