/**
 * Recipients Module - Public API
 */

// Types
export type { Recipient, RecipientEntry } from "./schema.js";

export { NotifyTargetSchema, RecipientEntrySchema } from "./schema.js";

// Pure transformations
export {
  findDuplicateTargets,
  normalizeRecipient,
  recipientTimeZone,
} from "./transform.js";
