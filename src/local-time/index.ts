/**
 * Local Time Module - Public API
 */

// Types
export type { LocalDateTime, TimeOfDay } from "./schema.js";

export { TimeOfDaySchema } from "./schema.js";

// Pure transformations
export {
  formatLocalDateTime,
  isValidTimeZone,
  minutesSinceMidnight,
  parseTimeOfDay,
  toLocalDateTime,
} from "./transform.js";
