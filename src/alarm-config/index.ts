/**
 * Alarm Config Module - Public API
 */

// Types
export type {
  AlarmEntry,
  LoadedAlarms,
  RejectedAlarm,
} from "./schema.js";

export { AlarmEntrySchema, AlarmFileSchema } from "./schema.js";

// Error types
export type { ConfigError } from "./errors.js";

export { formatConfigError } from "./errors.js";

// Service functions
export { loadAlarmConfigs } from "./service.js";

// Pure transformations
export { parseAlarmEntry, parseAlarmFile } from "./transform.js";
