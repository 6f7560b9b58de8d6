/**
 * Alarm Module - Public API
 */

// Types
export type {
  AlarmConfig,
  AlarmEngine,
  AlarmEngineDeps,
  AlarmEvent,
  AlarmSnapshot,
  CycleReport,
  TierOccurrence,
  WindowScan,
} from "./schema.js";

// Service functions
export { createAlarmEngine } from "./service.js";

// Pure transformations
export {
  buildAlarmEvent,
  formatAlarmBody,
  formatAlarmTitle,
  formatStatusBody,
  formatStatusTitle,
  scanForecastWindow,
} from "./transform.js";
