/**
 * Status Ping Module - Public API
 */

// Types
export type {
  DailyPingScheduler,
  StatusPingKind,
  StatusPingSnapshot,
  StatusPingState,
} from "./schema.js";

export { INITIAL_STATUS_PING_STATE } from "./schema.js";

// Service functions
export { createDailyPingScheduler } from "./service.js";

// Pure transformations
export { isDailyPingDue, markSentOn, markStartupSent } from "./transform.js";
