/**
 * Scheduler Module - Public API
 */

// Types
export type { DisabledAlarm, SchedulerState } from "./schema.js";

export { INITIAL_SCHEDULER_STATE } from "./schema.js";

// Service functions
export {
  findAlarmEngine,
  getAlarmEngines,
  getDisabledAlarms,
  getSchedulerState,
  registerAlarms,
  runForecastChecks,
  runStatusTick,
  startScheduler,
  stopScheduler,
} from "./service.js";
