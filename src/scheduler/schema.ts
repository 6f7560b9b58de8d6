/**
 * Scheduler Module - Schemas and Types
 */

/**
 * An alarm left out of scheduling because its definition was invalid.
 */
export type DisabledAlarm = Readonly<{
  name: string;
  error: string;
}>;

/**
 * Scheduler state.
 */
export type SchedulerState = Readonly<{
  /** Whether the timers are running */
  isRunning: boolean;
  /** Timestamp of the last forecast check round, 0 if none */
  lastCheckAt: number;
  /** Timestamp of the last status ping tick, 0 if none */
  lastStatusTickAt: number;
}>;

export const INITIAL_SCHEDULER_STATE: SchedulerState = {
  isRunning: false,
  lastCheckAt: 0,
  lastStatusTickAt: 0,
};
