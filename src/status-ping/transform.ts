/**
 * Status Ping Module - Pure Transformations
 */
import {
  type LocalDateTime,
  minutesSinceMidnight,
  parseTimeOfDay,
} from "../local-time/index.js";
import type { StatusPingState } from "./schema.js";

/**
 * Check whether the daily ping is due.
 *
 * Due when the local time has reached timeOfDay and no ping went out on
 * the current local date.
 *
 * @param timeOfDay - "HH:MM", or null when daily pings are disabled
 */
export function isDailyPingDue(
  state: StatusPingState,
  timeOfDay: string | null,
  local: LocalDateTime,
): boolean {
  if (timeOfDay === null) {
    return false;
  }

  const scheduledMinutes = parseTimeOfDay(timeOfDay);
  if (scheduledMinutes === null) {
    return false;
  }

  return (
    state.lastSentDate !== local.date &&
    minutesSinceMidnight(local) >= scheduledMinutes
  );
}

/**
 * Record that the startup check happened.
 */
export function markStartupSent(state: StatusPingState): StatusPingState {
  return { ...state, startupSent: true };
}

/**
 * Record a status ping for the given local date.
 */
export function markSentOn(
  state: StatusPingState,
  date: string,
): StatusPingState {
  return { ...state, lastSentDate: date };
}
