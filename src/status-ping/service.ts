/**
 * Status Ping Module - Service Layer
 *
 * Stateful daily ping scheduler. Driven only by wall-clock time, never by
 * forecast data.
 */
import { toLocalDateTime } from "../local-time/index.js";
import { type Recipient, recipientTimeZone } from "../recipients/index.js";
import type { DailyPingScheduler, StatusPingState } from "./schema.js";
import { INITIAL_STATUS_PING_STATE } from "./schema.js";
import { isDailyPingDue, markSentOn, markStartupSent } from "./transform.js";

/**
 * Create a scheduler for one alarm's recipients.
 *
 * @param defaultTimeZone - Zone used for recipients without their own
 */
export function createDailyPingScheduler(
  defaultTimeZone: string,
): DailyPingScheduler {
  const states = new Map<string, StatusPingState>();

  const getState = (recipient: Recipient): StatusPingState =>
    states.get(recipient.target) ?? INITIAL_STATUS_PING_STATE;

  const localDate = (recipient: Recipient, now: number) =>
    toLocalDateTime(now, recipientTimeZone(recipient, defaultTimeZone));

  return {
    shouldSendStartup(recipient) {
      const state = getState(recipient);
      if (state.startupSent) {
        return false;
      }

      states.set(recipient.target, markStartupSent(state));
      return recipient.startupMessage;
    },

    shouldSendDaily(recipient, now) {
      const state = getState(recipient);
      const local = localDate(recipient, now);

      if (!isDailyPingDue(state, recipient.timeOfDay, local)) {
        return false;
      }

      states.set(recipient.target, markSentOn(state, local.date));
      return true;
    },

    markSentToday(recipient, now) {
      const local = localDate(recipient, now);
      states.set(recipient.target, markSentOn(getState(recipient), local.date));
    },

    snapshot() {
      return [...states.entries()].map(([target, state]) => ({
        target,
        ...state,
      }));
    },
  };
}
