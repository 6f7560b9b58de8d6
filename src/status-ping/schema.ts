/**
 * Status Ping Module - Schemas and Types
 *
 * Status pings are non-alarm messages telling a recipient that the alarm
 * is alive: once at startup and once per day at a configured local time.
 */
import type { Recipient } from "../recipients/index.js";

/**
 * Why a status message is sent.
 */
export type StatusPingKind = "startup" | "daily";

/**
 * Per-recipient status ping state.
 */
export type StatusPingState = Readonly<{
  /** Local calendar date (YYYY-MM-DD) of the last status ping */
  lastSentDate: string | null;
  /** Whether the startup check has happened for this recipient */
  startupSent: boolean;
}>;

/**
 * Initial state - nothing sent since process start.
 */
export const INITIAL_STATUS_PING_STATE: StatusPingState = {
  lastSentDate: null,
  startupSent: false,
};

/**
 * Status ping state for one recipient, as exposed to the API.
 */
export type StatusPingSnapshot = Readonly<{ target: string }> &
  StatusPingState;

/**
 * Daily ping scheduler owned by a single alarm engine.
 */
export interface DailyPingScheduler {
  /** True exactly once after start, and only if the recipient asked for it */
  shouldSendStartup(recipient: Recipient): boolean;
  /** True once per local day at/after the recipient's timeOfDay; marks the day */
  shouldSendDaily(recipient: Recipient, now: number): boolean;
  /** Count today as done for the recipient */
  markSentToday(recipient: Recipient, now: number): void;
  snapshot(): ReadonlyArray<StatusPingSnapshot>;
}
