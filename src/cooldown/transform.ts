/**
 * Cooldown Module - Pure Transformations
 *
 * No side effects - state in, state out.
 */
import type { CooldownEntry, CooldownState } from "./schema.js";

/**
 * Map key for a (recipient, tier) pair.
 */
export function cooldownKey(recipientId: string, bandIndex: number): string {
  return `${bandIndex}:${recipientId}`;
}

/**
 * Check if enough time has passed since the last send.
 *
 * @param lastSentAt - Epoch ms of the last send, undefined if never sent
 * @param cooldownSeconds - Required gap between sends
 * @param now - Current timestamp in ms
 */
export function isCooldownElapsed(
  lastSentAt: number | undefined,
  cooldownSeconds: number,
  now: number,
): boolean {
  if (lastSentAt === undefined) {
    return true;
  }
  return now - lastSentAt >= cooldownSeconds * 1000;
}

/**
 * Remaining cooldown in milliseconds, or 0 if not in cooldown.
 */
export function getCooldownRemaining(
  lastSentAt: number | undefined,
  cooldownSeconds: number,
  now: number,
): number {
  if (lastSentAt === undefined) {
    return 0;
  }
  return Math.max(0, cooldownSeconds * 1000 - (now - lastSentAt));
}

/**
 * Return a new state with the pair's last send set to `now`.
 */
export function recordSent(
  state: CooldownState,
  recipientId: string,
  bandIndex: number,
  now: number,
): CooldownState {
  const next = new Map(state);
  const entry: CooldownEntry = { recipientId, bandIndex, lastSentAt: now };
  next.set(cooldownKey(recipientId, bandIndex), entry);
  return next;
}
