/**
 * Cooldown Module - Schemas and Types
 *
 * Tracks when each (recipient, tier) pair was last notified.
 */

/**
 * Last successful notification for one recipient on one tier.
 */
export type CooldownEntry = Readonly<{
  recipientId: string;
  bandIndex: number;
  /** Epoch ms of the last successful send */
  lastSentAt: number;
}>;

/**
 * Immutable cooldown state, keyed by cooldownKey().
 */
export type CooldownState = ReadonlyMap<string, CooldownEntry>;

/**
 * Initial cooldown state - every pair is eligible.
 */
export const INITIAL_COOLDOWN_STATE: CooldownState = new Map();

/**
 * Cooldown store owned by a single alarm engine.
 */
export interface CooldownStore {
  /** True if the pair was never notified or its cooldown has elapsed */
  isEligible(recipientId: string, bandIndex: number, now: number): boolean;
  /** Remember a successful notification. Call once per successful send. */
  record(recipientId: string, bandIndex: number, now: number): void;
  /** Milliseconds until the pair becomes eligible again (0 if eligible) */
  remainingMs(recipientId: string, bandIndex: number, now: number): number;
  snapshot(): ReadonlyArray<CooldownEntry>;
}
