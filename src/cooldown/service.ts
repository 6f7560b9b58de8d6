/**
 * Cooldown Module - Service Layer
 *
 * Stateful cooldown store. Each alarm engine creates its own store;
 * nothing here is shared between engines.
 */
import type { BandSet } from "../bands/index.js";
import type { CooldownState, CooldownStore } from "./schema.js";
import { INITIAL_COOLDOWN_STATE } from "./schema.js";
import {
  cooldownKey,
  getCooldownRemaining,
  isCooldownElapsed,
  recordSent,
} from "./transform.js";

/**
 * Create a cooldown store for the given bands.
 *
 * Cooldown durations come from the bands, so a band index outside the set
 * is never eligible.
 */
export function createCooldownStore(bandSet: BandSet): CooldownStore {
  let state: CooldownState = INITIAL_COOLDOWN_STATE;

  const lastSentAt = (recipientId: string, bandIndex: number) =>
    state.get(cooldownKey(recipientId, bandIndex))?.lastSentAt;

  return {
    isEligible(recipientId, bandIndex, now) {
      const band = bandSet[bandIndex];
      if (!band) {
        return false;
      }
      return isCooldownElapsed(
        lastSentAt(recipientId, bandIndex),
        band.cooldownSeconds,
        now,
      );
    },

    record(recipientId, bandIndex, now) {
      state = recordSent(state, recipientId, bandIndex, now);
    },

    remainingMs(recipientId, bandIndex, now) {
      const band = bandSet[bandIndex];
      if (!band) {
        return 0;
      }
      return getCooldownRemaining(
        lastSentAt(recipientId, bandIndex),
        band.cooldownSeconds,
        now,
      );
    },

    snapshot() {
      return [...state.values()];
    },
  };
}
