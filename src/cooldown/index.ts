/**
 * Cooldown Module - Public API
 */

// Types
export type { CooldownEntry, CooldownState, CooldownStore } from "./schema.js";

export { INITIAL_COOLDOWN_STATE } from "./schema.js";

// Service functions
export { createCooldownStore } from "./service.js";

// Pure transformations
export {
  cooldownKey,
  getCooldownRemaining,
  isCooldownElapsed,
  recordSent,
} from "./transform.js";
