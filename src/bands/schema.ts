/**
 * Bands Module - Schemas and Types
 *
 * A band is one severity tier: a half-open value range [gt, lt) with the
 * message and cooldown used when a forecast value falls inside it.
 */
import { z } from "zod";

/** Cooldown applied when a limit does not set msg_cooldown (one day). */
export const DEFAULT_COOLDOWN_SECONDS = 86_400;

/**
 * A limit as written in the alarm definition file.
 */
export const LimitSchema = z.object({
  gt: z.number().describe("Inclusive lower bound"),
  lt: z.number().describe("Exclusive upper bound"),
  message: z.string().min(1, "message is required").describe("Alert text"),
  msg_cooldown: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_COOLDOWN_SECONDS)
    .describe("Seconds between repeat notifications per recipient"),
});

export type Limit = z.infer<typeof LimitSchema>;

/**
 * Validated severity tier.
 */
export type Band = Readonly<{
  gt: number;
  lt: number;
  message: string;
  cooldownSeconds: number;
}>;

/**
 * Ordered tiers. Declaration order decides which band wins on overlap.
 */
export type BandSet = ReadonlyArray<Band>;
