/**
 * Local Time Module - Schemas and Types
 *
 * Wall-clock values as seen in a specific IANA time zone.
 */
import { z } from "zod";

/**
 * "HH:MM" in 24-hour notation.
 */
export const TimeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:MM (24-hour)")
  .describe("Local time of day");

export type TimeOfDay = z.infer<typeof TimeOfDaySchema>;

/**
 * A calendar date plus time of day in some time zone.
 */
export type LocalDateTime = Readonly<{
  /** Calendar date, YYYY-MM-DD */
  date: string;
  hour: number;
  minute: number;
}>;
