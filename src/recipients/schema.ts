/**
 * Recipients Module - Schemas and Types
 *
 * A recipient is a Home Assistant notify target plus its status ping
 * preferences. Recipients carry no alarm state of their own.
 */
import { z } from "zod";

import { TimeOfDaySchema } from "../local-time/index.js";

/**
 * Home Assistant notify service name, e.g. "mobile_app_pixel_9_pro".
 */
export const NotifyTargetSchema = z
  .string()
  .regex(/^[a-z0-9_]+$/, "Expected a notify service name like mobile_app_phone")
  .describe("Home Assistant notify service (without the notify. prefix)");

/**
 * Recipient as written in the alarm definition file.
 * A bare string is shorthand for a recipient without status pings.
 */
export const RecipientEntrySchema = z.union([
  NotifyTargetSchema,
  z.object({
    target: NotifyTargetSchema,
    startupMessage: z
      .boolean()
      .default(false)
      .describe("Send a status message when the service starts"),
    timeOfDay: TimeOfDaySchema.optional().describe(
      "Local time for the daily status message (omit to disable)",
    ),
    timeZone: z
      .string()
      .optional()
      .describe("IANA time zone for timeOfDay (defaults to TIMEZONE)"),
  }),
]);

export type RecipientEntry = z.infer<typeof RecipientEntrySchema>;

/**
 * Normalized recipient.
 */
export type Recipient = Readonly<{
  target: string;
  startupMessage: boolean;
  /** "HH:MM", or null when no daily status message is wanted */
  timeOfDay: string | null;
  /** IANA zone, or null to use the service default */
  timeZone: string | null;
}>;
