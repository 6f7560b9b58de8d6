/**
 * Alarm Config Module - Schemas and Types
 *
 * Shape of the alarm definition file. Each alarm is parsed on its own so
 * one broken entry does not take the others down.
 */
import { z } from "zod";

import { LimitSchema } from "../bands/index.js";
import { MetricKindSchema } from "../metrics/index.js";
import { RecipientEntrySchema } from "../recipients/index.js";
import type { AlarmConfig } from "../alarm/index.js";
import type { ConfigError } from "./errors.js";

/**
 * Top level of the file. Entries are validated individually.
 */
export const AlarmFileSchema = z.object({
  alarms: z.array(z.unknown()).describe("Alarm definitions"),
});

/**
 * One alarm definition as written in the file.
 */
export const AlarmEntrySchema = z.object({
  kind: MetricKindSchema,
  deviceId: z
    .string()
    .min(1, "deviceId is required")
    .describe("Home Assistant device id of the weather integration"),
  name: z.string().min(1, "name is required").describe("Alarm name"),
  recipients: z
    .array(RecipientEntrySchema)
    .min(1, "at least one recipient is required"),
  limits: z.array(LimitSchema).describe("Severity tiers, in priority order"),
});

export type AlarmEntry = z.infer<typeof AlarmEntrySchema>;

/**
 * An alarm that failed validation and will not run.
 */
export type RejectedAlarm = Readonly<{
  /** Name from the entry when it had one, otherwise "alarms[<index>]" */
  name: string;
  error: ConfigError;
}>;

/**
 * Result of loading the alarm definition file.
 */
export type LoadedAlarms = Readonly<{
  alarms: ReadonlyArray<AlarmConfig>;
  rejected: ReadonlyArray<RejectedAlarm>;
}>;
