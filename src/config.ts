/**
 * Typed configuration - all environment config parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Weather alarm service configuration covering:
 * - Server settings
 * - Home Assistant connection (forecasts + notify services)
 * - Alarm definition file location
 * - Scheduling intervals
 *
 * Alarm definitions themselves live in a JSON file, see alarm-config/.
 */
import { z } from "zod";
import { isValidTimeZone } from "./local-time/index.js";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional secret - empty string becomes undefined
 */
const optionalSecret = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

/** Longest delay setInterval honours; larger values fire after 1ms. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8084).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("WeatherAlarm").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Home Assistant
  // ==========================================================================
  HASS_URL: z
    .string()
    .url()
    .default("http://homeassistant.local:8123")
    .describe("Home Assistant base URL"),
  HASS_TOKEN: optionalSecret.describe("Home Assistant long-lived access token"),
  HASS_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("HTTP timeout for Home Assistant calls (ms)"),

  // ==========================================================================
  // Alarms
  // ==========================================================================
  ALARMS_CONFIG_PATH: z
    .string()
    .min(1)
    .default("./alarms.json")
    .describe("Path to the alarm definition file"),
  CHECK_INTERVAL_HOURS: z.coerce
    .number()
    .positive()
    .max(
      Math.floor(MAX_TIMER_DELAY_MS / 3_600_000),
      "CHECK_INTERVAL_HOURS must be at most 596",
    )
    .default(6)
    .describe("Hours between forecast checks"),
  STATUS_CHECK_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .max(MAX_TIMER_DELAY_MS, "STATUS_CHECK_INTERVAL_MS exceeds the timer limit")
    .default(60_000)
    .describe("Interval for checking whether daily status pings are due (ms)"),
  TIMEZONE: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, "TIMEZONE must be an IANA time zone name")
    .describe("Default time zone for recipients' daily status time"),

  // ==========================================================================
  // Feature Flags
  // ==========================================================================
  ENABLE_NOTIFICATIONS: envBoolean(true).describe(
    "Enable Home Assistant notifications (false = dry run)",
  ),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Home Assistant connection used by the forecast source.
 * Returns null if no access token is configured.
 */
export function getHassConfig(): Readonly<{
  baseUrl: string;
  token: string;
  timeoutMs: number;
}> | null {
  if (!config.HASS_TOKEN) {
    return null;
  }

  return {
    baseUrl: config.HASS_URL.replace(/\/+$/, ""),
    token: config.HASS_TOKEN,
    timeoutMs: config.HASS_TIMEOUT_MS,
  };
}

/**
 * Home Assistant connection used by the notify gateway.
 * Returns null if notifications are disabled or no token is configured.
 */
export function getNotificationConfig(): Readonly<{
  baseUrl: string;
  token: string;
  timeoutMs: number;
}> | null {
  if (!config.ENABLE_NOTIFICATIONS) {
    return null;
  }

  return getHassConfig();
}

/**
 * Scheduling configuration.
 */
export const schedule = {
  checkIntervalMs: config.CHECK_INTERVAL_HOURS * 60 * 60 * 1000,
  statusCheckIntervalMs: config.STATUS_CHECK_INTERVAL_MS,
} as const;
