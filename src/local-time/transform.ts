/**
 * Local Time Module - Pure Transformations
 *
 * Converts epoch timestamps to wall-clock values in an IANA zone via Intl.
 */
import type { LocalDateTime } from "./schema.js";

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = formatters.get(timeZone);
  if (cached) {
    return cached;
  }

  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  });
  formatters.set(timeZone, formatter);
  return formatter;
}

/**
 * Check whether the runtime knows an IANA time zone name.
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Convert an epoch timestamp (ms) to date and time in the given zone.
 */
export function toLocalDateTime(
  timestamp: number,
  timeZone: string,
): LocalDateTime {
  const parts = getFormatter(timeZone).formatToParts(new Date(timestamp));
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "00";

  return {
    date: `${part("year")}-${part("month")}-${part("day")}`,
    hour: Number(part("hour")),
    minute: Number(part("minute")),
  };
}

/**
 * Format a timestamp as "YYYY-MM-DD HH:MM" in the given zone.
 */
export function formatLocalDateTime(
  timestamp: number,
  timeZone: string,
): string {
  const local = toLocalDateTime(timestamp, timeZone);
  const hh = local.hour.toString().padStart(2, "0");
  const mm = local.minute.toString().padStart(2, "0");
  return `${local.date} ${hh}:${mm}`;
}

/**
 * Parse "HH:MM" into minutes since midnight.
 *
 * @returns Minutes, or null if the string is not a valid 24-hour time
 */
export function parseTimeOfDay(timeOfDay: string): number | null {
  const match = /^(\d{2}):(\d{2})$/.exec(timeOfDay);
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }

  return hours * 60 + minutes;
}

/**
 * Minutes since local midnight.
 */
export function minutesSinceMidnight(local: LocalDateTime): number {
  return local.hour * 60 + local.minute;
}
