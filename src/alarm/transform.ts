/**
 * Alarm Module - Pure Transformations
 *
 * Window scanning and message formatting. No side effects.
 */
import { type Band, type BandSet, matchBand } from "../bands/index.js";
import type { ForecastSample } from "../forecast/index.js";
import { formatLocalDateTime } from "../local-time/index.js";
import type { ValueExtractor } from "../metrics/index.js";
import type { StatusPingKind } from "../status-ping/index.js";
import type { AlarmEvent, TierOccurrence, WindowScan } from "./schema.js";

// =============================================================================
// Window Scanning
// =============================================================================

/**
 * Scan a forecast window for matched tiers.
 *
 * Samples are visited in chronological order. The first sample matching a
 * tier becomes that tier's occurrence; later matches of the same tier are
 * ignored. Samples without a value are counted as skipped.
 */
export function scanForecastWindow(
  samples: ReadonlyArray<ForecastSample>,
  bandSet: BandSet,
): WindowScan {
  const ordered = [...samples].sort((a, b) => a.timestamp - b.timestamp);
  const occurrences = new Map<number, TierOccurrence>();
  let skipped = 0;

  for (const sample of ordered) {
    if (sample.rawValue === null) {
      skipped++;
      continue;
    }

    const bandIndex = matchBand(bandSet, sample.rawValue);
    if (bandIndex === null || occurrences.has(bandIndex)) {
      continue;
    }

    occurrences.set(bandIndex, {
      bandIndex,
      timestamp: sample.timestamp,
      value: sample.rawValue,
    });
  }

  return {
    occurrences: [...occurrences.values()],
    scanned: ordered.length,
    skipped,
  };
}

/**
 * Build the event for one recipient and one tier occurrence.
 */
export function buildAlarmEvent(
  occurrence: TierOccurrence,
  band: Band,
  recipient: string,
): AlarmEvent {
  return {
    recipient,
    bandIndex: occurrence.bandIndex,
    message: band.message,
    sampleTimestamp: occurrence.timestamp,
    value: occurrence.value,
  };
}

// =============================================================================
// Message Formatting
// =============================================================================

/**
 * Title for alarm notifications, e.g. "Vind - Wind Warning".
 */
export function formatAlarmTitle(
  alarmName: string,
  extractor: ValueExtractor,
): string {
  return `${alarmName} - ${extractor.title}`;
}

/**
 * Body for alarm notifications.
 *
 * @example
 * "STORM VARNING! (45.0 m/s)\nForecast time: 2024-03-10 14:00"
 */
export function formatAlarmBody(
  event: AlarmEvent,
  extractor: ValueExtractor,
  timeZone: string,
): string {
  const reading = `${event.message} (${event.value.toFixed(1)} ${extractor.unit})`;
  const forecastTime = formatLocalDateTime(event.sampleTimestamp, timeZone);
  return `${reading}\nForecast time: ${forecastTime}`;
}

/**
 * Title for status notifications.
 */
export function formatStatusTitle(alarmName: string): string {
  return `${alarmName} - Status`;
}

/**
 * Body for status notifications.
 */
export function formatStatusBody(
  kind: StatusPingKind,
  alarmName: string,
  extractor: ValueExtractor,
  bandCount: number,
): string {
  const levels = `${bandCount} alert level${bandCount === 1 ? "" : "s"}`;
  const prefix = kind === "startup" ? "started" : "daily status";
  return `${alarmName} ${prefix}: monitoring ${extractor.description} (${levels})`;
}
