/**
 * Alarm Module - Service Layer
 *
 * The alarm engine: evaluates forecast windows against bands, applies
 * per-recipient cooldowns, dispatches notifications and status pings.
 *
 * All state lives inside the engine instance. Operations are chained on a
 * per-engine queue so a slow forecast fetch overlapping the next tick (or a
 * manual check from the API) cannot interleave cooldown updates.
 */
import { type Result, err, ok } from "neverthrow";

import { createCooldownStore } from "../cooldown/index.js";
import {
  type ForecastError,
  type ForecastSample,
  formatForecastError,
  toForecastSamples,
} from "../forecast/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
} from "../logger.js";
import {
  type NotificationError,
  formatNotificationError,
  networkError,
} from "../notifications/index.js";
import { type Recipient, recipientTimeZone } from "../recipients/index.js";
import {
  type StatusPingKind,
  createDailyPingScheduler,
} from "../status-ping/index.js";
import type {
  AlarmEngine,
  AlarmEngineDeps,
  CycleReport,
} from "./schema.js";
import {
  buildAlarmEvent,
  formatAlarmBody,
  formatAlarmTitle,
  formatStatusBody,
  formatStatusTitle,
  scanForecastWindow,
} from "./transform.js";

const log = createLogger("alarm");

/**
 * Create an engine for one validated alarm configuration.
 */
export function createAlarmEngine(deps: AlarmEngineDeps): AlarmEngine {
  const { config, extractor, forecastSource, gateway, defaultTimeZone } = deps;

  const cooldowns = createCooldownStore(config.bands);
  const statusPings = createDailyPingScheduler(defaultTimeZone);

  let lastCycle: CycleReport | null = null;
  let lastError: string | null = null;
  let queue: Promise<unknown> = Promise.resolve();

  // ===========================================================================
  // Helpers
  // ===========================================================================

  const serialize = <T>(task: () => Promise<T>): Promise<T> => {
    const run = queue.then(task);
    queue = run.catch(() => undefined);
    return run;
  };

  /**
   * Single delivery attempt. A gateway that throws is treated like one
   * that returned an error.
   */
  const dispatch = async (
    target: string,
    title: string,
    body: string,
  ): Promise<Result<void, NotificationError>> => {
    try {
      return await gateway(target, title, body);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(
        networkError(message, error instanceof Error ? error : undefined),
      );
    }
  };

  const timeZoneOf = (recipient: Recipient) =>
    recipientTimeZone(recipient, defaultTimeZone);

  // ===========================================================================
  // Status Pings
  // ===========================================================================

  const duePingKind = (
    recipient: Recipient,
    now: number,
  ): StatusPingKind | null => {
    if (statusPings.shouldSendStartup(recipient)) {
      // The startup message counts as today's status message
      statusPings.markSentToday(recipient, now);
      return "startup";
    }
    return statusPings.shouldSendDaily(recipient, now) ? "daily" : null;
  };

  const sendStatusPings = async (now: number): Promise<number> => {
    let sent = 0;

    for (const recipient of config.recipients) {
      const kind = duePingKind(recipient, now);
      if (kind === null) {
        continue;
      }

      const result = await dispatch(
        recipient.target,
        formatStatusTitle(config.name),
        formatStatusBody(kind, config.name, extractor, config.bands.length),
      );

      if (result.isOk()) {
        sent++;
        log.info(
          { alarm: config.name, recipient: recipient.target, kind },
          "Status notification sent",
        );
      } else {
        log.warn(
          {
            alarm: config.name,
            recipient: recipient.target,
            kind,
            error: formatNotificationError(result.error),
          },
          "Status notification failed",
        );
      }
    }

    return sent;
  };

  // ===========================================================================
  // Evaluation Cycle
  // ===========================================================================

  const evaluate = async (
    samples: ReadonlyArray<ForecastSample>,
    now: number,
  ): Promise<CycleReport> => {
    const startTime = Date.now();
    const scan = scanForecastWindow(samples, config.bands);

    if (scan.skipped > 0) {
      log.debug(
        { alarm: config.name, skipped: scan.skipped, scanned: scan.scanned },
        `Samples without ${extractor.description.toLowerCase()} skipped`,
      );
    }

    let sent = 0;
    let suppressed = 0;
    let failed = 0;

    for (const occurrence of scan.occurrences) {
      const band = config.bands[occurrence.bandIndex];
      if (!band) {
        continue;
      }

      log.info(
        {
          alarm: config.name,
          bandIndex: occurrence.bandIndex,
          value: occurrence.value,
          forecastTime: new Date(occurrence.timestamp).toISOString(),
        },
        `${extractor.description} ${occurrence.value} ${extractor.unit} triggers limit: ${band.message}`,
      );

      for (const recipient of config.recipients) {
        const { target } = recipient;

        if (!cooldowns.isEligible(target, occurrence.bandIndex, now)) {
          suppressed++;
          log.debug(
            {
              alarm: config.name,
              recipient: target,
              bandIndex: occurrence.bandIndex,
              remainingSeconds: Math.ceil(
                cooldowns.remainingMs(target, occurrence.bandIndex, now) / 1000,
              ),
            },
            "Cooldown active",
          );
          continue;
        }

        const event = buildAlarmEvent(occurrence, band, target);
        const result = await dispatch(
          target,
          formatAlarmTitle(config.name, extractor),
          formatAlarmBody(event, extractor, timeZoneOf(recipient)),
        );

        if (result.isOk()) {
          cooldowns.record(target, occurrence.bandIndex, now);
          sent++;
        } else {
          failed++;
          log.error(
            {
              alarm: config.name,
              recipient: target,
              bandIndex: occurrence.bandIndex,
              error: formatNotificationError(result.error),
            },
            "Alarm notification failed",
          );
        }
      }
    }

    const statusSent = await sendStatusPings(now);

    const report: CycleReport = {
      alarm: config.name,
      evaluatedAt: now,
      samplesScanned: scan.scanned,
      samplesSkipped: scan.skipped,
      tiersMatched: scan.occurrences.map((o) => o.bandIndex),
      sent,
      suppressed,
      failed,
      statusSent,
    };

    lastCycle = report;
    logOperationComplete(log, "alarmCycle", startTime, {
      alarm: config.name,
      tiersMatched: report.tiersMatched,
      sent,
      suppressed,
      failed,
    });

    return report;
  };

  // ===========================================================================
  // Public API
  // ===========================================================================

  return {
    config,

    runCycle(samples, now) {
      return serialize(() => evaluate(samples, now));
    },

    checkForecast(now) {
      return serialize(async (): Promise<Result<CycleReport, ForecastError>> => {
        log.info(
          { alarm: config.name, deviceId: config.deviceId },
          "Checking weather forecast...",
        );

        const fetched = await forecastSource(config.deviceId);
        if (fetched.isErr()) {
          lastError = formatForecastError(fetched.error);
          logOperationFailed(log, "checkForecast", lastError, {
            alarm: config.name,
            deviceId: config.deviceId,
          });
          return err(fetched.error);
        }

        lastError = null;
        const samples = toForecastSamples(fetched.value, extractor);
        return ok(await evaluate(samples, now));
      });
    },

    runStatusPings(now) {
      return serialize(() => sendStatusPings(now));
    },

    getSnapshot() {
      return {
        name: config.name,
        kind: config.kind,
        deviceId: config.deviceId,
        recipients: config.recipients.map((r) => r.target),
        bands: config.bands,
        lastCycle,
        lastError,
        cooldowns: cooldowns.snapshot(),
        statusPings: statusPings.snapshot(),
      };
    },
  };
}
