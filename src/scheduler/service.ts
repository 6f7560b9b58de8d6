/**
 * Scheduler Module - Service Layer
 *
 * Holds the running alarm engines and drives them: every engine checks the
 * forecast at startup and then every CHECK_INTERVAL_HOURS, and a shorter
 * tick sends daily status pings that are due.
 */
import type { AlarmEngine } from "../alarm/index.js";
import { schedule } from "../config.js";
import { formatForecastError } from "../forecast/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { DisabledAlarm, SchedulerState } from "./schema.js";
import { INITIAL_SCHEDULER_STATE } from "./schema.js";

const log = createLogger("scheduler");

// =============================================================================
// Module State
// =============================================================================

let engines: ReadonlyArray<AlarmEngine> = [];
let disabled: ReadonlyArray<DisabledAlarm> = [];
let state: SchedulerState = INITIAL_SCHEDULER_STATE;
let checkTimer: ReturnType<typeof setInterval> | null = null;
let statusTimer: ReturnType<typeof setInterval> | null = null;

/**
 * Replace the set of scheduled alarms.
 */
export function registerAlarms(
  enabled: ReadonlyArray<AlarmEngine>,
  rejected: ReadonlyArray<DisabledAlarm> = [],
): void {
  engines = enabled;
  disabled = rejected;
}

export function getAlarmEngines(): ReadonlyArray<AlarmEngine> {
  return engines;
}

/**
 * Find an engine by its alarm name.
 */
export function findAlarmEngine(name: string): AlarmEngine | undefined {
  return engines.find((engine) => engine.config.name === name);
}

export function getDisabledAlarms(): ReadonlyArray<DisabledAlarm> {
  return disabled;
}

export function getSchedulerState(): SchedulerState {
  return state;
}

// =============================================================================
// Scheduled Work
// =============================================================================

const errorMessage = (reason: unknown) =>
  reason instanceof Error ? reason.message : String(reason);

/**
 * Check the forecast for every alarm. Alarms run concurrently; a failure in
 * one does not affect the others.
 */
export async function runForecastChecks(): Promise<void> {
  const startTime = Date.now();
  logOperationStart(log, "forecastChecks", { alarms: engines.length });

  const results = await Promise.allSettled(
    engines.map((engine) => engine.checkForecast(Date.now())),
  );

  let failed = 0;
  for (const [index, result] of results.entries()) {
    const name = engines[index]?.config.name;

    if (result.status === "rejected") {
      failed++;
      logOperationFailed(log, "checkForecast", result.reason, { alarm: name });
    } else if (result.value.isErr()) {
      failed++;
      log.warn(
        { alarm: name, error: formatForecastError(result.value.error) },
        "Alarm check skipped",
      );
    }
  }

  state = { ...state, lastCheckAt: startTime };
  logOperationComplete(log, "forecastChecks", startTime, {
    alarms: engines.length,
    failed,
  });
}

/**
 * Send status pings that are due.
 */
export async function runStatusTick(): Promise<void> {
  const now = Date.now();

  const results = await Promise.allSettled(
    engines.map((engine) => engine.runStatusPings(now)),
  );

  for (const [index, result] of results.entries()) {
    if (result.status === "rejected") {
      log.error(
        {
          alarm: engines[index]?.config.name,
          error: errorMessage(result.reason),
        },
        "Status tick crashed",
      );
    }
  }

  state = { ...state, lastStatusTickAt: now };
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Start checking forecasts immediately and on the configured intervals.
 */
export function startScheduler(): void {
  if (state.isRunning) {
    log.warn("Scheduler already running");
    return;
  }

  log.info(
    {
      alarms: engines.map((engine) => engine.config.name),
      checkIntervalMs: schedule.checkIntervalMs,
      statusCheckIntervalMs: schedule.statusCheckIntervalMs,
    },
    "Starting scheduler...",
  );
  state = { ...state, isRunning: true };

  const check = () => {
    runForecastChecks().catch((error: unknown) => {
      log.error({ error: errorMessage(error) }, "Forecast check round failed");
    });
  };

  check();
  checkTimer = setInterval(check, schedule.checkIntervalMs);

  statusTimer = setInterval(() => {
    runStatusTick().catch((error: unknown) => {
      log.error({ error: errorMessage(error) }, "Status tick failed");
    });
  }, schedule.statusCheckIntervalMs);
}

/**
 * Stop the timers. A check already in progress runs to completion.
 */
export function stopScheduler(): void {
  if (!state.isRunning) {
    log.warn("Scheduler not running");
    return;
  }

  log.info("Stopping scheduler...");

  if (checkTimer) {
    clearInterval(checkTimer);
    checkTimer = null;
  }
  if (statusTimer) {
    clearInterval(statusTimer);
    statusTimer = null;
  }

  state = { ...state, isRunning: false };
}
