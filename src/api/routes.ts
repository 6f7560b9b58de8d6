/**
 * API routes for the weather alarm service.
 *
 * - /api/health - Health check
 * - /api/version - App version
 * - /api/alarms - Alarm state (cooldowns, status pings, last cycle)
 * - /api/alarms/:name/check - Run a forecast check now
 */
import { Hono } from "hono";
import { config, getNotificationConfig, schedule } from "../config.js";
import { formatForecastError } from "../forecast/index.js";
import { createLogger } from "../logger.js";
import {
  findAlarmEngine,
  getAlarmEngines,
  getDisabledAlarms,
} from "../scheduler/index.js";

const log = createLogger("api");

const VERSION = "1.0.0";

export const routes = new Hono();

// =============================================================================
// Health Check
// =============================================================================

/**
 * Health endpoint - returns service status.
 */
routes.get("/api/health", (c) => {
  const requestId = c.get("requestId");
  log.debug({ requestId }, "Health check");

  return c.json({
    status: "ok",
    timestamp: new Date().toISOString(),
    requestId,
    version: VERSION,
    config: {
      alarmsEnabled: getAlarmEngines().length,
      alarmsDisabled: getDisabledAlarms().length,
      checkIntervalHours: config.CHECK_INTERVAL_HOURS,
      notificationsEnabled: getNotificationConfig() !== null,
    },
  });
});

routes.get("/api/version", (c) => {
  return c.json({ version: VERSION });
});

// =============================================================================
// Alarms
// =============================================================================

routes.get("/api/alarms", (c) => {
  return c.json({
    alarms: getAlarmEngines().map((engine) => engine.getSnapshot()),
    disabled: getDisabledAlarms(),
    checkIntervalMs: schedule.checkIntervalMs,
  });
});

routes.get("/api/alarms/:name", (c) => {
  const name = c.req.param("name");
  const engine = findAlarmEngine(name);

  if (!engine) {
    return c.json({ error: `Unknown alarm: ${name}` }, 404);
  }

  return c.json(engine.getSnapshot());
});

/**
 * Manual forecast check. Shares the engine's queue with the scheduler, so
 * cooldowns behave as for a scheduled check.
 */
routes.post("/api/alarms/:name/check", async (c) => {
  const requestId = c.get("requestId");
  const name = c.req.param("name");
  const engine = findAlarmEngine(name);

  if (!engine) {
    return c.json({ error: `Unknown alarm: ${name}`, requestId }, 404);
  }

  log.info({ requestId, alarm: name }, "POST /api/alarms/:name/check");

  const result = await engine.checkForecast(Date.now());

  if (result.isErr()) {
    const error = formatForecastError(result.error);
    log.error({ requestId, alarm: name, error }, "Manual check failed");
    return c.json({ error, requestId }, 502);
  }

  return c.json({ report: result.value, requestId });
});
