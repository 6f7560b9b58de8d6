/**
 * Weather Alarm Service - Application Entry Point
 *
 * Sets up:
 * - Alarm engines from the alarm definition file
 * - Forecast and status ping scheduling
 * - Hono API (health, alarm state, manual checks) with request ID tracing
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { createAlarmEngine } from "./alarm/index.js";
import { formatConfigError, loadAlarmConfigs } from "./alarm-config/index.js";
import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { routes } from "./api/routes.js";
import { config, getHassConfig, getNotificationConfig } from "./config.js";
import { fetchHourlyForecast } from "./forecast/index.js";
import { createLogger } from "./logger.js";
import { getValueExtractor } from "./metrics/index.js";
import { sendNotification } from "./notifications/index.js";
import {
  registerAlarms,
  startScheduler,
  stopScheduler,
} from "./scheduler/index.js";

const log = createLogger("api");

// =============================================================================
// CONFIGURATION
// =============================================================================

log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    hassUrl: config.HASS_URL,
    alarmsConfigPath: config.ALARMS_CONFIG_PATH,
    checkIntervalHours: config.CHECK_INTERVAL_HOURS,
    timeZone: config.TIMEZONE,
  },
  "Configuration loaded",
);

if (!getHassConfig()) {
  log.warn("HASS_TOKEN not set: forecasts cannot be fetched");
}

if (getNotificationConfig()) {
  log.info("Home Assistant notifications: ENABLED");
} else {
  log.info("Home Assistant notifications: DISABLED (dry run)");
}

// =============================================================================
// ALARMS
// =============================================================================

const loaded = loadAlarmConfigs(config.ALARMS_CONFIG_PATH);

if (loaded.isErr()) {
  log.fatal(
    { error: formatConfigError(loaded.error) },
    "Cannot load alarm definitions",
  );
  process.exit(1);
}

const { alarms, rejected } = loaded.value;

registerAlarms(
  alarms.map((alarmConfig) =>
    createAlarmEngine({
      config: alarmConfig,
      extractor: getValueExtractor(alarmConfig.kind),
      forecastSource: fetchHourlyForecast,
      gateway: sendNotification,
      defaultTimeZone: config.TIMEZONE,
    }),
  ),
  rejected.map(({ name, error }) => ({ name, error: formatConfigError(error) })),
);

if (alarms.length === 0) {
  log.warn("No valid alarms configured");
}

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

app.use("*", requestIdMiddleware);
app.onError(errorHandler);
app.route("/", routes);

startScheduler();

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: "0.0.0.0" },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  stopScheduler();

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
