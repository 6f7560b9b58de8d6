/**
 * Forecast Module - Service Layer
 *
 * Side effects happen here: HTTP calls to Home Assistant's
 * weather.get_forecasts service.
 * Uses Result types for explicit error handling.
 */
import { type Result, err, ok } from "neverthrow";

import { getHassConfig } from "../config.js";
import { createLogger } from "../logger.js";
import type { ForecastError } from "./errors.js";
import {
  invalidResponse,
  networkError,
  notConfigured,
  requestFailed,
  timeout,
} from "./errors.js";
import type { ForecastRecord, GetForecastsRequest } from "./schema.js";
import { extractForecastRecords } from "./transform.js";

const log = createLogger("forecast");

// =============================================================================
// Home Assistant - weather.get_forecasts
// =============================================================================

/**
 * Fetch the hourly forecast for a weather device.
 *
 * @param deviceId - Home Assistant device id of the weather integration
 * @returns Result with forecast records or error
 */
export async function fetchHourlyForecast(
  deviceId: string,
): Promise<Result<ReadonlyArray<ForecastRecord>, ForecastError>> {
  const hass = getHassConfig();

  if (!hass) {
    return err(notConfigured("Home Assistant token missing (HASS_TOKEN)"));
  }

  const url = `${hass.baseUrl}/api/services/weather/get_forecasts?return_response`;
  const payload: GetForecastsRequest = { device_id: deviceId, type: "hourly" };

  log.debug({ url, deviceId }, "Fetching hourly forecast...");

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        Authorization: `Bearer ${hass.token}`,
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(hass.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      return err(
        requestFailed(
          `Home Assistant returned ${response.status}: ${errorText}`,
          response.status,
        ),
      );
    }

    const data: unknown = await response.json();

    const records = extractForecastRecords(data);
    if (records === null) {
      return err(
        invalidResponse("Could not extract forecast data from response", data),
      );
    }

    log.debug(
      { deviceId, records: records.length },
      "Hourly forecast fetched",
    );

    return ok(records);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    // Handle timeout specifically
    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(timeout(`No response within ${hass.timeoutMs}ms`));
    }

    return err(networkError("Failed to reach Home Assistant", cause));
  }
}
