/**
 * Notifications Module - Service Layer
 *
 * Home Assistant notify integration. Cooldowns are handled by the alarm
 * engine; this layer makes a single delivery attempt per call.
 */
import { type Result, err, ok } from "neverthrow";

import { getNotificationConfig } from "../config.js";
import { createLogger } from "../logger.js";
import { networkError, notConfigured, sendFailed } from "./errors.js";
import type { NotificationError } from "./errors.js";
import { buildNotifyRequest, buildNotifyUrl } from "./transform.js";

const log = createLogger("notifications");

// =============================================================================
// Core Send Function
// =============================================================================

/**
 * Send a notification through a Home Assistant notify service.
 *
 * @param target - Notify service name
 * @param title - Notification title
 * @param message - Notification body
 * @returns Result with void on success or error
 */
export async function sendNotification(
  target: string,
  title: string,
  message: string,
): Promise<Result<void, NotificationError>> {
  const hass = getNotificationConfig();

  if (!hass) {
    return err(
      notConfigured(
        "Notifications disabled (ENABLE_NOTIFICATIONS=false or HASS_TOKEN missing)",
      ),
    );
  }

  const url = buildNotifyUrl(hass.baseUrl, target);
  const payload = buildNotifyRequest(title, message);

  log.debug({ url, target }, "Sending notification...");

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
      log.error(
        { target, statusCode: response.status, error: errorText },
        "Home Assistant notify request failed",
      );
      return err(
        sendFailed(
          `Home Assistant returned ${response.status}: ${errorText}`,
          response.status,
        ),
      );
    }

    log.info({ target, title }, "Notification sent successfully");
    return ok(undefined);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    log.error({ target, error: message }, "Failed to send notification");
    return err(
      networkError(message, error instanceof Error ? error : undefined),
    );
  }
}
