/**
 * Notifications Module - Pure Transformations
 *
 * No side effects, no I/O - just data in, data out.
 */
import type { NotifyRequest } from "./schema.js";

/**
 * Build the notify service URL for a target.
 *
 * @param baseUrl - Home Assistant base URL without trailing slash
 * @param target - Notify service name, e.g. "mobile_app_pixel_9_pro"
 */
export function buildNotifyUrl(baseUrl: string, target: string): string {
  return `${baseUrl}/api/services/notify/${encodeURIComponent(target)}`;
}

/**
 * Build the notify service payload.
 */
export function buildNotifyRequest(
  title: string,
  message: string,
): NotifyRequest {
  return { title, message };
}
