/**
 * Notifications Module - Public API
 *
 * Exports types, service functions, and transformations for the notifications module.
 */

// Types
export type { NotificationGateway, NotifyRequest } from "./schema.js";

export { NotifyRequestSchema } from "./schema.js";

// Error types
export type { NotificationError } from "./errors.js";

export {
  formatNotificationError,
  networkError,
  notConfigured,
  sendFailed,
} from "./errors.js";

// Service functions
export { sendNotification } from "./service.js";

// Pure transformations (for testing and external use)
export { buildNotifyRequest, buildNotifyUrl } from "./transform.js";
