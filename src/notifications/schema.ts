/**
 * Notifications Module - Schemas and Types
 *
 * Defines the data shapes for Home Assistant notify service calls.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { NotificationError } from "./errors.js";

// =============================================================================
// Home Assistant notify API
// =============================================================================

/**
 * notify.<target> service call payload.
 */
export const NotifyRequestSchema = z.object({
  title: z.string().describe("Notification title"),
  message: z.string().describe("Notification body"),
});

export type NotifyRequest = z.infer<typeof NotifyRequestSchema>;

// =============================================================================
// Gateway
// =============================================================================

/**
 * Delivers one notification to one target. A failed delivery is an error
 * value; callers decide what a failure means for them.
 */
export type NotificationGateway = (
  target: string,
  title: string,
  body: string,
) => Promise<Result<void, NotificationError>>;
