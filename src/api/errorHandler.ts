/**
 * Hono onError handler.
 *
 * HTTPExceptions thrown by routes keep their status and message. Anything
 * else is a bug: logged with its stack and answered with JSON 500.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId");
  const route = { requestId, method: c.req.method, path: c.req.path };

  if (err instanceof HTTPException) {
    log.warn({ ...route, status: err.status, error: err.message }, "Request rejected");
    return c.json({ error: err.message, requestId }, err.status);
  }

  log.error({ ...route, error: err.message, stack: err.stack }, "Unhandled error");

  return c.json(
    {
      error:
        config.NODE_ENV === "production" ? "Internal server error" : err.message,
      requestId,
    },
    500,
  );
};
