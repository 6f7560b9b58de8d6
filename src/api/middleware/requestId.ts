/**
 * Request ID middleware.
 *
 * Reuses a caller's x-request-id when it looks sane, otherwise assigns a
 * fresh UUID. The id is echoed in the response and available to routes as
 * c.get("requestId").
 */
import { randomUUID } from "node:crypto";
import { createMiddleware } from "hono/factory";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Caller-supplied id, or undefined when absent, empty or oversized.
 */
export function acceptRequestId(header: string | undefined): string | undefined {
  const trimmed = header?.trim();
  if (!trimmed || trimmed.length > MAX_REQUEST_ID_LENGTH) {
    return undefined;
  }
  return trimmed;
}

export const requestIdMiddleware = createMiddleware(async (c, next) => {
  const requestId = acceptRequestId(c.req.header("x-request-id")) ?? randomUUID();
  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    `${c.req.method} ${c.req.path} ${c.res.status}`,
  );
});

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
