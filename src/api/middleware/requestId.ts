/**
 * Request ID middleware - generates or propagates request ID for tracing.
 * Every request gets an ID that flows through the api log calls.
 */
import type { MiddlewareHandler } from "hono";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

/** Incoming ids longer than this, or with other characters, are replaced */
const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

const generateRequestId = (): string => crypto.randomUUID();

/**
 * Request ID middleware - attaches an ID to each request.
 * Propagates a well-formed x-request-id header if present.
 */
export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const existingId = c.req.header("x-request-id");
  const requestId =
    existingId !== undefined && REQUEST_ID_PATTERN.test(existingId)
      ? existingId
      : generateRequestId();

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  log.debug({ requestId, method: c.req.method, path: c.req.path }, "→ Request started");

  const start = Date.now();
  await next();

  log.debug(
    {
      requestId,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    },
    "✓ Request completed",
  );
};

// Type augmentation for Hono context
declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
