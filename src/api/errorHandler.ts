/**
 * Global error boundary - catches all unhandled errors.
 * Never let errors bubble up without logging and a clean response.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Global error handler for Hono.
 * HTTPExceptions keep their own response; anything else is a 500.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  if (err instanceof HTTPException) {
    log.warn(
      { requestId, status: err.status, path: c.req.path, error: err.message },
      "Request rejected",
    );
    return err.getResponse();
  }

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  // Don't expose internal errors in production
  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ error: message, requestId }, 500);
};
