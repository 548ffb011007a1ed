/**
 * Mobile Link Propane Poller - Application Entry Point
 *
 * Sets up:
 * - Session client over a cookie-jar transport
 * - Tank coordinator and the polling loop
 * - Hono status API with request ID tracing and global error handling
 */
import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createRoutes } from "./api/routes.js";
import {
  config,
  getCredentials,
  getIdentityProviderConfig,
} from "./config.js";
import {
  createTankCoordinator,
  startPolling,
  stopPolling,
} from "./coordinator/index.js";
import { createLogger } from "./logger.js";
import { createSessionClient } from "./session/index.js";
import { createFetchTransport } from "./transport/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  MOBILE LINK PROPANE POLLER");
console.log("========================================");
console.log("");

const credentials = getCredentials();

// Log configuration summary (non-sensitive values only)
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    appUrl: config.MOBILELINK_APP_URL,
    idpUrl: config.MOBILELINK_IDP_URL,
    loginMode: credentials.mode,
    selectedTanks: config.SELECTED_TANKS,
    pollingIntervalMs: config.POLLING_INTERVAL_MS,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
  },
  "Configuration loaded",
);

// =============================================================================
// CORE WIRING
// =============================================================================

const transport = createFetchTransport({ timeoutMs: config.REQUEST_TIMEOUT_MS });

const client = createSessionClient({
  transport,
  appBaseUrl: config.MOBILELINK_APP_URL,
  identityProvider: getIdentityProviderConfig(),
});

const coordinator = createTankCoordinator({
  client,
  credentials,
  selectedIds: config.SELECTED_TANKS,
});

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

// Global middleware
app.use("*", requestIdMiddleware);

// Error handler
app.onError(errorHandler);

// Mount routes
app.route("/", createRoutes(coordinator));

// =============================================================================
// START POLLING LOOP
// =============================================================================

startPolling(coordinator, config.POLLING_INTERVAL_MS).catch((error) => {
  log.error({ error }, "Polling loop crashed");
});

// =============================================================================
// START SERVER
// =============================================================================

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0",
  },
  (info) => {
    log.info({ port: info.port, env: config.NODE_ENV }, `🚀 Status API listening on port ${info.port}`);
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  stopPolling();

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
