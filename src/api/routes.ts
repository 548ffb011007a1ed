/**
 * API routes for the Mobile Link propane poller.
 *
 * Read-only views over the coordinator snapshot plus a manual refresh:
 * - /api/health - Health check and last refresh outcome
 * - /api/tanks - Every published tank
 * - /api/tanks/:id - One tank by apparatus id
 * - /api/tanks/refresh - Refresh now instead of waiting for the next tick
 */
import { Hono } from "hono";

import {
  type CoordinatorError,
  describeLoginFailure,
  type TankCoordinator,
} from "../coordinator/index.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

const VERSION = "1.0.0";

/**
 * Public shape of a refresh failure. The underlying cause stays in the logs.
 */
function toErrorBody(error: CoordinatorError): {
  type: CoordinatorError["type"];
  message: string;
  reason: string | null;
} {
  return {
    type: error.type,
    message: error.message,
    reason:
      error.type === "REAUTH_REQUIRED"
        ? describeLoginFailure(error.cause)
        : null,
  };
}

export function createRoutes(
  coordinator: Pick<TankCoordinator, "getSnapshot" | "refresh">,
): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  /**
   * Health endpoint. "degraded" while the last refresh failed.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    const snapshot = coordinator.getSnapshot();

    return c.json({
      status: snapshot.lastError === null ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      requestId,
      version: VERSION,
      tankCount: snapshot.tanks.size,
      lastUpdated:
        snapshot.lastUpdated === null
          ? null
          : new Date(snapshot.lastUpdated).toISOString(),
      lastError:
        snapshot.lastError === null ? null : toErrorBody(snapshot.lastError),
    });
  });

  // ===========================================================================
  // Tanks
  // ===========================================================================

  routes.get("/api/tanks", (c) => {
    const snapshot = coordinator.getSnapshot();

    return c.json({
      tanks: [...snapshot.tanks.values()],
      lastUpdated:
        snapshot.lastUpdated === null
          ? null
          : new Date(snapshot.lastUpdated).toISOString(),
    });
  });

  /**
   * Refresh now. Registered before /:id so "refresh" is not read as an id.
   */
  routes.post("/api/tanks/refresh", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "Manual refresh requested");

    const result = await coordinator.refresh();

    if (result.isErr()) {
      const status = result.error.type === "REAUTH_REQUIRED" ? 401 : 502;
      return c.json(
        { success: false, error: toErrorBody(result.error), requestId },
        status,
      );
    }

    return c.json({
      success: true,
      tanks: [...result.value.values()],
      requestId,
    });
  });

  routes.get("/api/tanks/:id", (c) => {
    const raw = c.req.param("id");
    if (!/^\d+$/.test(raw)) {
      return c.json({ error: `Invalid apparatus id: ${raw}` }, 400);
    }

    const tank = coordinator.getSnapshot().tanks.get(Number(raw));
    if (tank === undefined) {
      return c.json({ error: `Tank ${raw} not found` }, 404);
    }

    return c.json(tank);
  });

  return routes;
}
