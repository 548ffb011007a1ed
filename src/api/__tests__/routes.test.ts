/**
 * API Routes Integration Tests
 *
 * Tests API endpoints against a stubbed coordinator.
 * Uses Hono's app.request() for realistic HTTP testing.
 */
import { Hono } from "hono";
import { err, ok } from "neverthrow";
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../config.js", () => ({
  config: {
    LOG_LEVEL: "silent",
    NODE_ENV: "test",
  },
}));

// Mock logger to prevent pino initialization issues
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Now import the modules (after mocks are set up)
import type {
  CoordinatorError,
  CoordinatorSnapshot,
  TankCoordinator,
} from "../../coordinator/index.js";
import { apiError, authError } from "../../session/index.js";
import type { PropaneTank } from "../../tanks/index.js";
import { errorHandler } from "../errorHandler.js";
import { requestIdMiddleware } from "../middleware/requestId.js";
import { createRoutes } from "../routes.js";

const TANK: PropaneTank = {
  apparatusId: 7,
  name: "House",
  fuelLevelPercent: 42.5,
  lastReading: "2024-01-05T10:00:00Z",
  capacityGallons: "500",
  isConnected: true,
  device: {
    deviceId: "dev-7",
    deviceType: null,
    batteryLevel: 90,
    status: "Online",
  },
};

const REAUTH: CoordinatorError = {
  type: "REAUTH_REQUIRED",
  message: "Auth error [account_locked at self_asserted]: Account is locked",
  cause: authError("account_locked", "self_asserted"),
};

function createApp(
  snapshot: CoordinatorSnapshot,
  refresh: TankCoordinator["refresh"] = vi.fn(),
) {
  const coordinator = { getSnapshot: () => snapshot, refresh };
  const app = new Hono();
  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", createRoutes(coordinator));
  return app;
}

const LOADED: CoordinatorSnapshot = {
  tanks: new Map([[7, TANK]]),
  lastUpdated: Date.UTC(2024, 0, 5, 10, 5),
  lastError: null,
};

describe("API Routes", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  // ===========================================================================
  // Health
  // ===========================================================================

  describe("GET /api/health", () => {
    test("reports ok after a successful refresh", async () => {
      const app = createApp(LOADED);

      const res = await app.request("/api/health");

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toMatchObject({
        status: "ok",
        version: "1.0.0",
        tankCount: 1,
        lastUpdated: "2024-01-05T10:05:00.000Z",
        lastError: null,
      });
    });

    test("reports degraded with the failure reason", async () => {
      const app = createApp({ ...LOADED, lastError: REAUTH });

      const res = await app.request("/api/health");

      const body = await res.json();
      expect(body).toMatchObject({
        status: "degraded",
        lastError: {
          type: "REAUTH_REQUIRED",
          message: REAUTH.message,
          reason: "account_locked",
        },
      });
    });

    test("echoes a well-formed request id", async () => {
      const app = createApp(LOADED);

      const res = await app.request("/api/health", {
        headers: { "x-request-id": "req-123" },
      });

      expect(res.headers.get("x-request-id")).toBe("req-123");
      expect(await res.json()).toMatchObject({ requestId: "req-123" });
    });

    test("replaces a malformed request id", async () => {
      const app = createApp(LOADED);

      const res = await app.request("/api/health", {
        headers: { "x-request-id": "bad id with spaces" },
      });

      expect(res.headers.get("x-request-id")).not.toBe("bad id with spaces");
    });
  });

  // ===========================================================================
  // Tanks
  // ===========================================================================

  describe("GET /api/tanks", () => {
    test("lists the snapshot tanks", async () => {
      const app = createApp(LOADED);

      const res = await app.request("/api/tanks");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        tanks: [TANK],
        lastUpdated: "2024-01-05T10:05:00.000Z",
      });
    });

    test("returns an empty list before the first refresh", async () => {
      const app = createApp({ tanks: new Map(), lastUpdated: null, lastError: null });

      const res = await app.request("/api/tanks");

      expect(await res.json()).toEqual({ tanks: [], lastUpdated: null });
    });
  });

  describe("GET /api/tanks/:id", () => {
    test("returns one tank", async () => {
      const app = createApp(LOADED);

      const res = await app.request("/api/tanks/7");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual(TANK);
    });

    test("returns 404 for an unknown id", async () => {
      const app = createApp(LOADED);

      const res = await app.request("/api/tanks/8");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Tank 8 not found" });
    });

    test("returns 400 for a non-numeric id", async () => {
      const app = createApp(LOADED);

      const res = await app.request("/api/tanks/abc");

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid apparatus id: abc" });
    });
  });

  describe("POST /api/tanks/refresh", () => {
    test("returns the refreshed tanks", async () => {
      const refresh = vi.fn<TankCoordinator["refresh"]>(() =>
        Promise.resolve(ok(new Map([[7, TANK]]))),
      );
      const app = createApp(LOADED, refresh);

      const res = await app.request("/api/tanks/refresh", { method: "POST" });

      expect(res.status).toBe(200);
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(await res.json()).toMatchObject({ success: true, tanks: [TANK] });
    });

    test("returns 401 when a new sign-in is needed", async () => {
      const refresh = vi.fn<TankCoordinator["refresh"]>(() =>
        Promise.resolve(err(REAUTH)),
      );
      const app = createApp(LOADED, refresh);

      const res = await app.request("/api/tanks/refresh", { method: "POST" });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({
        success: false,
        error: { type: "REAUTH_REQUIRED", reason: "account_locked" },
      });
    });

    test("returns 502 when the vendor API fails", async () => {
      const failure: CoordinatorError = {
        type: "UPDATE_FAILED",
        message: "API error HTTP 500",
        cause: apiError("Apparatus list returned HTTP 500", { status: 500 }),
      };
      const refresh = vi.fn<TankCoordinator["refresh"]>(() =>
        Promise.resolve(err(failure)),
      );
      const app = createApp(LOADED, refresh);

      const res = await app.request("/api/tanks/refresh", { method: "POST" });

      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({
        success: false,
        error: { type: "UPDATE_FAILED", message: "API error HTTP 500", reason: null },
      });
    });

    test("turns a thrown error into a 500", async () => {
      const refresh = vi.fn<TankCoordinator["refresh"]>(() =>
        Promise.reject(new Error("boom")),
      );
      const app = createApp(LOADED, refresh);

      const res = await app.request("/api/tanks/refresh", { method: "POST" });

      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({ error: "boom" });
    });
  });
});
