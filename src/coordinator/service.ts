/**
 * Coordinator Module - Service Layer
 *
 * Signs in when needed, discovers tanks and keeps the last snapshot.
 * An auth failure leaves the session unauthenticated, so the next refresh
 * signs in again. Cadence belongs to the polling loop below.
 */
import { type Result, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { AuthError, Session } from "../session/index.js";
import { discoverTanks, type TankIndex } from "../tanks/index.js";
import {
  type CoordinatorError,
  formatCoordinatorError,
  fromSessionError,
  reauthRequired,
} from "./errors.js";
import {
  type CoordinatorOptions,
  type CoordinatorSnapshot,
  INITIAL_POLLING_STATE,
  INITIAL_SNAPSHOT,
  type PollingState,
} from "./schema.js";
import { describeLoginFailure } from "./transform.js";

const log = createLogger("coordinator");

export type TankCoordinator = Readonly<{
  refresh(): Promise<Result<TankIndex, CoordinatorError>>;
  getSnapshot(): CoordinatorSnapshot;
}>;

/**
 * Create the refresh coordinator for one account.
 */
export function createTankCoordinator(
  options: CoordinatorOptions,
): TankCoordinator {
  const { client, credentials, selectedIds = [] } = options;

  let snapshot: CoordinatorSnapshot = INITIAL_SNAPSHOT;
  let inFlight: Promise<Result<TankIndex, CoordinatorError>> | null = null;

  function signIn(): Promise<Result<Session, AuthError>> {
    return credentials.mode === "password"
      ? client.login(credentials.email, credentials.password)
      : client.loginWithCookie(credentials.cookieHeader);
  }

  function fail(error: CoordinatorError): Result<TankIndex, CoordinatorError> {
    snapshot = { ...snapshot, lastError: error };
    return err(error);
  }

  async function runRefresh(): Promise<Result<TankIndex, CoordinatorError>> {
    const startTime = Date.now();
    logOperationStart(log, "refresh", { mode: credentials.mode });

    if (!client.getSession().authenticated) {
      const signedIn = await signIn();
      if (signedIn.isErr()) {
        const error = reauthRequired(signedIn.error);
        logOperationFailed(log, "refresh", formatCoordinatorError(error), {
          reason: describeLoginFailure(signedIn.error),
        });
        return fail(error);
      }
    }

    const discovered = await discoverTanks(client, { selectedIds });
    if (discovered.isErr()) {
      const error = fromSessionError(discovered.error);
      logOperationFailed(log, "refresh", formatCoordinatorError(error));
      return fail(error);
    }

    snapshot = {
      tanks: discovered.value,
      lastUpdated: Date.now(),
      lastError: null,
    };
    logOperationComplete(log, "refresh", startTime, {
      tanks: discovered.value.size,
    });
    return ok(discovered.value);
  }

  /**
   * Concurrent callers share the refresh already in progress, so a manual
   * refresh never interleaves handshake steps with a polling tick.
   */
  function refresh(): Promise<Result<TankIndex, CoordinatorError>> {
    if (inFlight === null) {
      inFlight = runRefresh().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  function getSnapshot(): CoordinatorSnapshot {
    return snapshot;
  }

  return { refresh, getSnapshot };
}

// =============================================================================
// Polling Loop
// =============================================================================

let pollingState: PollingState = INITIAL_POLLING_STATE;
let stopRequested = false;
let wake: (() => void) | null = null;

export function getPollingState(): PollingState {
  return pollingState;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      wake = null;
      resolve();
    }, ms);
    wake = () => {
      clearTimeout(timer);
      wake = null;
      resolve();
    };
  });
}

/**
 * Refresh on a fixed interval until stopPolling() is called. Failures are
 * already logged by refresh(); the loop just waits for the next tick.
 */
export async function startPolling(
  coordinator: Pick<TankCoordinator, "refresh">,
  intervalMs: number,
): Promise<void> {
  if (pollingState.isRunning) {
    log.warn("Polling loop already running");
    return;
  }

  log.info({ intervalMs }, "Starting polling loop...");
  pollingState = { ...pollingState, isRunning: true };
  stopRequested = false;

  while (!stopRequested) {
    pollingState = { ...pollingState, lastPollTime: Date.now() };
    await coordinator.refresh();

    if (!stopRequested) {
      await sleep(intervalMs);
    }
  }

  log.info("Polling loop stopped");
  pollingState = { ...pollingState, isRunning: false };
}

/**
 * Stop the polling loop. An in-progress refresh finishes first.
 */
export function stopPolling(): void {
  if (!pollingState.isRunning) {
    log.warn("Polling loop not running");
    return;
  }

  log.info("Stopping polling loop...");
  stopRequested = true;
  wake?.();
}
