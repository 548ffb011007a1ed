/**
 * Coordinator Module - Schemas and Types
 *
 * Refresh state for one account: credentials, the last tank snapshot and
 * the last failure.
 */
import type { SessionClient } from "../session/index.js";
import type { TankIndex } from "../tanks/index.js";
import type { CoordinatorError } from "./errors.js";

// =============================================================================
// Credentials
// =============================================================================

export type Credentials =
  | Readonly<{ mode: "password"; email: string; password: string }>
  | Readonly<{ mode: "cookie"; cookieHeader: string }>;

// =============================================================================
// Coordinator
// =============================================================================

export type CoordinatorOptions = Readonly<{
  client: Pick<
    SessionClient,
    "login" | "loginWithCookie" | "listApparatus" | "getSession"
  >;
  credentials: Credentials;
  /** Apparatus ids to keep; empty keeps every tank */
  selectedIds?: ReadonlyArray<number>;
}>;

export type CoordinatorSnapshot = Readonly<{
  tanks: TankIndex;
  /** Unix timestamp in ms of the last successful refresh */
  lastUpdated: number | null;
  lastError: CoordinatorError | null;
}>;

export const INITIAL_SNAPSHOT: CoordinatorSnapshot = {
  tanks: new Map(),
  lastUpdated: null,
  lastError: null,
};

// =============================================================================
// Login Failure Reasons
// =============================================================================

/**
 * User-facing reason for a failed sign-in.
 */
export type LoginFailureReason =
  | "invalid_auth"
  | "password_reset_required"
  | "account_locked"
  | "bot_block"
  | "access_denied"
  | "cannot_connect";

// =============================================================================
// Polling
// =============================================================================

export type PollingState = Readonly<{
  isRunning: boolean;
  /** Timestamp of the last poll cycle */
  lastPollTime: number;
}>;

export const INITIAL_POLLING_STATE: PollingState = {
  isRunning: false,
  lastPollTime: 0,
};
