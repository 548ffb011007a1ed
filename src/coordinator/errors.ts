/**
 * Coordinator Module - Error Types
 *
 * What the host does with a failed refresh: sign in again, or wait for
 * the next tick.
 */
import {
  type ApiError,
  type AuthError,
  type SessionError,
  formatSessionError,
} from "../session/index.js";

export type CoordinatorError =
  | {
      readonly type: "REAUTH_REQUIRED";
      readonly message: string;
      readonly cause: AuthError;
    }
  | {
      readonly type: "UPDATE_FAILED";
      readonly message: string;
      readonly cause: ApiError;
    };

/**
 * Create a REAUTH_REQUIRED error.
 */
export function reauthRequired(cause: AuthError): CoordinatorError {
  return { type: "REAUTH_REQUIRED", message: formatSessionError(cause), cause };
}

/**
 * Create an UPDATE_FAILED error.
 */
export function updateFailed(cause: ApiError): CoordinatorError {
  return { type: "UPDATE_FAILED", message: formatSessionError(cause), cause };
}

/**
 * Auth failures need a new sign-in; API failures do not.
 */
export function fromSessionError(error: SessionError): CoordinatorError {
  return error.type === "AUTH_ERROR"
    ? reauthRequired(error)
    : updateFailed(error);
}

/**
 * Format a CoordinatorError for logging.
 */
export function formatCoordinatorError(error: CoordinatorError): string {
  switch (error.type) {
    case "REAUTH_REQUIRED":
      return `Re-authentication required: ${error.message}`;
    case "UPDATE_FAILED":
      return `Update failed: ${error.message}`;
  }
}
