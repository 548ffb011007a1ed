/**
 * Coordinator Module - Pure Transformations
 */
import type { AuthError } from "../session/index.js";
import type { LoginFailureReason } from "./schema.js";

/**
 * User-facing reason for a failed sign-in. Codes without a reason of
 * their own read as a connection problem.
 *
 * @example
 * describeLoginFailure(authError("invalid_credentials", "self_asserted"))
 * // "invalid_auth"
 */
export function describeLoginFailure(error: AuthError): LoginFailureReason {
  switch (error.code) {
    case "invalid_credentials":
      return "invalid_auth";
    case "password_reset_required":
    case "account_locked":
    case "bot_block":
    case "access_denied":
      return error.code;
    default:
      return "cannot_connect";
  }
}
