/**
 * Classifier Module - Schemas and Types
 *
 * The closed failure taxonomy for the sign-in handshake.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Taxonomy
// =============================================================================

/**
 * Every reason a login or authenticated call can fail.
 * Unrecognized provider errors fall back to `b2c_error` or `unknown`.
 */
export const AuthErrorCodeSchema = z.enum([
  "bot_block",
  "invalid_credentials",
  "account_locked",
  "password_reset_required",
  "access_denied",
  "b2c_error",
  "unknown",
  "http_error",
  "antiforgery_failed",
  "parse_failed",
  "confirm_failed",
  "session_not_established",
  "not_authenticated",
]);

export type AuthErrorCode = z.infer<typeof AuthErrorCodeSchema>;

/**
 * Handshake phase (or authenticated call) a failure belongs to.
 */
export const AuthStepSchema = z.enum([
  "antiforgery",
  "signin_start",
  "parse_tokens",
  "self_asserted",
  "confirm",
  "verify",
  "transport",
  "account_status",
  "list_apparatus",
]);

export type AuthStep = z.infer<typeof AuthStepSchema>;

// =============================================================================
// Classification Result
// =============================================================================

/**
 * Outcome of classifying a raw signal: a taxonomy code plus an optional
 * diagnostic hint pulled from the response.
 */
export type Classification = Readonly<{
  code: AuthErrorCode;
  hint: string | null;
}>;

/**
 * The parts of an HTTP response the classifier looks at.
 */
export type ResponseSignal = Readonly<{
  status: number;
  body: string;
  url: string;
}>;
