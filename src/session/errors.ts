/**
 * Session Module - Error Types
 *
 * Two families, never conflated:
 * - AuthError: session, credential and identity-provider failures
 * - ApiError: failures of a data endpoint once signed in
 */
import type { AuthErrorCode, AuthStep, Classification } from "../classifier/index.js";

export type AuthError = Readonly<{
  type: "AUTH_ERROR";
  code: AuthErrorCode;
  step: AuthStep;
  message: string;
  status?: number;
  hint?: string;
}>;

export type ApiError = Readonly<{
  type: "API_ERROR";
  message: string;
  status?: number;
  /** Start of the raw response body */
  bodyExcerpt?: string;
  cause?: Error;
}>;

export type SessionError = AuthError | ApiError;

/**
 * Operator-facing text per code.
 */
const AUTH_ERROR_MESSAGES: Readonly<Record<AuthErrorCode, string>> = {
  bot_block: "Blocked by the vendor's bot protection",
  invalid_credentials: "Email or password was rejected",
  account_locked: "Account is locked",
  password_reset_required: "Account requires a password reset",
  access_denied: "Sign-in was cancelled or access was denied",
  b2c_error: "Identity provider returned an error",
  unknown: "Sign-in failed for an unknown reason",
  http_error: "HTTP request failed",
  antiforgery_failed: "Could not obtain the anti-forgery cookie",
  parse_failed: "Sign-in page did not contain the expected tokens",
  confirm_failed: "Sign-in confirmation failed",
  session_not_established: "Signed in but the session was not accepted",
  not_authenticated: "Not authenticated",
};

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Create an AuthError. Empty hints and undefined statuses are left out.
 */
export function authError(
  code: AuthErrorCode,
  step: AuthStep,
  options: { message?: string; status?: number; hint?: string | null } = {},
): AuthError {
  const { status, hint } = options;
  return {
    type: "AUTH_ERROR",
    code,
    step,
    message: options.message ?? AUTH_ERROR_MESSAGES[code],
    ...(status !== undefined ? { status } : {}),
    ...(hint ? { hint } : {}),
  };
}

/**
 * Create an AuthError from a classifier result.
 */
export function fromClassification(
  classification: Classification,
  step: AuthStep,
  status: number,
): AuthError {
  return authError(classification.code, step, {
    status,
    hint: classification.hint,
  });
}

/**
 * Create an ApiError.
 */
export function apiError(
  message: string,
  options: { status?: number; bodyExcerpt?: string; cause?: Error } = {},
): ApiError {
  const { status, bodyExcerpt, cause } = options;
  return {
    type: "API_ERROR",
    message,
    ...(status !== undefined ? { status } : {}),
    ...(bodyExcerpt !== undefined ? { bodyExcerpt } : {}),
    ...(cause !== undefined ? { cause } : {}),
  };
}

export function isAuthError(error: SessionError): error is AuthError {
  return error.type === "AUTH_ERROR";
}

/**
 * Format a SessionError for logging.
 */
export function formatSessionError(error: SessionError): string {
  switch (error.type) {
    case "AUTH_ERROR": {
      const status = error.status !== undefined ? ` HTTP ${error.status}` : "";
      const hint = error.hint !== undefined ? ` (${error.hint})` : "";
      return `Auth error [${error.code} at ${error.step}${status}]: ${error.message}${hint}`;
    }
    case "API_ERROR": {
      const status = error.status !== undefined ? ` HTTP ${error.status}` : "";
      const body =
        error.bodyExcerpt !== undefined ? ` body: ${error.bodyExcerpt}` : "";
      return `API error${status}: ${error.message}${body}`;
    }
  }
}
