/**
 * Session Module - Schemas and Types
 *
 * Wire shapes of the Mobile Link web app and its sign-in pages, and the
 * session state held by one client.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { HttpTransport } from "../transport/index.js";
import type { AuthError, SessionError } from "./errors.js";

// =============================================================================
// Endpoints
// =============================================================================

export const ANTIFORGERY_PATH = "/api/v1/Antiforgery/cookie";
export const SIGNIN_PATH = "/api/Auth/SignIn";
export const ACCOUNT_STATUS_PATH = "/api/v1/Account/status";
export const APPARATUS_LIST_PATH = "/api/v2/Apparatus/list";

export const SELF_ASSERTED_SUFFIX = "/SelfAsserted";
export const CONFIRM_SUFFIX = "/api/CombinedSigninAndSignup/confirmed";

// =============================================================================
// Identity Provider
// =============================================================================

/**
 * Where the hosted sign-in pages live. The sign-in page can override the
 * tenant path and policy.
 */
export type IdentityProviderConfig = Readonly<{
  /** e.g. https://tenant.b2clogin.com */
  origin: string;
  /** e.g. /tenant.onmicrosoft.com/B2C_1A_SignIn */
  tenantPath: string;
  policy: string;
}>;

/**
 * Tokens embedded in the sign-in page.
 */
export type SessionTokens = Readonly<{
  csrf: string;
  transId: string;
}>;

/**
 * Inline validation answer of the SelfAsserted endpoint.
 * `status` is "200" on success, "400" and a message otherwise.
 */
export const SelfAssertedResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

export type SelfAssertedResponse = z.infer<typeof SelfAssertedResponseSchema>;

// =============================================================================
// Session State
// =============================================================================

export type SessionMode = "password" | "cookie";

/**
 * Session held by one client. The cookie jar lives in the transport.
 */
export type Session = Readonly<{
  authenticated: boolean;
  mode: SessionMode | null;
  csrfToken: string | null;
  transId: string | null;
  /** Unix timestamp in ms of the last successful login */
  authenticatedAt: number | null;
}>;

export const INITIAL_SESSION: Session = {
  authenticated: false,
  mode: null,
  csrfToken: null,
  transId: null,
  authenticatedAt: null,
};

/**
 * Account status payload. Shape is vendor-owned; kept as a loose record.
 */
export const AccountStatusSchema = z.record(z.unknown());

export type AccountStatus = z.infer<typeof AccountStatusSchema>;

// =============================================================================
// Apparatus
// =============================================================================

/**
 * Property value variants seen in apparatus property lists.
 */
export type PropertyValue =
  | null
  | string
  | number
  | boolean
  | Readonly<Record<string, unknown>>;

export type RawProperty = Readonly<{
  name: string;
  value: PropertyValue;
}>;

/**
 * One apparatus as returned by the list endpoint, loosened to what the
 * normalizer can rely on. Properties keep their wire order.
 */
export type RawApparatus = Readonly<{
  apparatusId: number | string | null;
  type: number | null;
  name: string | null;
  isConnected: boolean | null;
  properties: ReadonlyArray<RawProperty>;
}>;

/**
 * Loose wire schema for one apparatus. Wrong-typed fields degrade to null.
 */
export const RawApparatusWireSchema = z.object({
  apparatusId: z.union([z.number(), z.string()]).nullish().catch(null),
  type: z.number().nullish().catch(null),
  name: z.string().nullish().catch(null),
  isConnected: z.boolean().nullish().catch(null),
  properties: z.array(z.unknown()).nullish().catch(null),
});

export const RawPropertyWireSchema = z.object({
  name: z.string(),
  value: z.unknown(),
});

// =============================================================================
// Client
// =============================================================================

export type SessionClientOptions = Readonly<{
  transport: HttpTransport;
  /** e.g. https://app.mobilelinkgen.com */
  appBaseUrl: string;
  identityProvider: IdentityProviderConfig;
}>;

/**
 * One account's authenticated session against the web app.
 */
export type SessionClient = Readonly<{
  login(email: string, password: string): Promise<Result<Session, AuthError>>;
  loginWithCookie(cookieHeader: string): Promise<Result<Session, AuthError>>;
  accountStatus(): Promise<Result<AccountStatus, AuthError>>;
  listApparatus(): Promise<Result<RawApparatus[], SessionError>>;
  getSession(): Session;
}>;
