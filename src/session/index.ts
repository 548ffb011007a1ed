/**
 * Session Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  AccountStatus,
  IdentityProviderConfig,
  PropertyValue,
  RawApparatus,
  RawProperty,
  Session,
  SessionClient,
  SessionClientOptions,
  SessionMode,
  SessionTokens,
} from "./schema.js";
export type { ApiError, AuthError, SessionError } from "./errors.js";

export { INITIAL_SESSION } from "./schema.js";

// Error utilities
export {
  apiError,
  authError,
  formatSessionError,
  isAuthError,
} from "./errors.js";

// Service functions (side effects)
export { createSessionClient } from "./service.js";

// Pure transformations
export {
  extractSessionTokens,
  parseApparatusList,
  resolveIdentityProvider,
  toRawApparatus,
} from "./transform.js";
