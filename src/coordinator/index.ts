/**
 * Coordinator Module - Public API
 *
 * Exports only what's needed by other modules.
 * Internal implementation details stay hidden.
 */

// Types
export type {
  CoordinatorOptions,
  CoordinatorSnapshot,
  Credentials,
  LoginFailureReason,
  PollingState,
} from "./schema.js";
export type { CoordinatorError } from "./errors.js";
export type { TankCoordinator } from "./service.js";

// Error utilities
export { formatCoordinatorError } from "./errors.js";

// Service functions (side effects)
export {
  createTankCoordinator,
  getPollingState,
  startPolling,
  stopPolling,
} from "./service.js";

// Pure transformations
export { describeLoginFailure } from "./transform.js";
