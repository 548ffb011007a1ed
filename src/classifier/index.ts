/**
 * Classifier Module - Public API
 *
 * Pure mapping from raw responses to the sign-in failure taxonomy.
 */

// Types
export type {
  AuthErrorCode,
  AuthStep,
  Classification,
  ResponseSignal,
} from "./schema.js";

export { AuthErrorCodeSchema, AuthStepSchema } from "./schema.js";

// Pure transformations
export {
  BOT_BLOCK_INDICATORS,
  classifyStepResponse,
  excerpt,
  extractHint,
  extractProviderError,
  looksLikeBotBlock,
  mapProviderError,
} from "./transform.js";
