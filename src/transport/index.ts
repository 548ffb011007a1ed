/**
 * Transport Module - Public API
 */

// Types
export type {
  FetchTransportOptions,
  HttpRequest,
  HttpResponse,
  HttpTransport,
} from "./schema.js";
export type { TransportError } from "./errors.js";

// Error utilities
export { formatTransportError } from "./errors.js";

// Service functions (side effects)
export { createFetchTransport } from "./service.js";

// Pure transformations
export {
  buildUrl,
  isRedirect,
  parseCookieHeader,
  redirectMethod,
} from "./transform.js";
