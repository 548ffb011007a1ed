/**
 * Transport Module - Error Types
 *
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while sending a request.
 */
export type TransportError =
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "TOO_MANY_REDIRECTS";
      readonly message: string;
      readonly url: string;
    };

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): TransportError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(message: string, timeoutMs: number): TransportError {
  return { type: "TIMEOUT", message, timeoutMs };
}

/**
 * Create a TOO_MANY_REDIRECTS error.
 */
export function tooManyRedirects(url: string): TransportError {
  return {
    type: "TOO_MANY_REDIRECTS",
    message: `Redirect limit reached at ${url}`,
    url,
  };
}

/**
 * Format a TransportError for logging.
 */
export function formatTransportError(error: TransportError): string {
  switch (error.type) {
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "TIMEOUT":
      return `Timeout after ${error.timeoutMs}ms: ${error.message}`;
    case "TOO_MANY_REDIRECTS":
      return `Too many redirects: ${error.message}`;
  }
}
