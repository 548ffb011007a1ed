/**
 * Classifier Module - Pure Transformations
 *
 * Maps raw response bodies and status codes to the failure taxonomy.
 * No side effects, no I/O. Nothing here throws: unknown input degrades
 * to a generic bucket, never to success.
 */
import type {
  AuthErrorCode,
  Classification,
  ResponseSignal,
} from "./schema.js";

// =============================================================================
// Bot-Block Detection
// =============================================================================

/**
 * Indicators of a captcha/WAF page, matched as case-insensitive substrings.
 */
export const BOT_BLOCK_INDICATORS: ReadonlyArray<RegExp> = [
  /captcha/i,
  /access denied/i,
  /incapsula/i,
  /request unsuccessful/i,
  /bot/i,
];

/**
 * Check whether a response body looks like an anti-bot block page.
 *
 * @example
 * looksLikeBotBlock("CAPTCHA required") // true
 */
export function looksLikeBotBlock(text: string): boolean {
  return BOT_BLOCK_INDICATORS.some((indicator) => indicator.test(text));
}

// =============================================================================
// Provider Error Codes
// =============================================================================

const PROVIDER_ERROR_PATTERN = /AADB2C\d{5,6}/;
const PROVIDER_ERROR_EXACT = /^AADB2C\d{5,6}$/;

/**
 * First identity-provider error code in the text, e.g. `AADB2C90118`.
 */
export function extractProviderError(text: string): string | null {
  const match = PROVIDER_ERROR_PATTERN.exec(text);
  return match ? match[0] : null;
}

/**
 * Known provider codes. Extend only with codes confirmed against the vendor.
 */
const PROVIDER_ERROR_MAP: Readonly<Record<string, Classification>> = {
  // User cancelled / consent refused
  AADB2C90091: { code: "access_denied", hint: null },
  AADB2C90273: { code: "access_denied", hint: null },

  AADB2C90118: {
    code: "password_reset_required",
    hint: "The account must reset its password on the Mobile Link website before signing in here.",
  },

  AADB2C90157: {
    code: "account_locked",
    hint: "Too many failed sign-in attempts. Wait for the lockout to expire or unlock the account on the Mobile Link website.",
  },

  AADB2C90225: { code: "invalid_credentials", hint: null },
};

/**
 * Map a provider error code to the taxonomy.
 *
 * Recognized-but-unmapped codes become `b2c_error` with the raw code as
 * hint; absent or malformed input becomes `unknown`.
 */
export function mapProviderError(code: string | null): Classification {
  if (code === null || !PROVIDER_ERROR_EXACT.test(code)) {
    return { code: "unknown", hint: null };
  }

  return PROVIDER_ERROR_MAP[code] ?? { code: "b2c_error", hint: code };
}

// =============================================================================
// Diagnostics
// =============================================================================

const EXCERPT_LENGTH = 120;

/**
 * First characters of a body for diagnostics, whitespace collapsed.
 */
export function excerpt(text: string, maxLength = EXCERPT_LENGTH): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length > maxLength
    ? `${collapsed.slice(0, maxLength)}…`
    : collapsed;
}

/**
 * Short hint from an HTML body: its <title>, else the start of the text.
 */
export function extractHint(text: string): string | null {
  const title = /<title[^>]*>([^<]*)<\/title>/i.exec(text)?.[1]?.trim();
  if (title) {
    return excerpt(title);
  }

  const plain = excerpt(text.replace(/<[^>]*>/g, " "));
  return plain === "" ? null : plain;
}

// =============================================================================
// Step Classification
// =============================================================================

/**
 * Classify one handshake response.
 *
 * Order matters: block pages can arrive with a 200 or an error status, so
 * the bot-block check runs before the status check. A provider code found
 * in the body or the final URL wins over the step's fallback code.
 *
 * @param response - Status, body and final URL of the step
 * @param fallback - Code used when the status fails with nothing better
 * @param succeeded - Status predicate for the step (default: below 400)
 * @returns The failure classification, or null when the step passed
 */
export function classifyStepResponse(
  response: ResponseSignal,
  fallback: AuthErrorCode,
  succeeded: (status: number) => boolean = (status) => status < 400,
): Classification | null {
  if (looksLikeBotBlock(response.body)) {
    return { code: "bot_block", hint: extractHint(response.body) };
  }

  const providerCode =
    extractProviderError(response.body) ?? extractProviderError(response.url);
  if (providerCode !== null) {
    return mapProviderError(providerCode);
  }

  if (!succeeded(response.status)) {
    return { code: fallback, hint: extractHint(response.body) };
  }

  return null;
}
