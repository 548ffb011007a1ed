/**
 * Session Module - Pure Transformations
 *
 * Token extraction from the hosted sign-in page, identity-provider URL
 * building and apparatus list shaping. No I/O.
 */
import {
  CONFIRM_SUFFIX,
  type IdentityProviderConfig,
  type PropertyValue,
  type RawApparatus,
  RawApparatusWireSchema,
  type RawProperty,
  RawPropertyWireSchema,
  type SelfAssertedResponse,
  SelfAssertedResponseSchema,
  SELF_ASSERTED_SUFFIX,
  type SessionTokens,
} from "./schema.js";

// =============================================================================
// Sign-in Page
// =============================================================================

/**
 * Value of a `"key":"value"` pair embedded in page script, or null.
 */
function embeddedValue(html: string, key: string): string | null {
  const pattern = new RegExp(`"${key}"\\s*:\\s*"([^"]+)"`);
  return pattern.exec(html)?.[1] ?? null;
}

/**
 * Pull the csrf token and transaction id out of the sign-in page.
 *
 * @returns Both tokens, or null when either is missing
 */
export function extractSessionTokens(html: string): SessionTokens | null {
  const csrf = embeddedValue(html, "csrf");
  const transId = embeddedValue(html, "transId");

  if (csrf === null || transId === null) {
    return null;
  }

  return { csrf, transId };
}

/**
 * Identity provider the sign-in actually landed on.
 *
 * The origin comes from the final URL when sign-in redirected off the app
 * host; tenant path and policy come from the page settings when present.
 * Everything else falls back to the configured defaults.
 */
export function resolveIdentityProvider(
  html: string,
  finalUrl: string,
  appBaseUrl: string,
  defaults: IdentityProviderConfig,
): IdentityProviderConfig {
  const landed = originOf(finalUrl);
  const origin =
    landed !== null && landed !== originOf(appBaseUrl)
      ? landed
      : defaults.origin;

  const tenant = embeddedValue(html, "tenant");
  const policy = embeddedValue(html, "policy");

  return {
    origin,
    tenantPath: tenant !== null && tenant.startsWith("/") ? tenant : defaults.tenantPath,
    policy: policy ?? defaults.policy,
  };
}

function originOf(url: string): string | null {
  try {
    return new URL(url).origin;
  } catch {
    return null;
  }
}

export function buildSelfAssertedUrl(idp: IdentityProviderConfig): string {
  return `${trimSlash(idp.origin)}${idp.tenantPath}${SELF_ASSERTED_SUFFIX}`;
}

export function buildConfirmUrl(idp: IdentityProviderConfig): string {
  return `${trimSlash(idp.origin)}${idp.tenantPath}${CONFIRM_SUFFIX}`;
}

/**
 * Join an app-relative path onto the app base URL.
 */
export function appUrl(appBaseUrl: string, path: string): string {
  return `${trimSlash(appBaseUrl)}${path}`;
}

function trimSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

// =============================================================================
// JSON Bodies
// =============================================================================

/**
 * JSON.parse that yields undefined instead of throwing.
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Inline validation answer of the credential submit, or null when the
 * body is not one (e.g. an HTML page).
 */
export function parseSelfAssertedResponse(
  body: string,
): SelfAssertedResponse | null {
  const parsed = SelfAssertedResponseSchema.safeParse(parseJson(body));
  return parsed.success ? parsed.data : null;
}

// =============================================================================
// Apparatus List
// =============================================================================

/**
 * Narrow an arbitrary JSON value to a property value variant.
 * Arrays and other shapes become null.
 */
export function toPropertyValue(value: unknown): PropertyValue {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (isRecord(value)) {
    return value;
  }

  return null;
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Shape one list entry. Non-object entries yield null; property entries
 * without a string name are dropped, the rest keep their order.
 */
export function toRawApparatus(entry: unknown): RawApparatus | null {
  const parsed = RawApparatusWireSchema.safeParse(entry);
  if (!parsed.success) {
    return null;
  }

  const wire = parsed.data;
  const properties: RawProperty[] = [];

  for (const item of wire.properties ?? []) {
    const property = RawPropertyWireSchema.safeParse(item);
    if (property.success) {
      properties.push({
        name: property.data.name,
        value: toPropertyValue(property.data.value),
      });
    }
  }

  return {
    apparatusId: wire.apparatusId ?? null,
    type: wire.type ?? null,
    name: wire.name ?? null,
    isConnected: wire.isConnected ?? null,
    properties,
  };
}

/**
 * Shape a decoded list body.
 *
 * @returns The apparatus, or null when the body is not a JSON array
 */
export function parseApparatusList(json: unknown): RawApparatus[] | null {
  if (!Array.isArray(json)) {
    return null;
  }

  const apparatus: RawApparatus[] = [];
  for (const entry of json) {
    const raw = toRawApparatus(entry);
    if (raw !== null) {
      apparatus.push(raw);
    }
  }
  return apparatus;
}

/**
 * Human-readable JSON type for diagnostics.
 */
export function describeJsonType(json: unknown): string {
  if (json === null) {
    return "null";
  }
  return Array.isArray(json) ? "array" : typeof json;
}
