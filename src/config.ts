/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Mobile Link propane poller configuration covering:
 * - Server settings
 * - Account credentials (email/password or pasted cookie header)
 * - Vendor app and identity-provider endpoints
 * - Polling cadence and tank selection
 */
import { z } from "zod";

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

/**
 * Comma-separated apparatus ids, e.g. "1234,5678".
 * Non-numeric entries are dropped.
 */
const idList = z
  .string()
  .optional()
  .transform((val) =>
    (val ?? "")
      .split(",")
      .map((part) => Number.parseInt(part.trim(), 10))
      .filter((id) => Number.isInteger(id)),
  );

const ConfigSchema = z
  .object({
    // ==========================================================================
    // Server Configuration
    // ==========================================================================
    PORT: z.coerce.number().default(8084).describe("HTTP status API port"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development")
      .describe("Runtime environment"),
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
      .default("info")
      .describe("Pino log level"),

    // ==========================================================================
    // Account
    // ==========================================================================
    MOBILELINK_EMAIL: optionalString.describe("Mobile Link account email"),
    MOBILELINK_PASSWORD: optionalString.describe("Mobile Link account password"),
    MOBILELINK_COOKIE: optionalString.describe(
      "Authenticated Cookie header copied from a browser session",
    ),

    // ==========================================================================
    // Vendor Endpoints
    // ==========================================================================
    MOBILELINK_APP_URL: z
      .string()
      .url()
      .default("https://app.mobilelinkgen.com")
      .describe("Mobile Link web app host"),
    MOBILELINK_IDP_URL: z
      .string()
      .url()
      .default("https://generacconnectivity.b2clogin.com")
      .describe("Identity provider origin, used when sign-in does not redirect"),
    MOBILELINK_IDP_TENANT: z
      .string()
      .default("/generacconnectivity.onmicrosoft.com/B2C_1A_MobileLink_SignIn")
      .describe("Identity provider tenant path"),
    MOBILELINK_IDP_POLICY: z
      .string()
      .default("B2C_1A_MobileLink_SignIn")
      .describe("Identity provider sign-in policy"),

    // ==========================================================================
    // Polling
    // ==========================================================================
    SELECTED_TANKS: idList.describe(
      "Apparatus ids to publish (empty publishes every tank)",
    ),
    POLLING_INTERVAL_MS: z.coerce
      .number()
      .positive()
      .default(300000)
      .describe("Polling interval in milliseconds"),
    REQUEST_TIMEOUT_MS: z.coerce
      .number()
      .positive()
      .default(15000)
      .describe("HTTP timeout per vendor request (ms)"),
  })
  .refine(
    (cfg) =>
      cfg.MOBILELINK_COOKIE !== undefined ||
      (cfg.MOBILELINK_EMAIL !== undefined &&
        cfg.MOBILELINK_PASSWORD !== undefined),
    {
      message:
        "Either MOBILELINK_EMAIL and MOBILELINK_PASSWORD or MOBILELINK_COOKIE is required",
      path: ["MOBILELINK_EMAIL"],
    },
  );

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Credentials for the coordinator.
 * Password login wins over a pasted cookie when both are configured.
 */
export function getCredentials():
  | Readonly<{ mode: "password"; email: string; password: string }>
  | Readonly<{ mode: "cookie"; cookieHeader: string }> {
  if (config.MOBILELINK_EMAIL && config.MOBILELINK_PASSWORD) {
    return {
      mode: "password",
      email: config.MOBILELINK_EMAIL,
      password: config.MOBILELINK_PASSWORD,
    };
  }

  // refine() guarantees the cookie is set when the password pair is not
  return { mode: "cookie", cookieHeader: config.MOBILELINK_COOKIE ?? "" };
}

/**
 * Identity-provider defaults for the session client.
 */
export function getIdentityProviderConfig(): Readonly<{
  origin: string;
  tenantPath: string;
  policy: string;
}> {
  return {
    origin: config.MOBILELINK_IDP_URL,
    tenantPath: config.MOBILELINK_IDP_TENANT,
    policy: config.MOBILELINK_IDP_POLICY,
  };
}
