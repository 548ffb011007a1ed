/**
 * Session Module - Service Layer
 *
 * Drives the identity-provider handshake and the authenticated calls.
 * Every failure comes back as an AuthError or ApiError value; nothing
 * here throws and nothing retries. One login call is one pass.
 */
import { type Result, err, ok } from "neverthrow";

import {
  classifyStepResponse,
  excerpt,
  extractHint,
  looksLikeBotBlock,
  mapProviderError,
} from "../classifier/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  formatTransportError,
  type HttpRequest,
  type HttpResponse,
} from "../transport/index.js";
import {
  type AuthError,
  type SessionError,
  apiError,
  authError,
  formatSessionError,
  fromClassification,
} from "./errors.js";
import {
  ACCOUNT_STATUS_PATH,
  type AccountStatus,
  AccountStatusSchema,
  ANTIFORGERY_PATH,
  APPARATUS_LIST_PATH,
  INITIAL_SESSION,
  type RawApparatus,
  type Session,
  type SessionClient,
  type SessionClientOptions,
  type SessionMode,
  SIGNIN_PATH,
} from "./schema.js";
import {
  appUrl,
  buildConfirmUrl,
  buildSelfAssertedUrl,
  describeJsonType,
  extractSessionTokens,
  parseApparatusList,
  parseJson,
  parseSelfAssertedResponse,
  resolveIdentityProvider,
} from "./transform.js";

const log = createLogger("session");

const JSON_ACCEPT = "application/json, text/plain, */*";

/**
 * Create a session client for one account. Clients share nothing.
 */
export function createSessionClient(
  options: SessionClientOptions,
): SessionClient {
  const { transport, appBaseUrl, identityProvider } = options;

  let session: Session = INITIAL_SESSION;

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Send a handshake request; transport failures become http_error.
   */
  async function send(
    req: HttpRequest,
  ): Promise<Result<HttpResponse, AuthError>> {
    const result = await transport.request(req);
    if (result.isErr()) {
      return err(
        authError("http_error", "transport", {
          message: formatTransportError(result.error),
        }),
      );
    }
    return ok(result.value);
  }

  function markAuthenticated(
    mode: SessionMode,
    tokens: { csrf: string; transId: string } | null,
  ): Session {
    session = {
      authenticated: true,
      mode,
      csrfToken: tokens?.csrf ?? null,
      transId: tokens?.transId ?? null,
      authenticatedAt: Date.now(),
    };
    return session;
  }

  function invalidate(): void {
    if (session.authenticated) {
      log.warn("Session rejected by server; marking unauthenticated");
    }
    session = { ...session, authenticated: false };
  }

  // ===========================================================================
  // Handshake Steps
  // ===========================================================================

  /**
   * Step 6: the session is only real once account status answers 200.
   */
  async function verifySession(): Promise<Result<true, AuthError>> {
    log.debug({ step: "verify" }, "Verifying session");
    const verify = await send({
      method: "GET",
      url: appUrl(appBaseUrl, ACCOUNT_STATUS_PATH),
      headers: { Accept: JSON_ACCEPT },
    });
    if (verify.isErr()) {
      return err(verify.error);
    }

    const failure = classifyStepResponse(
      verify.value,
      "session_not_established",
      (status) => status === 200,
    );
    if (failure) {
      return err(fromClassification(failure, "verify", verify.value.status));
    }

    return ok(true);
  }

  async function runHandshake(
    email: string,
    password: string,
  ): Promise<Result<{ csrf: string; transId: string }, AuthError>> {
    // 1. Anti-forgery cookie
    log.debug({ step: "antiforgery" }, "Fetching anti-forgery cookie");
    const antiforgery = await send({
      method: "GET",
      url: appUrl(appBaseUrl, ANTIFORGERY_PATH),
      headers: { Accept: JSON_ACCEPT },
    });
    if (antiforgery.isErr()) {
      return err(antiforgery.error);
    }
    if (antiforgery.value.status >= 400) {
      return err(
        authError("antiforgery_failed", "antiforgery", {
          status: antiforgery.value.status,
          hint: extractHint(antiforgery.value.body),
        }),
      );
    }

    // 2. Sign-in start, lands on the hosted sign-in page
    log.debug({ step: "signin_start" }, "Starting sign-in");
    const signin = await send({
      method: "GET",
      url: appUrl(appBaseUrl, SIGNIN_PATH),
      query: { email },
    });
    if (signin.isErr()) {
      return err(signin.error);
    }
    const signinFailure = classifyStepResponse(signin.value, "unknown");
    if (signinFailure) {
      return err(
        fromClassification(signinFailure, "signin_start", signin.value.status),
      );
    }

    // 3. Tokens from the page
    const tokens = extractSessionTokens(signin.value.body);
    if (tokens === null) {
      return err(
        authError("parse_failed", "parse_tokens", {
          status: signin.value.status,
          hint: extractHint(signin.value.body),
        }),
      );
    }
    const idp = resolveIdentityProvider(
      signin.value.body,
      signin.value.url,
      appBaseUrl,
      identityProvider,
    );
    log.debug(
      { origin: idp.origin, policy: idp.policy },
      "Resolved identity provider",
    );

    // 4. Credential submit
    log.debug({ step: "self_asserted" }, "Submitting credentials");
    const submit = await send({
      method: "POST",
      url: buildSelfAssertedUrl(idp),
      query: { tx: tokens.transId, p: idp.policy },
      headers: {
        Accept: "application/json, text/javascript, */*; q=0.01",
        "X-CSRF-TOKEN": tokens.csrf,
        "X-Requested-With": "XMLHttpRequest",
      },
      form: {
        request_type: "RESPONSE",
        signInName: email,
        password,
      },
    });
    if (submit.isErr()) {
      return err(submit.error);
    }
    // Only a code-less 4xx reads as rejected credentials
    const submitStatus = submit.value.status;
    const submitFailure = classifyStepResponse(
      submit.value,
      submitStatus >= 400 && submitStatus < 500
        ? "invalid_credentials"
        : mapProviderError(null).code,
    );
    if (submitFailure) {
      return err(
        fromClassification(submitFailure, "self_asserted", submit.value.status),
      );
    }
    const answer = parseSelfAssertedResponse(submit.value.body);
    if (answer !== null && answer.status !== "200") {
      return err(
        authError("invalid_credentials", "self_asserted", {
          status: submit.value.status,
          hint: answer.message ?? null,
        }),
      );
    }

    // 5. Confirm, issues the app's session cookies through redirects
    log.debug({ step: "confirm" }, "Confirming sign-in");
    const confirm = await send({
      method: "GET",
      url: buildConfirmUrl(idp),
      query: {
        rememberMe: "false",
        csrf_token: tokens.csrf,
        tx: tokens.transId,
        p: idp.policy,
      },
    });
    if (confirm.isErr()) {
      return err(confirm.error);
    }
    const confirmFailure = classifyStepResponse(confirm.value, "confirm_failed");
    if (confirmFailure) {
      return err(
        fromClassification(confirmFailure, "confirm", confirm.value.status),
      );
    }

    // 6. Verify
    const verified = await verifySession();
    if (verified.isErr()) {
      return err(verified.error);
    }

    return ok(tokens);
  }

  // ===========================================================================
  // Public Operations
  // ===========================================================================

  async function login(
    email: string,
    password: string,
  ): Promise<Result<Session, AuthError>> {
    const startTime = Date.now();
    logOperationStart(log, "login");
    session = INITIAL_SESSION;

    const result = await runHandshake(email, password);
    if (result.isErr()) {
      logOperationFailed(log, "login", formatSessionError(result.error), {
        code: result.error.code,
        step: result.error.step,
      });
      return err(result.error);
    }

    logOperationComplete(log, "login", startTime);
    return ok(markAuthenticated("password", result.value));
  }

  async function loginWithCookie(
    cookieHeader: string,
  ): Promise<Result<Session, AuthError>> {
    const startTime = Date.now();
    logOperationStart(log, "loginWithCookie");
    session = INITIAL_SESSION;

    await transport.seedCookies(cookieHeader, appBaseUrl);

    const verified = await verifySession();
    if (verified.isErr()) {
      logOperationFailed(
        log,
        "loginWithCookie",
        formatSessionError(verified.error),
        { code: verified.error.code },
      );
      return err(verified.error);
    }

    logOperationComplete(log, "loginWithCookie", startTime);
    return ok(markAuthenticated("cookie", null));
  }

  async function accountStatus(): Promise<Result<AccountStatus, AuthError>> {
    const response = await send({
      method: "GET",
      url: appUrl(appBaseUrl, ACCOUNT_STATUS_PATH),
      headers: { Accept: JSON_ACCEPT },
    });
    if (response.isErr()) {
      return err(response.error);
    }

    const { status, body } = response.value;

    if (status !== 200) {
      invalidate();
      const code = looksLikeBotBlock(body) ? "bot_block" : "not_authenticated";
      return err(
        authError(code, "account_status", { status, hint: extractHint(body) }),
      );
    }

    const parsed = AccountStatusSchema.safeParse(parseJson(body));
    if (!parsed.success) {
      // Expired sessions get the sign-in page with a 200
      invalidate();
      return err(
        authError("not_authenticated", "account_status", {
          status,
          hint: extractHint(body),
        }),
      );
    }

    return ok(parsed.data);
  }

  async function listApparatus(): Promise<
    Result<RawApparatus[], SessionError>
  > {
    const result = await transport.request({
      method: "GET",
      url: appUrl(appBaseUrl, APPARATUS_LIST_PATH),
      headers: { Accept: JSON_ACCEPT },
    });
    if (result.isErr()) {
      const cause =
        result.error.type === "NETWORK_ERROR" ? result.error.cause : undefined;
      return err(
        apiError(formatTransportError(result.error), cause ? { cause } : {}),
      );
    }

    const { status, body } = result.value;

    if (status === 401 || status === 403) {
      invalidate();
      return err(
        authError("not_authenticated", "list_apparatus", {
          status,
          hint: extractHint(body),
        }),
      );
    }

    const json = status === 200 ? parseJson(body) : undefined;

    if (json === undefined && looksLikeBotBlock(body)) {
      return err(
        authError("bot_block", "list_apparatus", {
          status,
          hint: extractHint(body),
        }),
      );
    }

    if (
      status === 200 &&
      json === undefined &&
      extractSessionTokens(body) !== null
    ) {
      // Expired sessions get the sign-in page with a 200
      invalidate();
      return err(
        authError("not_authenticated", "list_apparatus", {
          status,
          hint: extractHint(body),
        }),
      );
    }

    if (status !== 200) {
      return err(
        apiError(`Apparatus list returned HTTP ${status}`, {
          status,
          bodyExcerpt: excerpt(body),
        }),
      );
    }

    const apparatus = parseApparatusList(json);
    if (apparatus === null) {
      return err(
        apiError(
          json === undefined
            ? "Apparatus list was not JSON"
            : `Unexpected apparatus list shape: ${describeJsonType(json)}`,
          { status, bodyExcerpt: excerpt(body) },
        ),
      );
    }

    log.debug({ count: apparatus.length }, "Apparatus list fetched");
    return ok(apparatus);
  }

  function getSession(): Session {
    return session;
  }

  return { login, loginWithCookie, accountStatus, listApparatus, getSession };
}
