/**
 * Transport Module - Service Layer
 *
 * Cookie-carrying HTTP on the global fetch. Redirects are followed by hand
 * so that every hop's Set-Cookie lands in the jar; the identity provider
 * issues its session cookies on intermediate redirects.
 */
import { type Result, err, ok } from "neverthrow";
import { CookieJar } from "tough-cookie";

import { createLogger } from "../logger.js";
import type { TransportError } from "./errors.js";
import { networkError, timeout, tooManyRedirects } from "./errors.js";
import type {
  FetchTransportOptions,
  HttpRequest,
  HttpResponse,
  HttpTransport,
} from "./schema.js";
import {
  buildUrl,
  isRedirect,
  parseCookieHeader,
  redirectMethod,
} from "./transform.js";

const log = createLogger("transport");

const DEFAULT_TIMEOUT_MS = 15000;
const DEFAULT_MAX_REDIRECTS = 10;
const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36";
const DEFAULT_ACCEPT =
  "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8";

/**
 * Create a transport with its own cookie jar. One per account.
 */
export function createFetchTransport(
  options: FetchTransportOptions = {},
): HttpTransport {
  const jar = new CookieJar();
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  async function request(
    req: HttpRequest,
  ): Promise<Result<HttpResponse, TransportError>> {
    let url = buildUrl(req.url, req.query);
    let method = req.method;
    let body = req.form ? new URLSearchParams(req.form).toString() : undefined;
    const followRedirects = req.followRedirects ?? true;

    try {
      for (let hop = 0; hop <= maxRedirects; hop += 1) {
        const headers: Record<string, string> = {
          "User-Agent": userAgent,
          Accept: DEFAULT_ACCEPT,
          ...req.headers,
        };

        const cookieHeader = await jar.getCookieString(url);
        if (cookieHeader !== "") {
          headers.Cookie = cookieHeader;
        }
        if (body !== undefined) {
          headers["Content-Type"] = "application/x-www-form-urlencoded";
        }

        log.debug({ method, url: stripQuery(url), hop }, "→ HTTP request");

        const response = await fetch(url, {
          method,
          headers,
          body,
          redirect: "manual",
          signal: AbortSignal.timeout(timeoutMs),
        });

        for (const setCookie of response.headers.getSetCookie()) {
          await jar.setCookie(setCookie, url, { ignoreError: true });
        }

        const location = response.headers.get("location");
        if (followRedirects && isRedirect(response.status) && location) {
          // Drain the redirect body before the next hop
          await response.text();
          url = new URL(location, url).toString();
          const nextMethod = redirectMethod(response.status, method);
          if (nextMethod !== method) {
            body = undefined;
          }
          method = nextMethod;
          continue;
        }

        const text = await response.text();
        log.debug(
          { status: response.status, url: stripQuery(url), bytes: text.length },
          "✓ HTTP response",
        );

        return ok({
          status: response.status,
          url,
          contentType: response.headers.get("content-type") ?? "",
          body: text,
        });
      }

      return err(tooManyRedirects(stripQuery(url)));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));

      if (cause.name === "TimeoutError" || cause.name === "AbortError") {
        return err(timeout(`Request to ${stripQuery(url)} timed out`, timeoutMs));
      }

      return err(
        networkError(`Request to ${stripQuery(url)} failed: ${cause.message}`, cause),
      );
    }
  }

  async function seedCookies(cookieHeader: string, url: string): Promise<void> {
    const pairs = parseCookieHeader(cookieHeader);
    for (const pair of pairs) {
      await jar.setCookie(pair, url, { ignoreError: true });
    }
    log.debug({ count: pairs.length, url }, "Seeded cookies into jar");
  }

  return { request, seedCookies };
}

/**
 * Query strings carry tokens; keep them out of logs and error messages.
 */
function stripQuery(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
}
