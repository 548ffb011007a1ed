/**
 * Transport Module - Schemas and Types
 *
 * Request/response shapes for the cookie-carrying HTTP transport the
 * session client talks through.
 */
import type { Result } from "neverthrow";

import type { TransportError } from "./errors.js";

/**
 * One outgoing request. `form` is sent url-encoded.
 */
export type HttpRequest = Readonly<{
  method: "GET" | "POST";
  url: string;
  query?: Readonly<Record<string, string>>;
  headers?: Readonly<Record<string, string>>;
  form?: Readonly<Record<string, string>>;
  /** Follow 3xx responses (default true) */
  followRedirects?: boolean;
}>;

/**
 * Response after redirects, body already read as text.
 */
export type HttpResponse = Readonly<{
  status: number;
  /** Final URL after redirects */
  url: string;
  contentType: string;
  body: string;
}>;

/**
 * HTTP transport owning one account's cookie jar.
 */
export interface HttpTransport {
  request(req: HttpRequest): Promise<Result<HttpResponse, TransportError>>;
  /** Load cookies from a `Cookie` request header into the jar for `url`. */
  seedCookies(cookieHeader: string, url: string): Promise<void>;
}

/**
 * Options for the fetch-backed transport.
 */
export type FetchTransportOptions = Readonly<{
  timeoutMs?: number;
  userAgent?: string;
  maxRedirects?: number;
}>;
