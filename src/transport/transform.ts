/**
 * Transport Module - Pure Transformations
 *
 * URL, redirect and cookie-header helpers. No I/O.
 */

/**
 * Append query parameters to a URL, keeping any it already has.
 */
export function buildUrl(
  base: string,
  query: Readonly<Record<string, string>> = {},
): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * Whether a status is a redirect the transport should follow.
 */
export function isRedirect(status: number): boolean {
  return (
    status === 301 ||
    status === 302 ||
    status === 303 ||
    status === 307 ||
    status === 308
  );
}

/**
 * Method for the next hop of a redirect: 303 always becomes GET, and so do
 * 301/302 after a POST (what browsers do). 307/308 keep the method.
 */
export function redirectMethod(
  status: number,
  method: "GET" | "POST",
): "GET" | "POST" {
  if (status === 303) {
    return "GET";
  }
  if ((status === 301 || status === 302) && method === "POST") {
    return "GET";
  }
  return method;
}

/**
 * Split a `Cookie` request header into individual `name=value` pairs.
 * Fragments without a name are dropped.
 */
export function parseCookieHeader(header: string): string[] {
  return header
    .split(";")
    .map((part) => part.trim())
    .filter((part) => {
      const eq = part.indexOf("=");
      return eq > 0;
    });
}
