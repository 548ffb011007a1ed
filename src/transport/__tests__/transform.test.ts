/**
 * Transport Transform Tests
 */
import { describe, expect, it } from "vitest";

import {
  buildUrl,
  isRedirect,
  parseCookieHeader,
  redirectMethod,
} from "../transform.js";

describe("Transport Transform", () => {
  describe("buildUrl", () => {
    it("appends query parameters", () => {
      expect(
        buildUrl("https://app.example.test/api/Auth/SignIn", {
          email: "user@example.test",
        }),
      ).toBe("https://app.example.test/api/Auth/SignIn?email=user%40example.test");
    });

    it("keeps existing parameters", () => {
      expect(buildUrl("https://app.example.test/a?x=1", { y: "2" })).toBe(
        "https://app.example.test/a?x=1&y=2",
      );
    });

    it("returns the normalized URL without a query", () => {
      expect(buildUrl("https://app.example.test")).toBe(
        "https://app.example.test/",
      );
    });
  });

  describe("isRedirect", () => {
    it.each([301, 302, 303, 307, 308])("treats %d as a redirect", (status) => {
      expect(isRedirect(status)).toBe(true);
    });

    it.each([200, 304, 400, 500])("does not treat %d as a redirect", (status) => {
      expect(isRedirect(status)).toBe(false);
    });
  });

  describe("redirectMethod", () => {
    it("turns 303 into GET", () => {
      expect(redirectMethod(303, "POST")).toBe("GET");
    });

    it("turns POST 302 into GET", () => {
      expect(redirectMethod(302, "POST")).toBe("GET");
    });

    it("keeps POST on 307", () => {
      expect(redirectMethod(307, "POST")).toBe("POST");
    });

    it("keeps GET on 301", () => {
      expect(redirectMethod(301, "GET")).toBe("GET");
    });
  });

  describe("parseCookieHeader", () => {
    it("splits a header into pairs", () => {
      expect(parseCookieHeader("a=1; b=two ;c=3")).toEqual([
        "a=1",
        "b=two",
        "c=3",
      ]);
    });

    it("drops fragments without a name", () => {
      expect(parseCookieHeader("=x; ; novalue; d=4")).toEqual(["d=4"]);
    });
  });
});
