/**
 * Unit tests for the feed transport client.
 *
 * Requests go to an undici MockAgent; nothing leaves the process.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { gzipSync } from "node:zlib";
import { MockAgent } from "undici";
import { buildRequestHeaders, fetchFeed, isKnownStatus } from "@/server/feed/fetcher";
import { ACCEPT_ENCODING, FEED_ACCEPT_HEADER } from "@/server/http/fetch";
import { USER_AGENT } from "@/server/http/user-agent";

const ORIGIN = "https://feeds.example.com";
const FEED_URL = `${ORIGIN}/feed.xml`;
const XML = '<?xml version="1.0"?><rss version="2.0"><channel><title>Mock</title></channel></rss>';

let agent: MockAgent;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
});

afterEach(async () => {
  await agent.close();
});

/**
 * Looks up a request header captured by an interceptor, ignoring case.
 */
function headerValue(headers: Record<string, string>, name: string): string | undefined {
  const entry = Object.entries(headers).find(([key]) => key.toLowerCase() === name.toLowerCase());
  return entry?.[1];
}

describe("buildRequestHeaders", () => {
  it("sends the default feed headers", () => {
    expect(buildRequestHeaders({}).toRecord()).toEqual({
      "User-Agent": USER_AGENT,
      Accept: FEED_ACCEPT_HEADER,
      "Accept-Encoding": ACCEPT_ENCODING,
      "A-IM": "feed",
    });
  });

  it("adds cache validators", () => {
    const headers = buildRequestHeaders({
      etag: '"v1"',
      modified: [2004, 1, 1, 19, 48, 21, 3, 1, 0],
    });

    expect(headers.get("If-None-Match")).toBe('"v1"');
    expect(headers.get("If-Modified-Since")).toBe("Thu, 01 Jan 2004 19:48:21 GMT");
  });

  it("lets extra headers override defaults regardless of case", () => {
    const headers = buildRequestHeaders({
      userAgent: "ignored/1.0",
      extraHeaders: { "user-agent": "custom/1.0", "X-Request-Id": "abc" },
    });

    expect(headers.get("User-Agent")).toBe("custom/1.0");
    expect(headers.get("x-request-id")).toBe("abc");
  });

  it("uses the configured User-Agent", () => {
    expect(buildRequestHeaders({ userAgent: "reader/2.0" }).get("user-agent")).toBe("reader/2.0");
  });
});

describe("isKnownStatus", () => {
  it("recognizes registered statuses", () => {
    expect(isKnownStatus(200)).toBe(true);
    expect(isKnownStatus(418)).toBe(true);
    expect(isKnownStatus(599)).toBe(false);
  });
});

describe("fetchFeed", () => {
  describe("successful responses", () => {
    it("returns the body and transport metadata", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .reply(200, XML, {
          headers: { "content-type": "application/rss+xml; charset=ISO-8859-1", etag: '"v1"' },
        });

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.kind).toBe("fresh");
      if (outcome.kind === "fresh") {
        expect(outcome.status).toBe(200);
        expect(outcome.finalUrl).toBe(FEED_URL);
        expect(outcome.redirects).toEqual([]);
        expect(outcome.diagnostics).toEqual([]);
        expect(outcome.raw.bytes.toString()).toBe(XML);
        expect(outcome.raw.contentType).toBe("application/rss+xml; charset=ISO-8859-1");
        expect(outcome.raw.declaredCharsetFromTransport).toBe("iso-8859-1");
        expect(outcome.headers.get("ETag")).toBe('"v1"');
      }
    });

    it("sends the feed request headers", async () => {
      let sent: Record<string, string> = {};
      agent
        .get(ORIGIN)
        .intercept({
          path: "/feed.xml",
          method: "GET",
          headers: (headers) => {
            sent = headers;
            return true;
          },
        })
        .reply(200, XML);

      await fetchFeed(FEED_URL, { dispatcher: agent, extraHeaders: { "X-Trace": "t-1" } });

      expect(headerValue(sent, "user-agent")).toBe(USER_AGENT);
      expect(headerValue(sent, "accept-encoding")).toBe("gzip, deflate");
      expect(headerValue(sent, "a-im")).toBe("feed");
      expect(headerValue(sent, "x-trace")).toBe("t-1");
    });

    it("returns error statuses with their body", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .reply(404, "<html><body>Not Found</body></html>", {
          headers: { "content-type": "text/html" },
        });

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.kind).toBe("fresh");
      if (outcome.kind === "fresh") {
        expect(outcome.status).toBe(404);
        expect(outcome.diagnostics).toEqual([]);
        expect(outcome.raw.bytes.toString()).toBe("<html><body>Not Found</body></html>");
      }
    });

    it("flags an unrecognized status", async () => {
      agent.get(ORIGIN).intercept({ path: "/feed.xml", method: "GET" }).reply(599, XML);

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.kind).toBe("fresh");
      if (outcome.kind === "fresh") {
        expect(outcome.status).toBe(599);
        expect(outcome.diagnostics).toEqual([
          {
            code: "unknown_status",
            stage: "transport",
            message: "Unrecognized HTTP status 599",
            details: { status: 599 },
          },
        ]);
      }
    });
  });

  describe("conditional requests", () => {
    it("returns not_modified when the etag matches", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET", headers: { "if-none-match": '"v1"' } })
        .reply(304, "", { headers: { etag: '"v1"' } });

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent, etag: '"v1"' });

      expect(outcome.kind).toBe("not_modified");
      if (outcome.kind === "not_modified") {
        expect(outcome.status).toBe(304);
        expect(outcome.finalUrl).toBe(FEED_URL);
        expect(outcome.headers.get("etag")).toBe('"v1"');
      }
    });

    it("returns not_modified again when the same etag is sent twice", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET", headers: { "if-none-match": '"v1"' } })
        .reply(304, "", { headers: { etag: '"v1"' } })
        .times(2);

      const first = await fetchFeed(FEED_URL, { dispatcher: agent, etag: '"v1"' });
      const second = await fetchFeed(FEED_URL, { dispatcher: agent, etag: '"v1"' });

      expect(first.kind).toBe("not_modified");
      expect(second.kind).toBe("not_modified");
      if (second.kind === "not_modified") {
        expect(second.headers.get("etag")).toBe('"v1"');
      }
    });

    it.each([
      ["a header string", "Thu, 01 Jan 2004 19:48:21 GMT"],
      ["a tuple", [2004, 1, 1, 19, 48, 21, 3, 1, 0] as const],
      ["a Date", new Date(Date.UTC(2004, 0, 1, 19, 48, 21))],
    ])("sends If-Modified-Since from %s", async (_label, modified) => {
      agent
        .get(ORIGIN)
        .intercept({
          path: "/feed.xml",
          method: "GET",
          headers: { "if-modified-since": "Thu, 01 Jan 2004 19:48:21 GMT" },
        })
        .reply(304, "");

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent, modified });

      expect(outcome.kind).toBe("not_modified");
    });
  });

  describe("redirects", () => {
    const redirectCases: Array<[number, "permanent" | "temporary"]> = [
      [301, "permanent"],
      [302, "temporary"],
      [303, "temporary"],
      [307, "temporary"],
      [308, "permanent"],
    ];

    it.each(redirectCases)("follows a %i redirect", async (status, type) => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .reply(status, "", { headers: { location: `${ORIGIN}/moved.xml` } });
      agent.get(ORIGIN).intercept({ path: "/moved.xml", method: "GET" }).reply(200, XML);

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.kind).toBe("fresh");
      if (outcome.kind === "fresh") {
        expect(outcome.status).toBe(status);
        expect(outcome.finalUrl).toBe(`${ORIGIN}/moved.xml`);
        expect(outcome.redirects).toEqual([{ url: `${ORIGIN}/moved.xml`, status, type }]);
        expect(outcome.raw.bytes.toString()).toBe(XML);
      }
    });

    it("resolves a relative Location", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .reply(302, "", { headers: { location: "/feeds/rss" } });
      agent.get(ORIGIN).intercept({ path: "/feeds/rss", method: "GET" }).reply(200, XML);

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.finalUrl).toBe(`${ORIGIN}/feeds/rss`);
    });

    it("gives up after the redirect limit", async () => {
      for (const [from, to] of [
        ["/a", "/b"],
        ["/b", "/c"],
        ["/c", "/d"],
      ]) {
        agent
          .get(ORIGIN)
          .intercept({ path: from, method: "GET" })
          .reply(302, "", { headers: { location: `${ORIGIN}${to}` } });
      }

      const outcome = await fetchFeed(`${ORIGIN}/a`, { dispatcher: agent, maxRedirects: 2 });

      expect(outcome.kind).toBe("redirected");
      if (outcome.kind === "redirected") {
        expect(outcome.status).toBe(302);
        expect(outcome.finalUrl).toBe(`${ORIGIN}/d`);
        expect(outcome.redirects).toHaveLength(3);
        expect(outcome.diagnostic.code).toBe("too_many_redirects");
        expect(outcome.diagnostic.message).toBe("Gave up after 2 redirects");
      }
    });

    it("keeps the body of a redirect without a Location", async () => {
      agent.get(ORIGIN).intercept({ path: "/feed.xml", method: "GET" }).reply(302, XML);

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.kind).toBe("fresh");
      if (outcome.kind === "fresh") {
        expect(outcome.status).toBe(302);
        expect(outcome.raw.bytes.toString()).toBe(XML);
        expect(outcome.redirects).toEqual([]);
      }
    });

    it("keeps the body of a redirect whose Location cannot be parsed", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .reply(301, XML, { headers: { location: "http://[broken" } });

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.kind).toBe("fresh");
      if (outcome.kind === "fresh") {
        expect(outcome.status).toBe(301);
        expect(outcome.raw.bytes.toString()).toBe(XML);
      }
    });
  });

  describe("compressed bodies", () => {
    it("inflates gzip bodies", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .reply(200, gzipSync(XML), { headers: { "content-encoding": "gzip" } });

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.kind).toBe("fresh");
      if (outcome.kind === "fresh") {
        expect(outcome.raw.bytes.toString()).toBe(XML);
        expect(outcome.raw.contentEncoding).toBe("gzip");
        expect(outcome.diagnostics).toEqual([]);
      }
    });

    it("keeps a mislabeled body and records a diagnostic", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .reply(200, XML, { headers: { "content-encoding": "gzip" } });

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.kind).toBe("fresh");
      if (outcome.kind === "fresh") {
        expect(outcome.raw.bytes.toString()).toBe(XML);
        expect(outcome.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
          "compression_mismatch",
        ]);
      }
    });
  });

  describe("transport errors", () => {
    it("reports DNS failures", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .replyWithError(new Error("getaddrinfo ENOTFOUND feeds.example.com"));

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent });

      expect(outcome.kind).toBe("transport_error");
      if (outcome.kind === "transport_error") {
        expect(outcome.finalUrl).toBe(FEED_URL);
        expect(outcome.cause).toEqual({
          message: "Domain not found: feeds.example.com",
          timeout: false,
        });
        expect(outcome.diagnostic).toEqual({
          code: "network_error",
          stage: "transport",
          message: "Domain not found: feeds.example.com",
          details: { url: FEED_URL },
        });
      }
    });

    it("rejects bodies over the size limit", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .reply(200, "x".repeat(100));

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent, maxSizeBytes: 10 });

      expect(outcome.kind).toBe("transport_error");
      if (outcome.kind === "transport_error") {
        expect(outcome.diagnostic.code).toBe("content_too_large");
        expect(outcome.diagnostic.message).toBe("Response body exceeds maximum size of 10 bytes");
      }
    });

    it("rejects early on a large Content-Length", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/feed.xml", method: "GET" })
        .reply(200, "x".repeat(100), { headers: { "content-length": "100" } });

      const outcome = await fetchFeed(FEED_URL, { dispatcher: agent, maxSizeBytes: 10 });

      expect(outcome.kind).toBe("transport_error");
      if (outcome.kind === "transport_error") {
        expect(outcome.diagnostic.details).toEqual({ maxBytes: 10, receivedBytes: 100 });
      }
    });
  });
});
