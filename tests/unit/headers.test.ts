/**
 * Unit tests for the case-insensitive header map.
 */

import { describe, it, expect } from "vitest";
import { HeaderMap } from "@/server/http/headers";

describe("HeaderMap", () => {
  it("looks up headers without regard to case", () => {
    const headers = new HeaderMap({ "Content-Type": "application/rss+xml" });

    expect(headers.get("content-type")).toBe("application/rss+xml");
    expect(headers.get("CONTENT-TYPE")).toBe("application/rss+xml");
    expect(headers.has("Content-type")).toBe(true);
  });

  it("keeps the first spelling and insertion order", () => {
    const headers = new HeaderMap();
    headers.set("ETag", '"a"');
    headers.set("Content-Type", "text/xml");
    headers.set("etag", '"b"');

    expect([...headers]).toEqual([
      ["ETag", '"b"'],
      ["Content-Type", "text/xml"],
    ]);
  });

  it("joins repeated values", () => {
    const headers = new HeaderMap([
      ["Vary", "Accept"],
      ["vary", "Accept-Encoding"],
    ]);

    expect(headers.get("Vary")).toBe("Accept, Accept-Encoding");
    expect(headers.getAll("vary")).toEqual(["Accept", "Accept-Encoding"]);
    expect(headers.size).toBe(1);
  });

  it("reads array values from incoming headers", () => {
    const headers = HeaderMap.fromIncoming({ "set-cookie": ["a=1", "b=2"], etag: '"x"' });

    expect(headers.getAll("Set-Cookie")).toEqual(["a=1", "b=2"]);
    expect(headers.get("ETag")).toBe('"x"');
  });

  it("lets merged headers override existing ones", () => {
    const headers = new HeaderMap({ "User-Agent": "default", Accept: "*/*" });
    headers.merge({ "user-agent": "custom" });

    expect(headers.toRecord()).toEqual({ "User-Agent": "custom", Accept: "*/*" });
  });

  it("takes the other map's spelling when merging a HeaderMap", () => {
    const headers = new HeaderMap({ "User-Agent": "default" });
    headers.merge(new HeaderMap({ "user-agent": "custom" }));

    expect(headers.toRecord()).toEqual({ "user-agent": "custom" });
  });

  it("deletes headers", () => {
    const headers = new HeaderMap({ ETag: '"x"' });

    expect(headers.delete("etag")).toBe(true);
    expect(headers.get("ETag")).toBeUndefined();
    expect(headers.delete("etag")).toBe(false);
  });
});
