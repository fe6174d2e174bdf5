/**
 * Unit tests for User-Agent construction.
 */

import { describe, it, expect } from "vitest";
import { buildUserAgent, USER_AGENT } from "@/server/http/user-agent";

describe("buildUserAgent", () => {
  it("builds the default User-Agent", () => {
    expect(buildUserAgent()).toBe("LenientFeed/1.0 (+https://www.npmjs.com/package/lenient-feed)");
  });

  it("includes caller context", () => {
    expect(buildUserAgent({ context: "MyReader/2.3" })).toBe(
      "LenientFeed/1.0 MyReader/2.3 (+https://www.npmjs.com/package/lenient-feed)"
    );
  });

  it("pre-builds the default", () => {
    expect(USER_AGENT).toBe(buildUserAgent());
  });
});
