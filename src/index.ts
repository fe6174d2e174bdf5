/**
 * lenient-feed: a tolerant RSS and Atom parser.
 *
 * ```typescript
 * import { parse } from "lenient-feed";
 *
 * const result = await parse("https://example.com/feed.xml");
 * if (result.bozo) {
 *   console.warn(result.bozoException?.message);
 * }
 * ```
 */

export * from "./server/feed";
export * from "./server/dates";
export * from "./server/encoding";
export { HeaderMap, type HeaderInit } from "./server/http/headers";
export { buildUserAgent, USER_AGENT, type UserAgentOptions } from "./server/http/user-agent";
export {
  defaultEngineConfig,
  engineConfigSchema,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from "./server/config/env";
export { createLogger, logger, type Logger, type LogLevel } from "./lib/logger";
