/**
 * User-Agent header utilities.
 *
 * Format: LenientFeed/1.0 [context] (+https://www.npmjs.com/package/lenient-feed; EMAIL)
 */

import { fetcherConfig } from "../config/env";

/**
 * Package homepage, the primary contact point for publishers.
 */
const PACKAGE_URL = "https://www.npmjs.com/package/lenient-feed";

/**
 * Library name and base version.
 */
const APP_NAME_VERSION = "LenientFeed/1.0";

/**
 * Options for building a User-Agent string.
 */
export interface UserAgentOptions {
  /**
   * Optional context to include in the User-Agent, e.g. the calling
   * application's own name and version ("MyReader/2.3").
   */
  context?: string;
}

/**
 * Builds a standardized User-Agent string for outgoing HTTP requests.
 *
 * @example
 * buildUserAgent()
 * // => "LenientFeed/1.0 (+https://www.npmjs.com/package/lenient-feed)"
 *
 * @example
 * buildUserAgent({ context: "MyReader/2.3" })
 * // => "LenientFeed/1.0 MyReader/2.3 (+https://www.npmjs.com/package/lenient-feed)"
 */
export function buildUserAgent(options?: UserAgentOptions): string {
  let ua = APP_NAME_VERSION;

  if (options?.context) {
    ua += ` ${options.context}`;
  }

  const parts: string[] = [`+${PACKAGE_URL}`];

  if (fetcherConfig.contactEmail) {
    parts.push(fetcherConfig.contactEmail);
  }

  ua += ` (${parts.join("; ")})`;

  return ua;
}

/**
 * Pre-built User-Agent string for general use.
 *
 * Evaluated at module load time; use buildUserAgent() for dynamic values.
 */
export const USER_AGENT = buildUserAgent();
