/**
 * Engine Configuration
 *
 * Defaults come from environment variables, read once at module load.
 * Every parse call takes a snapshot of the effective configuration, so a
 * caller changing its own overrides between calls never affects a call that
 * is already running.
 */

import { z } from "zod";

/** Default timeout for a single HTTP hop (10 seconds). */
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

/** Default maximum number of redirects to follow. */
export const DEFAULT_MAX_REDIRECTS = 5;

/** Default maximum response body size (10MB). */
export const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024;

/**
 * Parses an integer environment variable, returning undefined when it is
 * unset or not a positive integer.
 */
function intFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) || parsed < 0 ? undefined : parsed;
}

/**
 * Fetcher identity, used when building the User-Agent header.
 */
export const fetcherConfig = {
  /** Replaces the generated User-Agent entirely when set. */
  userAgent: process.env.FEED_USER_AGENT,

  /** Contact address included in the generated User-Agent. */
  contactEmail: process.env.FEED_CONTACT_EMAIL,
};

export const engineConfigSchema = z.object({
  /** User-Agent header sent with every request. Empty means "generate one". */
  userAgent: z.string().optional(),
  /** Timeout for each HTTP hop in milliseconds. */
  timeoutMs: z.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  /** Maximum redirects followed before giving up. */
  maxRedirects: z.number().int().min(0).max(20).default(DEFAULT_MAX_REDIRECTS),
  /** Maximum response body size in bytes. */
  maxSizeBytes: z.number().int().positive().default(DEFAULT_MAX_SIZE_BYTES),
  /** When false the well-formedness-checked parser is skipped and only the relaxed one runs. */
  strictParsing: z.boolean().default(true),
  /** Resolve relative feed and entry links against the document URL. */
  resolveRelativeUris: z.boolean().default(true),
});

export type EngineConfig = Readonly<z.infer<typeof engineConfigSchema>>;

/** Partial overrides a caller may pass to a single parse call. */
export type EngineConfigOverrides = z.input<typeof engineConfigSchema>;

/**
 * Configuration used when a caller passes no overrides.
 */
export const defaultEngineConfig: EngineConfig = Object.freeze(
  engineConfigSchema.parse({
    userAgent: fetcherConfig.userAgent,
    timeoutMs: intFromEnv("FEED_FETCH_TIMEOUT_MS"),
    maxRedirects: intFromEnv("FEED_MAX_REDIRECTS"),
    maxSizeBytes: intFromEnv("FEED_MAX_SIZE_BYTES"),
  })
);

/**
 * Produces the frozen configuration snapshot for one invocation.
 *
 * @throws ZodError if an override has the wrong type or range
 */
export function resolveEngineConfig(overrides?: EngineConfigOverrides): EngineConfig {
  if (!overrides) {
    return defaultEngineConfig;
  }
  return Object.freeze(engineConfigSchema.parse({ ...defaultEngineConfig, ...overrides }));
}
