import { z } from "zod";
import type { Logger } from "../types/index.js";

const optionalUrl = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.union([z.literal(""), z.string().url()]))
  .optional()
  .transform((v) => v || null);

const positiveInt = (fallback: number, max = 86_400_000) =>
  z.coerce.number().int().min(1).max(max).default(fallback);

const EnvSchema = z.object({
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  USERHUB_CACHE_FRESH_TTL_MS: positiveInt(15_000),
  USERHUB_CACHE_STALE_TTL_MS: positiveInt(120_000),
  UPSTREAM_CAMPAIGNS_URL: optionalUrl,
  UPSTREAM_SOCIAL_URL: optionalUrl,
  UPSTREAM_NOTIFICATIONS_URL: optionalUrl,
  UPSTREAM_TOKEN: z.string().trim().optional().transform((v) => v || null),
  UPSTREAM_TIMEOUT_MS: positiveInt(5_000, 120_000),
  UPSTREAM_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
});

export interface UpstreamConfig {
  campaignsUrl: string | null;
  socialUrl: string | null;
  notificationsUrl: string | null;
  token: string | null;
  timeoutMs: number;
  retries: number;
}

export interface AppConfig {
  host: string;
  port: number;
  logLevel: string;
  cache: {
    freshTtlMs: number;
    staleTtlMs: number;
  };
  upstream: UpstreamConfig;
}

type Env = Record<string, string | undefined>;

// Empty strings from .env files count as unset.
function withoutBlanks(env: Env): Env {
  const result: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") result[key] = value;
  }
  return result;
}

/**
 * Parses process configuration. Throws a ZodError on malformed values so the
 * process refuses to start.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.parse(withoutBlanks(env));
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    cache: {
      freshTtlMs: parsed.USERHUB_CACHE_FRESH_TTL_MS,
      staleTtlMs: parsed.USERHUB_CACHE_STALE_TTL_MS,
    },
    upstream: {
      campaignsUrl: parsed.UPSTREAM_CAMPAIGNS_URL,
      socialUrl: parsed.UPSTREAM_SOCIAL_URL,
      notificationsUrl: parsed.UPSTREAM_NOTIFICATIONS_URL,
      token: parsed.UPSTREAM_TOKEN,
      timeoutMs: parsed.UPSTREAM_TIMEOUT_MS,
      retries: parsed.UPSTREAM_RETRIES,
    },
  };
}

const UPSTREAM_VARS: Array<[string, keyof UpstreamConfig]> = [
  ["UPSTREAM_CAMPAIGNS_URL", "campaignsUrl"],
  ["UPSTREAM_SOCIAL_URL", "socialUrl"],
  ["UPSTREAM_NOTIFICATIONS_URL", "notificationsUrl"],
];

/** Returns the upstream env vars left unset; requests fail until they are set. */
export function validateUpstreams(config: AppConfig, logger: Logger | Console = console): string[] {
  const unset = UPSTREAM_VARS.filter(([, field]) => !config.upstream[field]).map(([name]) => name);
  if (unset.length) {
    logger.warn({ vars: unset }, "upstream env vars not set; dashboard requests will fail until configured");
  }
  return unset;
}
