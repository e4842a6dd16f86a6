import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const calendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected a YYYY-MM-DD date");

const EnvSchema = z.object({
  YOUTUBE_API_KEY: z.string().optional(),
  YOUTUBE_VIDEO_ID: z.string().optional(),
  YOUTUBE_API_BASE_URL: z.string().url().default("https://www.googleapis.com/youtube/v3"),
  OUTPUT_DIR: z.string().default("youtube_output_data"),
  COMMENTS_START_DATE: calendarDateSchema.optional(),
  COMMENTS_END_DATE: calendarDateSchema.optional(),
  PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  CONCURRENCY_LIMIT: z.coerce.number().int().min(1).default(3),
  HTTP_HOST: z.string().default("0.0.0.0"),
  HTTP_PORT: z.coerce.number().int().min(1).max(65_535).default(9000),
  ANALYSIS_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(600),
  SEARCH_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(3600),
  SEARCH_MAX_RESULTS: z.coerce.number().int().min(1).max(50).default(10),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  NODE_ENV: z.string().default("development"),
});

type EnvValues = z.infer<typeof EnvSchema>;

export interface HarvesterConfig extends Readonly<EnvValues> {
  readonly warnings: readonly string[];
}

type EnvSource = Record<string, string | undefined>;

function readEnvSource(env: NodeJS.ProcessEnv): EnvSource {
  const source: EnvSource = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const raw = env[key]?.trim();
    source[key] = raw === undefined || raw.length === 0 ? undefined : raw;
  }
  if (source.LOG_LEVEL) {
    source.LOG_LEVEL = source.LOG_LEVEL.toLowerCase();
  }
  return source;
}

/**
 * Builds the configuration from an environment map. Invalid values are
 * replaced by their defaults and reported in `warnings` instead of throwing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvesterConfig {
  const source = readEnvSource(env);
  const warnings: string[] = [];

  const parsed = EnvSchema.safeParse(source);
  if (parsed.success) {
    return { ...parsed.data, warnings };
  }

  const fallbackSource: EnvSource = { ...source };
  for (const issue of parsed.error.issues) {
    const key = String(issue.path[0] ?? "root");
    warnings.push(`${key} is invalid (${issue.message}; received "${source[key] ?? ""}"). Falling back to default.`);
    delete fallbackSource[key];
  }

  return { ...EnvSchema.parse(fallbackSource), warnings };
}

export const config: HarvesterConfig = loadConfig();
