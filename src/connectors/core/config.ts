import { ConfigError } from "./errors.js";
import type { ArchiveConfig, RateLimiterConfig } from "./types.js";

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: ArchiveConfig = {
  outputDir: "downloads",
  pageSize: 100,
  backoff: {
    maxAttempts: 5,
    baseDelayMs: 1_000,
    maxDelayMs: 60_000,
  },
  pageTimeoutMs: 30_000,
  mediaTimeoutMs: 300_000,
  rateLimiter: { minDelayMs: 0 },
  logFile: null,
};

export const DEFAULT_REQUEST_WINDOW_MS = 60_000;

/** Values given on the command line; they win over the environment. */
export interface ConfigOverrides {
  outputDir?: string;
  pageSize?: string;
  maxAttempts?: string;
  logFile?: string;
}

/** Integer setting within range, or `fallback` when unset. */
export function parseInteger(
  name: string,
  raw: string | undefined,
  fallback: number,
  { min, max }: { min: number; max?: number },
): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min || (max !== undefined && value > max)) {
    const range = max === undefined ? `>= ${min}` : `${min}-${max}`;
    throw new ConfigError(`${name} must be an integer ${range}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {},
): ArchiveConfig {
  const d = DEFAULT_CONFIG;
  const baseDelayMs = parseInteger(
    "ARCHIVE_BACKOFF_BASE_MS",
    env.ARCHIVE_BACKOFF_BASE_MS,
    d.backoff.baseDelayMs,
    { min: 1 },
  );
  const maxDelayMs = parseInteger(
    "ARCHIVE_BACKOFF_MAX_MS",
    env.ARCHIVE_BACKOFF_MAX_MS,
    d.backoff.maxDelayMs,
    { min: 1 },
  );
  if (maxDelayMs < baseDelayMs) {
    throw new ConfigError(
      `ARCHIVE_BACKOFF_MAX_MS (${maxDelayMs}) is below ARCHIVE_BACKOFF_BASE_MS (${baseDelayMs})`,
    );
  }

  const rateLimiter: RateLimiterConfig = {
    minDelayMs: parseInteger(
      "ARCHIVE_REQUEST_DELAY_MS",
      env.ARCHIVE_REQUEST_DELAY_MS,
      d.rateLimiter.minDelayMs ?? 0,
      { min: 0 },
    ),
  };
  // The window applies only once a request cap is set.
  if (env.ARCHIVE_REQUEST_MAX?.trim()) {
    rateLimiter.maxRequests = parseInteger(
      "ARCHIVE_REQUEST_MAX",
      env.ARCHIVE_REQUEST_MAX,
      0,
      { min: 1 },
    );
    rateLimiter.windowMs = parseInteger(
      "ARCHIVE_REQUEST_WINDOW_MS",
      env.ARCHIVE_REQUEST_WINDOW_MS,
      DEFAULT_REQUEST_WINDOW_MS,
      { min: 1 },
    );
  }

  const logFile = overrides.logFile ?? env.ARCHIVE_LOG_FILE;
  return {
    outputDir: overrides.outputDir ?? env.ARCHIVE_OUTPUT_DIR ?? d.outputDir,
    pageSize: parseInteger(
      "page size",
      overrides.pageSize ?? env.ARCHIVE_PAGE_SIZE,
      d.pageSize,
      { min: 1, max: 100 },
    ),
    backoff: {
      maxAttempts: parseInteger(
        "max attempts",
        overrides.maxAttempts ?? env.ARCHIVE_MAX_ATTEMPTS,
        d.backoff.maxAttempts,
        { min: 1 },
      ),
      baseDelayMs,
      maxDelayMs,
    },
    pageTimeoutMs: parseInteger(
      "ARCHIVE_PAGE_TIMEOUT_MS",
      env.ARCHIVE_PAGE_TIMEOUT_MS,
      d.pageTimeoutMs,
      { min: 1 },
    ),
    mediaTimeoutMs: parseInteger(
      "ARCHIVE_MEDIA_TIMEOUT_MS",
      env.ARCHIVE_MEDIA_TIMEOUT_MS,
      d.mediaTimeoutMs,
      { min: 1 },
    ),
    rateLimiter,
    logFile: logFile ? logFile : null,
  };
}

/** `--limit` value: a non-negative integer, or undefined for no limit. */
export function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  return parseInteger("limit", raw, 0, { min: 0 });
}
