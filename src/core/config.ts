/**
 * config.ts — The run configuration, built once at process start.
 *
 * `loadTrackerConfig()` reads the environment, validates it with zod and
 * returns a plain value object.  Components receive it by reference through
 * their constructors; nothing reads `process.env` after this point.
 */

import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';

export interface TrackerConfig {
  portal: {
    baseUrl: string;
    loginUrl: string;
    searchUrl: string;
    /** Mobile number the portal sends the OTP to. */
    mobile?: string;
    /** Only listing rows of this classification are tracked. */
    category: string;
  };
  captchaApiKey?: string;

  paths: {
    sessionFile: string;
    snapshotFile: string;
    otpCacheFile: string;
  };

  browser: {
    headless: boolean;
    executablePath?: string;
  };
  /** Manual OTP entry is offered only when a human is watching. */
  interactive: boolean;

  session: {
    maxAgeHours: number;
    maxLoginAttempts: number;
    challengeAttempts: number;
  };

  otp: {
    webhookPort: number;
    timeoutMs: number;
    freshTimeoutMs: number;
    pollIntervalMs: number;
    cacheMaxAgeHours: number;
  };

  scraping: {
    minDelayMs: number;
    maxDelayMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    maxConsecutiveFailures: number;
    /** Development cap on harvested records; 0 means unlimited. */
    maxRecords: number;
  };

  healthWebhookUrl?: string;
  supabase?: {
    url: string;
    serviceRoleKey: string;
  };
  logLevel: LogLevel;
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const positive = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

const envSchema = z.object({
  PORTAL_BASE_URL: z.string().url().default('https://www.ireps.gov.in'),
  PORTAL_LOGIN_URL: z.string().url().default('https://www.ireps.gov.in/epsn/guestLogin.do'),
  PORTAL_SEARCH_URL: z.string().url().default('https://www.ireps.gov.in/epsn/anonymSearch.do'),
  PORTAL_MOBILE: optionalString,
  CAPTCHA_API_KEY: optionalString,
  CATEGORY: z.string().trim().min(1).default('Works'),

  DATA_DIR: z.string().trim().min(1).default('data'),
  SESSION_FILE: z.string().trim().min(1).default('session/portal_session.json'),
  SNAPSHOT_FILE: optionalString,
  OTP_CACHE_FILE: optionalString,

  HEADLESS: flag(true),
  CHROME_EXECUTABLE_PATH: optionalString,

  SESSION_MAX_AGE_HOURS: positive(20),
  MAX_LOGIN_ATTEMPTS: positive(2),
  CHALLENGE_ATTEMPTS: positive(3),

  WEBHOOK_PORT: z.coerce.number().int().min(1).max(65535).default(5050),
  OTP_TIMEOUT_MS: positive(90_000),
  FRESH_OTP_TIMEOUT_MS: positive(60_000),
  OTP_POLL_INTERVAL_MS: positive(3_000),
  OTP_CACHE_MAX_AGE_HOURS: positive(24),

  MIN_DELAY_MS: count(2_000),
  MAX_DELAY_MS: count(4_000),
  MAX_RETRIES: positive(3),
  RETRY_BASE_DELAY_MS: count(2_000),
  MAX_CONSECUTIVE_FAILURES: positive(3),
  MAX_RECORDS: count(0),

  HEALTH_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
  SUPABASE_URL: optionalString.pipe(z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface ConfigOverrides {
  interactive?: boolean;
  maxRecords?: number;
}

/**
 * Build a TrackerConfig from an environment map (defaults to process.env).
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadTrackerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): TrackerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  if (e.MIN_DELAY_MS > e.MAX_DELAY_MS) {
    throw new ConfigError([
      `MIN_DELAY_MS (${e.MIN_DELAY_MS}) must not exceed MAX_DELAY_MS (${e.MAX_DELAY_MS})`,
    ]);
  }
  if (Boolean(e.SUPABASE_URL) !== Boolean(e.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new ConfigError([
      'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together',
    ]);
  }

  const dataDir = path.resolve(e.DATA_DIR);

  return {
    portal: {
      baseUrl: e.PORTAL_BASE_URL.replace(/\/+$/, ''),
      loginUrl: e.PORTAL_LOGIN_URL,
      searchUrl: e.PORTAL_SEARCH_URL,
      mobile: e.PORTAL_MOBILE,
      category: e.CATEGORY,
    },
    captchaApiKey: e.CAPTCHA_API_KEY,
    paths: {
      sessionFile: path.resolve(e.SESSION_FILE),
      snapshotFile: e.SNAPSHOT_FILE
        ? path.resolve(e.SNAPSHOT_FILE)
        : path.join(dataDir, 'tenders_memory.json'),
      otpCacheFile: e.OTP_CACHE_FILE
        ? path.resolve(e.OTP_CACHE_FILE)
        : path.join(dataDir, 'otp_cache.json'),
    },
    browser: {
      headless: e.HEADLESS,
      executablePath: e.CHROME_EXECUTABLE_PATH,
    },
    interactive: overrides.interactive ?? !e.HEADLESS,
    session: {
      maxAgeHours: e.SESSION_MAX_AGE_HOURS,
      maxLoginAttempts: e.MAX_LOGIN_ATTEMPTS,
      challengeAttempts: e.CHALLENGE_ATTEMPTS,
    },
    otp: {
      webhookPort: e.WEBHOOK_PORT,
      timeoutMs: e.OTP_TIMEOUT_MS,
      freshTimeoutMs: e.FRESH_OTP_TIMEOUT_MS,
      pollIntervalMs: e.OTP_POLL_INTERVAL_MS,
      cacheMaxAgeHours: e.OTP_CACHE_MAX_AGE_HOURS,
    },
    scraping: {
      minDelayMs: e.MIN_DELAY_MS,
      maxDelayMs: e.MAX_DELAY_MS,
      maxRetries: e.MAX_RETRIES,
      retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxConsecutiveFailures: e.MAX_CONSECUTIVE_FAILURES,
      maxRecords: overrides.maxRecords ?? e.MAX_RECORDS,
    },
    healthWebhookUrl: e.HEALTH_WEBHOOK_URL,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
    logLevel: e.LOG_LEVEL,
  };
}
