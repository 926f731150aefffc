/**
 * Runtime configuration
 *
 * Read from the environment once at startup and passed down explicitly.
 */

import { z } from 'zod';

import { DEFAULT_AUTH_MARKERS, type AuthMarkers } from './auth/session-check';

export const DEFAULT_APP_URL = 'https://idx.google.com/app-43646734';

export type BrowserName = 'firefox' | 'chromium' | 'webkit';

export interface PollBudget {
  maxReloadAttempts: number;
  totalTimeoutSeconds: number;
}

export interface AppConfig {
  /** Raw "<identifier> <secret>" string; parsed and checked by the runner */
  credentials: string;
  appUrl: string;
  cookiesPath: string;
  browser: BrowserName;
  headless: boolean;
  markers: AuthMarkers;
  poll: PollBudget;
  /** How long to keep the page open once both markers were found */
  holdAfterReadyMs: number;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/** An empty variable counts as unset, so its default applies */
function unsetIfEmpty<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const envSchema = z.object({
  GOOGLE_PW: z.string().default(''),
  APP_URL: unsetIfEmpty(z.string().url().default(DEFAULT_APP_URL)),
  COOKIES_PATH: unsetIfEmpty(z.string().default('google_cookies.json')),
  BROWSER: unsetIfEmpty(z.enum(['firefox', 'chromium', 'webkit']).default('firefox')),
  HEADLESS: unsetIfEmpty(booleanFlag.default('true')),
  HOST_MARKER: unsetIfEmpty(z.string().default(DEFAULT_AUTH_MARKERS.hostMarker)),
  SIGNIN_MARKER: unsetIfEmpty(z.string().default(DEFAULT_AUTH_MARKERS.signInMarker)),
  POLL_MAX_RELOADS: unsetIfEmpty(z.coerce.number().int().positive().default(5)),
  POLL_TIMEOUT_SECONDS: unsetIfEmpty(z.coerce.number().int().nonnegative().default(120)),
  HOLD_AFTER_READY_SECONDS: unsetIfEmpty(z.coerce.number().int().nonnegative().default(20))
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    credentials: vars.GOOGLE_PW,
    appUrl: vars.APP_URL,
    cookiesPath: vars.COOKIES_PATH,
    browser: vars.BROWSER,
    headless: vars.HEADLESS,
    markers: {
      hostMarker: vars.HOST_MARKER,
      signInMarker: vars.SIGNIN_MARKER
    },
    poll: {
      maxReloadAttempts: vars.POLL_MAX_RELOADS,
      totalTimeoutSeconds: vars.POLL_TIMEOUT_SECONDS
    },
    holdAfterReadyMs: vars.HOLD_AFTER_READY_SECONDS * 1000
  };
}
