/**
 * Warm-up run
 *
 * Checks the credential, opens the browser, signs in, waits for the
 * workspace to come up, and always closes the browser again.
 */

import { chromium, firefox, webkit } from 'playwright';
import { v4 as uuidv4 } from 'uuid';

import { bootstrapSession } from './auth/bootstrapper';
import { CREDENTIAL_GUIDANCE, parseCredential } from './auth/credentials';
import { withBrowserSession } from './browser/session';
import type { BrowserLauncher } from './browser/types';
import { loadConfig, type AppConfig, type BrowserName } from './config';
import { logger } from './logger';
import { runReadinessPoll } from './readiness/poller';
import { attempt, errorMessage } from './result';

const launchers: Record<BrowserName, BrowserLauncher> = {
  chromium,
  firefox,
  webkit
};

export interface RunDependencies {
  /** Defaults to the Playwright browser type named in the config */
  launcher?: BrowserLauncher;
  now?: () => number;
}

export type RunOutcome =
  | { status: 'aborted'; reason: string }
  | { status: 'completed'; runId: string; authenticated: boolean; ready: boolean }
  | { status: 'failed'; runId: string; error: string };

function abortForMissingCredential(): RunOutcome {
  for (const line of CREDENTIAL_GUIDANCE.split('\n')) {
    logger.error(line);
  }
  return { status: 'aborted', reason: CREDENTIAL_GUIDANCE };
}

export async function run(config: AppConfig, deps: RunDependencies = {}): Promise<RunOutcome> {
  const credential = parseCredential(config.credentials);
  if (!credential) {
    return abortForMissingCredential();
  }

  const runId = uuidv4();
  const launcher = deps.launcher ?? launchers[config.browser];
  logger.info('Starting warm-up run', {
    runId,
    appUrl: config.appUrl,
    browser: config.browser,
    headless: config.headless
  });

  try {
    return await withBrowserSession<RunOutcome>(launcher, { headless: config.headless }, async ({ context, page }) => {
      const session = await bootstrapSession(context, page, {
        appUrl: config.appUrl,
        cookiesPath: config.cookiesPath,
        credential,
        markers: config.markers
      });

      if (!session.authenticated) {
        logger.warn('Could not reach the application, the run ends without a readiness check', {
          runId,
          finalUrl: session.finalUrl
        });
        return { status: 'completed', runId, authenticated: false, ready: false };
      }

      const report = await runReadinessPoll(page, {
        url: config.appUrl,
        maxReloadAttempts: config.poll.maxReloadAttempts,
        totalTimeoutSeconds: config.poll.totalTimeoutSeconds,
        now: deps.now
      });

      if (report.ready) {
        logger.info(`Workspace is starting, holding the page for ${config.holdAfterReadyMs / 1000}s`, { runId });
        await attempt('navigation', 'hold page open', () => page.waitForTimeout(config.holdAfterReadyMs));
      } else {
        logger.warn('Readiness markers not found within the poll budget', {
          runId,
          reloads: report.reloads,
          webButtonFound: report.webButtonFound,
          startingServerFound: report.startingServerFound
        });
      }

      return { status: 'completed', runId, authenticated: true, ready: report.ready };
    });
  } catch (error) {
    logger.error('Run failed', {
      runId,
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined
    });
    return { status: 'failed', runId, error: errorMessage(error) };
  } finally {
    logger.info('Run finished', { runId });
  }
}

/**
 * Entry used by the CLI: the credential is checked before the rest of the
 * environment, so a missing credential always produces the guidance even
 * when other variables are invalid.
 */
export async function runFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  deps: RunDependencies = {}
): Promise<RunOutcome> {
  if (!parseCredential(env.GOOGLE_PW)) {
    return abortForMissingCredential();
  }
  return run(loadConfig(env), deps);
}
