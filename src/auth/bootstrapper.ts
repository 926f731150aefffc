/**
 * Session Bootstrapper
 *
 * Gets the page onto the application as a signed-in user: saved cookies
 * first, interactive sign-in if they do not work, then a final check.
 * Cookies are saved after a successful interactive sign-in and again after
 * the final check.
 */

import { logger } from '../logger';
import { attempt } from '../result';
import type { ContextLike, PageLike } from '../browser/types';
import { applyPersistedCookies, persistCookies } from './cookie-jar';
import type { Credential } from './credentials';
import { performInteractiveLogin } from './interactive-login';
import { isAuthenticated, type AuthMarkers } from './session-check';

const NAVIGATION_TIMEOUT_MS = 30000;
const SIGN_IN_NAVIGATION_TIMEOUT_MS = 60000;
const LOAD_STATE_TIMEOUT_MS = 60000;

export interface BootstrapOptions {
  appUrl: string;
  cookiesPath: string;
  credential: Credential;
  markers: AuthMarkers;
}

export interface BootstrapResult {
  authenticated: boolean;
  usedSavedCookies: boolean;
  interactiveLogin: boolean;
  finalUrl: string;
}

async function openApplication(page: PageLike, appUrl: string): Promise<void> {
  logger.info(`Opening ${appUrl}`);
  await attempt('navigation', 'open application', () =>
    page.goto(appUrl, { timeout: NAVIGATION_TIMEOUT_MS })
  );
}

/** Make sure the page is somewhere in the sign-in flow before filling forms */
async function reachSignInPage(page: PageLike, options: BootstrapOptions): Promise<void> {
  if (page.url().includes(options.markers.signInMarker)) {
    return;
  }

  await attempt('navigation', 'open sign-in page', () =>
    page.goto(options.appUrl, { timeout: SIGN_IN_NAVIGATION_TIMEOUT_MS })
  );
  await attempt('navigation', 'wait for sign-in page to load', async () => {
    await page.waitForLoadState('domcontentloaded', { timeout: LOAD_STATE_TIMEOUT_MS });
    await page.waitForLoadState('networkidle', { timeout: LOAD_STATE_TIMEOUT_MS });
  });
}

export async function bootstrapSession(
  context: ContextLike,
  page: PageLike,
  options: BootstrapOptions
): Promise<BootstrapResult> {
  const cookiesLoaded = await applyPersistedCookies(context, options.cookiesPath);

  await openApplication(page, options.appUrl);

  let usedSavedCookies = false;
  if (cookiesLoaded) {
    if (isAuthenticated(page.url(), options.markers)) {
      logger.info('Signed in with saved cookies');
      usedSavedCookies = true;
    } else {
      logger.info('Saved cookies did not sign in, falling back to interactive sign-in');
    }
  }

  if (!usedSavedCookies) {
    await reachSignInPage(page, options);
    await performInteractiveLogin(page, options.credential, { appUrl: options.appUrl });

    if (isAuthenticated(page.url(), options.markers)) {
      logger.info('Interactive sign-in succeeded');
      await persistCookies(context, options.cookiesPath);
    } else {
      logger.warn(`Sign-in may not have succeeded, current URL: ${page.url()}`);
    }
  }

  await openApplication(page, options.appUrl);

  const finalUrl = page.url();
  const authenticated = isAuthenticated(finalUrl, options.markers);
  if (authenticated) {
    await persistCookies(context, options.cookiesPath);
    logger.info(`Application reached at ${finalUrl}`);
  } else {
    logger.warn(`Not on the application after sign-in, current URL: ${finalUrl}`);
  }

  return {
    authenticated,
    usedSavedCookies,
    interactiveLogin: !usedSavedCookies,
    finalUrl
  };
}
