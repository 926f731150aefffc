/**
 * Interactive sign-in
 *
 * Drives the identity provider's own form. The flow may show an account
 * chooser, a direct identifier prompt, or go straight to the password
 * prompt, and label text varies, so each step tries several locators and
 * any step that fails is logged and skipped.
 */

import { logger } from '../logger';
import { attempt } from '../result';
import {
  clickFirstVisible,
  fillFirstVisible,
  firstVisible,
  waitForElementWithRetry,
  type Candidate
} from '../browser/lookup';
import type { PageLike } from '../browser/types';
import type { Credential } from './credentials';

export const SIGN_IN_SELECTORS = {
  accountChooser: 'text="Choose an account"',
  firstAccount: '.OVnw0d',
  identifierLabel: 'Email or phone',
  identifierInput: 'input[type="email"]',
  passwordLabel: 'Enter your password',
  passwordInput: 'input[type="password"]',
  nextButtonName: 'Next',
  nextButtonFallback: 'button[jsname="LgbsSe"]'
} as const;

const PAGE_SETTLE_TIMEOUT_MS = 10000;
const PASSWORD_WAIT = { timeoutMs: 10000, maxAttempts: 2 };
const AFTER_PASSWORD_PAUSE_MS = 5000;
const NAVIGATION_TIMEOUT_MS = 30000;

export interface InteractiveLoginOptions {
  /** Where to go once the password was submitted */
  appUrl: string;
}

function nextButton(page: PageLike): Candidate[] {
  return [
    {
      description: `"${SIGN_IN_SELECTORS.nextButtonName}" button`,
      locate: () => page.getByRole('button', { name: SIGN_IN_SELECTORS.nextButtonName }).first()
    },
    {
      description: SIGN_IN_SELECTORS.nextButtonFallback,
      locate: () => page.locator(SIGN_IN_SELECTORS.nextButtonFallback).first()
    }
  ];
}

async function chooseAccount(page: PageLike, identifier: string): Promise<void> {
  logger.info('Account chooser shown, selecting an account');

  const account = await firstVisible(
    [
      {
        description: 'account matching identifier',
        locate: () => page.getByText(identifier).first()
      },
      {
        description: 'account row containing identifier',
        locate: () => page.locator(`div:has-text(${JSON.stringify(identifier)})`).first()
      },
      {
        description: 'first listed account',
        locate: () => page.locator(SIGN_IN_SELECTORS.firstAccount).first()
      }
    ],
    'select account'
  );

  if (!account.ok) {
    logger.info('No account option found, continuing to the password step');
    return;
  }

  const clicked = await attempt('click', 'click account', () => account.value.click());
  if (clicked.ok) {
    await attempt('navigation', 'wait after account selection', () =>
      page.waitForLoadState('networkidle', { timeout: PAGE_SETTLE_TIMEOUT_MS })
    );
  }
}

async function submitIdentifier(page: PageLike, identifier: string): Promise<void> {
  logger.info('Entering account identifier');

  await fillFirstVisible(
    [
      {
        description: `"${SIGN_IN_SELECTORS.identifierLabel}" field`,
        locate: () => page.getByLabel(SIGN_IN_SELECTORS.identifierLabel).first()
      },
      {
        description: SIGN_IN_SELECTORS.identifierInput,
        locate: () => page.locator(SIGN_IN_SELECTORS.identifierInput).first()
      }
    ],
    identifier,
    'fill identifier'
  );

  await clickFirstVisible(nextButton(page), 'submit identifier');
}

async function submitPassword(page: PageLike, secret: string): Promise<void> {
  logger.info('Entering password');

  await fillFirstVisible(
    [
      {
        description: `"${SIGN_IN_SELECTORS.passwordLabel}" field`,
        locate: () => page.getByLabel(SIGN_IN_SELECTORS.passwordLabel).first()
      },
      {
        description: SIGN_IN_SELECTORS.passwordInput,
        locate: () => page.locator(SIGN_IN_SELECTORS.passwordInput).first()
      }
    ],
    secret,
    'fill password'
  );

  const submitted = await clickFirstVisible(nextButton(page), 'submit password');
  if (submitted.ok) {
    logger.info('Password submitted');
    await attempt('navigation', 'wait after password', () => page.waitForTimeout(AFTER_PASSWORD_PAUSE_MS));
  }
}

/**
 * Walk through the sign-in form with the given credential and return to the
 * application. Never throws; whether it worked is decided by the caller
 * looking at the resulting URL.
 */
export async function performInteractiveLogin(
  page: PageLike,
  credential: Credential,
  options: InteractiveLoginOptions
): Promise<void> {
  logger.info('Starting interactive sign-in');

  await attempt('navigation', 'wait for sign-in page', () =>
    page.waitForLoadState('domcontentloaded', { timeout: PAGE_SETTLE_TIMEOUT_MS })
  );

  const chooser = await attempt('lookup', 'detect account chooser', () =>
    page.locator(SIGN_IN_SELECTORS.accountChooser).count()
  );

  if (chooser.ok && chooser.value > 0) {
    await chooseAccount(page, credential.identifier);
  } else {
    await submitIdentifier(page, credential.identifier);
  }

  await waitForElementWithRetry(page, SIGN_IN_SELECTORS.passwordInput, 'password field', PASSWORD_WAIT);
  await submitPassword(page, credential.secret);

  await attempt('navigation', 'return to application', () =>
    page.goto(options.appUrl, { timeout: NAVIGATION_TIMEOUT_MS })
  );
}
