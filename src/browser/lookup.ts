/**
 * Layered element lookup
 *
 * The sign-in screens change labels and layout without notice, so every
 * lookup is an ordered list of candidates: the first one that turns visible
 * within the lookup timeout wins.
 */

import { logger } from '../logger';
import { attempt, errorMessage, fail, ok, type Result } from '../result';
import type { LocatorLike, QueryScope } from './types';

/** Per-candidate visibility wait */
export const LOOKUP_TIMEOUT_MS = 5000;

/** Timeout for a click or fill once the element is known to be there */
export const ACTION_TIMEOUT_MS = 10000;

export interface Candidate {
  description: string;
  locate: () => LocatorLike;
}

export async function firstVisible(
  candidates: Candidate[],
  step: string,
  timeoutMs: number = LOOKUP_TIMEOUT_MS
): Promise<Result<LocatorLike>> {
  for (const candidate of candidates) {
    try {
      const element = candidate.locate();
      await element.waitFor({ state: 'visible', timeout: timeoutMs });
      logger.debug(`${step}: using ${candidate.description}`);
      return ok(element);
    } catch (error) {
      logger.debug(`${step}: ${candidate.description} not found (${errorMessage(error)})`);
    }
  }

  return fail('lookup', step, `none of ${candidates.length} candidates became visible`);
}

export async function fillFirstVisible(
  candidates: Candidate[],
  value: string,
  step: string
): Promise<Result<void>> {
  const field = await firstVisible(candidates, step);
  if (!field.ok) {
    return field;
  }
  return attempt('input', step, () => field.value.fill(value, { timeout: ACTION_TIMEOUT_MS }));
}

export async function clickFirstVisible(candidates: Candidate[], step: string): Promise<Result<void>> {
  const target = await firstVisible(candidates, step);
  if (!target.ok) {
    return target;
  }
  return attempt('click', step, () => target.value.click({ timeout: ACTION_TIMEOUT_MS }));
}

/**
 * Wait for a selector to become visible, retrying the bounded wait a few
 * times before giving up.
 *
 * @returns whether the element showed up
 */
export async function waitForElementWithRetry(
  scope: QueryScope,
  selector: string,
  description: string,
  options: { timeoutMs: number; maxAttempts: number }
): Promise<boolean> {
  for (let attemptNumber = 1; attemptNumber <= options.maxAttempts; attemptNumber++) {
    logger.info(`Waiting for ${description} (attempt ${attemptNumber}/${options.maxAttempts})`);
    const shown = await attempt('lookup', `wait for ${description}`, () =>
      scope.locator(selector).first().waitFor({ state: 'visible', timeout: options.timeoutMs })
    );
    if (shown.ok) {
      logger.info(`${description} is visible`);
      return true;
    }
  }

  logger.warn(`${description} did not appear after ${options.maxAttempts} attempts`);
  return false;
}
