/**
 * Step results
 *
 * Browser steps against a third-party UI fail all the time. Instead of
 * throwing, each step reports a Result tagged with the stage it failed in,
 * and the caller decides whether that matters.
 */

import { logger } from './logger';

export type FailureStage = 'navigation' | 'lookup' | 'click' | 'input' | 'io';

export interface AutomationFailure {
  stage: FailureStage;
  /** Short name of the step, e.g. "fill password" */
  step: string;
  message: string;
  cause?: unknown;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; failure: AutomationFailure };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

/**
 * Build a failed result and log it.
 */
export function fail(
  stage: FailureStage,
  step: string,
  message: string,
  cause?: unknown
): Result<never> {
  logger.warn(`${step} failed: ${message}`, { stage });
  return { ok: false, failure: { stage, step, message, cause } };
}

/**
 * Run a step, turning anything it throws into a logged failure.
 */
export async function attempt<T>(
  stage: FailureStage,
  step: string,
  action: () => Promise<T>
): Promise<Result<T>> {
  try {
    return ok(await action());
  } catch (error) {
    return fail(stage, step, errorMessage(error), error);
  }
}
