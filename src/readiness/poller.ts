/**
 * Readiness Poller
 *
 * After sign-in the workspace takes a while to boot. This reloads the
 * application and looks for two markers: the "Web" control in the
 * workspace frame (clicked once found) and the "Starting server" heading
 * in the web preview. It stops when both were seen, when the deadline
 * passes, or when the reload budget is used up.
 */

import { logger } from '../logger';
import { attempt } from '../result';
import { ACTION_TIMEOUT_MS } from '../browser/lookup';
import type { PageLike } from '../browser/types';
import {
  findWithStrategies,
  headingAlongFramePath,
  headingInAnyFrame,
  webControlInWorkspaceFrame,
  type LookupStrategy
} from './strategies';

export interface ReadinessState {
  webButtonFound: boolean;
  startingServerFound: boolean;
}

export interface ReadinessReport extends ReadinessState {
  ready: boolean;
  reloads: number;
  elapsedMs: number;
}

export interface MarkerStrategies {
  webButton: readonly LookupStrategy[];
  startingServer: readonly LookupStrategy[];
}

export interface PollTiming {
  reloadTimeoutMs: number;
  loadStateTimeoutMs: number;
  /** Pause between finding the Web control and clicking it */
  webButtonSettleMs: number;
  /** Pause before looking for the heading, giving the click time to take effect */
  followUpDelayMs: number;
  iterationDelayMs: number;
}

export interface PollOptions {
  url: string;
  maxReloadAttempts: number;
  totalTimeoutSeconds: number;
  strategies?: Partial<MarkerStrategies>;
  timing?: Partial<PollTiming>;
  now?: () => number;
}

export const DEFAULT_POLL_TIMING: PollTiming = {
  reloadTimeoutMs: 30000,
  loadStateTimeoutMs: 60000,
  webButtonSettleMs: 20000,
  followUpDelayMs: 3000,
  iterationDelayMs: 5000
};

export function defaultMarkerStrategies(): MarkerStrategies {
  return {
    webButton: [webControlInWorkspaceFrame()],
    startingServer: [headingAlongFramePath(), headingInAnyFrame()]
  };
}

function isReady(state: ReadinessState): boolean {
  return state.webButtonFound && state.startingServerFound;
}

async function pause(page: PageLike, ms: number): Promise<void> {
  await attempt('navigation', `wait ${ms}ms`, () => page.waitForTimeout(ms));
}

async function reload(page: PageLike, url: string, timing: PollTiming): Promise<void> {
  await attempt('navigation', 'reload application', async () => {
    await page.goto(url, { timeout: timing.reloadTimeoutMs });
    await page.waitForLoadState('domcontentloaded', { timeout: timing.loadStateTimeoutMs });
    await page.waitForLoadState('networkidle', { timeout: timing.loadStateTimeoutMs });
  });
}

async function activateWebButton(
  page: PageLike,
  strategies: readonly LookupStrategy[],
  timing: PollTiming
): Promise<boolean> {
  const control = await findWithStrategies(page, strategies);
  if (!control.ok) {
    return false;
  }

  await pause(page, timing.webButtonSettleMs);
  logger.info('Clicking Web control');
  const clicked = await attempt('click', 'click Web control', () =>
    control.value.click({ timeout: ACTION_TIMEOUT_MS })
  );
  return clicked.ok;
}

export async function runReadinessPoll(page: PageLike, options: PollOptions): Promise<ReadinessReport> {
  const now = options.now ?? Date.now;
  const timing: PollTiming = { ...DEFAULT_POLL_TIMING, ...options.timing };
  const strategies: MarkerStrategies = { ...defaultMarkerStrategies(), ...options.strategies };

  const startedAt = now();
  const deadline = startedAt + options.totalTimeoutSeconds * 1000;
  const state: ReadinessState = { webButtonFound: false, startingServerFound: false };
  let reloads = 0;

  while (now() < deadline && reloads < options.maxReloadAttempts) {
    if (!isReady(state)) {
      logger.info(`Reloading application (attempt ${reloads + 1}/${options.maxReloadAttempts})`);
      await reload(page, options.url, timing);
      reloads += 1;
    }

    if (!state.webButtonFound) {
      state.webButtonFound = await activateWebButton(page, strategies.webButton, timing);
    }

    if (state.webButtonFound && !state.startingServerFound) {
      await pause(page, timing.followUpDelayMs);
      const heading = await findWithStrategies(page, strategies.startingServer);
      state.startingServerFound = heading.ok;
    }

    if (isReady(state)) {
      logger.info('Web control clicked and "Starting server" heading found');
      break;
    }

    await pause(page, timing.iterationDelayMs);
    const elapsedMs = now() - startedAt;
    const remainingSeconds = Math.max(0, Math.ceil((deadline - now()) / 1000));
    logger.info(`Waited ${Math.floor(elapsedMs / 1000)}s, ${remainingSeconds}s left`);
  }

  return {
    ...state,
    ready: isReady(state),
    reloads,
    elapsedMs: now() - startedAt
  };
}

/**
 * Poll until both readiness markers were seen.
 *
 * @returns true only when both markers were found within the budget
 */
export async function pollForReadiness(page: PageLike, options: PollOptions): Promise<boolean> {
  const report = await runReadinessPoll(page, options);
  return report.ready;
}
