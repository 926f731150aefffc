/**
 * Marker lookup strategies
 *
 * Each readiness marker can be found more than one way. A strategy is one
 * way; the poller tries a marker's strategies in order and takes the first
 * hit, so each path can be tested (or replaced) on its own.
 */

import { logger } from '../logger';
import { attempt, fail, ok, type AutomationFailure, type Result } from '../result';
import { LOOKUP_TIMEOUT_MS } from '../browser/lookup';
import type { LocatorLike, PageLike, QueryScope } from '../browser/types';

/** Iframe that hosts the workspace UI */
export const WORKSPACE_FRAME_SELECTOR = '#iframe-container iframe';

/** Frames from the page down to the web preview, outermost first */
export const PREVIEW_FRAME_PATH: readonly string[] = [
  WORKSPACE_FRAME_SELECTOR,
  'iframe[name="ded0e382-bedf-478d-a870-33bb6cadac6f"]',
  'iframe[title="Web"]',
  '#previewFrame'
];

export const WEB_CONTROL_LABEL = 'Web';
export const STARTING_SERVER_HEADING = 'Starting server';

export interface LookupStrategy {
  name: string;
  find(page: PageLike): Promise<Result<LocatorLike>>;
}

async function visibleHeading(
  scope: QueryScope,
  heading: string,
  where: string,
  timeoutMs: number
): Promise<Result<LocatorLike>> {
  const element = scope.getByRole('heading', { name: heading }).first();
  const shown = await attempt('lookup', `find "${heading}" heading in ${where}`, () =>
    element.waitFor({ state: 'visible', timeout: timeoutMs })
  );
  return shown.ok ? ok(element) : shown;
}

/**
 * Exact-text control inside the first workspace iframe.
 */
export function webControlInWorkspaceFrame(
  frameSelector: string = WORKSPACE_FRAME_SELECTOR,
  label: string = WEB_CONTROL_LABEL,
  timeoutMs: number = LOOKUP_TIMEOUT_MS
): LookupStrategy {
  return {
    name: `"${label}" control in workspace frame`,
    async find(page) {
      const frame = page.locator(frameSelector).first();
      const attached = await attempt('lookup', 'find workspace frame', () =>
        frame.waitFor({ state: 'attached', timeout: timeoutMs })
      );
      if (!attached.ok) {
        return attached;
      }

      const control = frame.contentFrame().getByText(label, { exact: true }).first();
      const shown = await attempt('lookup', `find "${label}" control`, () =>
        control.waitFor({ state: 'visible', timeout: timeoutMs })
      );
      return shown.ok ? ok(control) : shown;
    }
  };
}

/**
 * Descend a fixed chain of iframes and look for the heading at the bottom.
 * A missing level fails the strategy and names the selector that was missing.
 */
export function headingAlongFramePath(
  path: readonly string[] = PREVIEW_FRAME_PATH,
  heading: string = STARTING_SERVER_HEADING,
  timeoutMs: number = LOOKUP_TIMEOUT_MS
): LookupStrategy {
  return {
    name: `"${heading}" heading via preview frame path`,
    async find(page) {
      let scope: QueryScope = page;
      for (const selector of path) {
        const frame = scope.locator(selector).first();
        const attached = await attempt('lookup', `find frame ${selector}`, () =>
          frame.waitFor({ state: 'attached', timeout: timeoutMs })
        );
        if (!attached.ok) {
          return attached;
        }
        scope = frame.contentFrame();
      }

      return visibleHeading(scope, heading, 'preview frame', timeoutMs);
    }
  };
}

/**
 * Check every frame attached to the page for a visible heading. Does not
 * wait; a frame that errors (e.g. detached mid-scan) is skipped.
 */
export function headingInAnyFrame(heading: string = STARTING_SERVER_HEADING): LookupStrategy {
  return {
    name: `"${heading}" heading in any frame`,
    async find(page) {
      const frames = page.frames();
      for (const frame of frames) {
        const element = frame.getByRole('heading', { name: heading }).first();
        const visible = await attempt('lookup', `check frame for "${heading}" heading`, () =>
          element.isVisible()
        );
        if (visible.ok && visible.value) {
          return ok(element);
        }
      }

      return fail('lookup', `scan frames for "${heading}" heading`, `not visible in any of ${frames.length} frames`);
    }
  };
}

/**
 * Try strategies in order.
 *
 * @returns the first hit, or the failure of the last strategy tried
 */
export async function findWithStrategies(
  page: PageLike,
  strategies: readonly LookupStrategy[]
): Promise<Result<LocatorLike>> {
  const failures: AutomationFailure[] = [];

  for (const strategy of strategies) {
    const outcome = await attempt('lookup', strategy.name, () => strategy.find(page));
    const found = outcome.ok ? outcome.value : outcome;
    if (found.ok) {
      logger.info(`Found via ${strategy.name}`);
      return found;
    }
    failures.push(found.failure);
  }

  return {
    ok: false,
    failure: failures.at(-1) ?? {
      stage: 'lookup',
      step: 'find marker',
      message: 'no lookup strategies configured'
    }
  };
}
