/**
 * Browser session lifecycle
 *
 * One browser, one context, one page per run. Whatever happens inside the
 * body, every handle that was opened gets closed, and a failing close does
 * not keep the others open.
 */

import { attempt } from '../result';
import type { BrowserLauncher, BrowserLike, ContextLike, PageLike } from './types';

export interface SessionHandles {
  page: PageLike | null;
  context: ContextLike | null;
  browser: BrowserLike | null;
}

export interface OpenSession {
  browser: BrowserLike;
  context: ContextLike;
  page: PageLike;
}

export async function closeSession(handles: SessionHandles): Promise<void> {
  const closers: Array<[string, { close(): Promise<void> } | null]> = [
    ['page', handles.page],
    ['context', handles.context],
    ['browser', handles.browser]
  ];

  for (const [label, target] of closers) {
    if (!target) {
      continue;
    }
    await attempt('io', `close ${label}`, () => target.close());
  }
}

export async function withBrowserSession<T>(
  launcher: BrowserLauncher,
  options: { headless: boolean },
  body: (session: OpenSession) => Promise<T>
): Promise<T> {
  const handles: SessionHandles = { page: null, context: null, browser: null };

  try {
    const browser = await launcher.launch({ headless: options.headless });
    handles.browser = browser;
    const context = await browser.newContext();
    handles.context = context;
    const page = await context.newPage();
    handles.page = page;

    return await body({ browser, context, page });
  } finally {
    await closeSession(handles);
  }
}
