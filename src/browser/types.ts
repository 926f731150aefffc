/**
 * Browser surface used by the warm-up flow.
 *
 * These are the slices of Playwright's BrowserType, Browser, BrowserContext,
 * Page, Frame, FrameLocator and Locator that the code actually calls.
 * Playwright's classes satisfy them structurally, and tests can hand in
 * in-process fakes.
 */

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export type AriaRole = 'button' | 'heading';

export interface TextQuery {
  exact?: boolean;
}

export interface RoleQuery {
  name?: string | RegExp;
  exact?: boolean;
}

/** Same shape Playwright returns from BrowserContext.cookies() */
export interface CookieRecord {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix time in seconds, -1 for session cookies */
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: 'Strict' | 'Lax' | 'None';
}

export interface LocatorLike {
  first(): LocatorLike;
  count(): Promise<number>;
  isVisible(): Promise<boolean>;
  waitFor(options?: {
    state?: 'attached' | 'detached' | 'visible' | 'hidden';
    timeout?: number;
  }): Promise<void>;
  click(options?: { timeout?: number }): Promise<void>;
  fill(value: string, options?: { timeout?: number }): Promise<void>;
  /** Scope for the document inside an iframe element */
  contentFrame(): QueryScope;
}

/** Anything elements can be looked up in: a page, a frame or a frame locator */
export interface QueryScope {
  locator(selector: string): LocatorLike;
  getByText(text: string | RegExp, options?: TextQuery): LocatorLike;
  getByRole(role: AriaRole, options?: RoleQuery): LocatorLike;
  getByLabel(text: string | RegExp, options?: TextQuery): LocatorLike;
}

export interface PageLike extends QueryScope {
  url(): string;
  goto(
    url: string,
    options?: { timeout?: number; waitUntil?: LoadState | 'commit' }
  ): Promise<unknown>;
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>;
  waitForTimeout(timeout: number): Promise<void>;
  /** Every frame currently attached to the page, main frame included */
  frames(): QueryScope[];
  close(): Promise<void>;
}

export interface ContextLike {
  cookies(): Promise<CookieRecord[]>;
  addCookies(cookies: CookieRecord[]): Promise<void>;
  newPage(): Promise<PageLike>;
  close(): Promise<void>;
}

export interface BrowserLike {
  newContext(): Promise<ContextLike>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(options: { headless: boolean }): Promise<BrowserLike>;
}
