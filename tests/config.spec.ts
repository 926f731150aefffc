import { test, expect } from '@playwright/test';

import { DEFAULT_APP_URL, loadConfig } from '../src/config';

test.describe('loadConfig', () => {
  test('fills in defaults', () => {
    expect(loadConfig({})).toEqual({
      credentials: '',
      appUrl: DEFAULT_APP_URL,
      cookiesPath: 'google_cookies.json',
      browser: 'firefox',
      headless: true,
      markers: { hostMarker: 'idx.google.com', signInMarker: 'signin' },
      poll: { maxReloadAttempts: 5, totalTimeoutSeconds: 120 },
      holdAfterReadyMs: 20000
    });
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      GOOGLE_PW: 'user@example.com secret123',
      APP_URL: 'https://idx.google.com/app-1',
      BROWSER: 'chromium',
      HEADLESS: '0',
      POLL_MAX_RELOADS: '3',
      POLL_TIMEOUT_SECONDS: '0',
      HOLD_AFTER_READY_SECONDS: '5'
    });

    expect(config.credentials).toBe('user@example.com secret123');
    expect(config.appUrl).toBe('https://idx.google.com/app-1');
    expect(config.browser).toBe('chromium');
    expect(config.headless).toBe(false);
    expect(config.poll).toEqual({ maxReloadAttempts: 3, totalTimeoutSeconds: 0 });
    expect(config.holdAfterReadyMs).toBe(5000);
  });

  test('treats empty variables as unset', () => {
    const config = loadConfig({ APP_URL: '', COOKIES_PATH: '', HEADLESS: '', POLL_MAX_RELOADS: '' });

    expect(config.appUrl).toBe(DEFAULT_APP_URL);
    expect(config.cookiesPath).toBe('google_cookies.json');
    expect(config.headless).toBe(true);
    expect(config.poll.maxReloadAttempts).toBe(5);
  });

  test('names every invalid variable', () => {
    expect(() => loadConfig({ POLL_MAX_RELOADS: '0', BROWSER: 'netscape' })).toThrow(/POLL_MAX_RELOADS/);
    expect(() => loadConfig({ POLL_MAX_RELOADS: '0', BROWSER: 'netscape' })).toThrow(/BROWSER/);
  });

  test('rejects an application URL that is not a URL', () => {
    expect(() => loadConfig({ APP_URL: 'idx app' })).toThrow(/^Invalid configuration: APP_URL/);
  });
});
