import { defineConfig } from '@playwright/test';

// Workers inherit this; keeps winston quiet during the run.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

export default defineConfig({
  testDir: './tests',
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
  retries: 0
});
