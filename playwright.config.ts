import { defineConfig } from '@playwright/test';

// The suite drives an in-process fake page; no browser is launched.
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  fullyParallel: true,
});
