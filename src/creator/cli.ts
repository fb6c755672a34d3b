#!/usr/bin/env node
/**
 * cli.ts
 *
 * Entry point: collects the run inputs, launches Chromium and creates every
 * assignment in the input file, then prints the summary.
 */

import { chromium } from '@playwright/test';
import { getDefaultConfig } from './config';
import { errorMessage } from './errors';
import { log } from './log';
import { PlaywrightDriver } from './playwright-driver';
import { askQuestion, resolveInputs } from './prompt';
import { formatSummary, runBatchCreation } from './run';

async function main() {
  const inputs = await resolveInputs();
  const cfg = { ...getDefaultConfig(), headless: inputs.headless };

  const browser = await chromium.launch({ headless: cfg.headless });
  try {
    const context = await browser.newContext({
      viewport: { width: 1920, height: 1080 },
      permissions: ['clipboard-read', 'clipboard-write'],
    });
    const page = await context.newPage();

    const result = await runBatchCreation(new PlaywrightDriver(page), inputs, cfg);
    for (const line of formatSummary(result)) console.log(line);
  } catch (error) {
    log.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    // leave a headed browser up so the result can be inspected
    if (!cfg.headless) await askQuestion('\nPress Enter to close...');
    await browser.close();
  }
}

main().catch((error: unknown) => {
  log.error(`Error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
