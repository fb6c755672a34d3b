/**
 * run.ts
 *
 * Runs the end-to-end batch:
 * - logs in and opens the course's assignment list (fatal if either fails)
 * - loads and validates the assignments file (fatal if invalid)
 * - creates each assignment through the wizard, pacing between attempts
 */

import type { BrowserDriver } from './driver';
import type { BatchResult, CreatorConfig, RunInputs } from './types';
import { getDefaultConfig } from './config';
import { runBatch } from './batch';
import { Interactor } from './interaction';
import { loadAssignments } from './io';
import { login, openAssignments } from './session';
import { AssignmentWizard } from './wizard';

export async function runBatchCreation(
  driver: BrowserDriver,
  inputs: RunInputs,
  cfg: CreatorConfig = getDefaultConfig(),
): Promise<BatchResult> {
  // validate input before spending time in the browser
  const assignments = await loadAssignments(inputs.inputPath);

  await login(driver, new Interactor(driver, cfg), inputs, cfg);
  await openAssignments(driver, inputs.courseUrl, cfg);

  const wizard = new AssignmentWizard(driver, inputs.courseUrl, cfg);
  return runBatch(wizard, assignments, {
    pacingDelayMs: cfg.pacingDelayMs,
    pause: (ms) => driver.pause(ms),
  });
}

export function formatSummary(result: BatchResult): string[] {
  const lines = [`Complete: ${result.successCount} successful`];
  if (result.failedNames.length > 0) {
    lines.push(`${result.failedNames.length} failed: ${result.failedNames.join(', ')}`);
  }
  return lines;
}
