/**
 * batch.ts
 *
 * Runs the wizard once per assignment, strictly in input order and one at a
 * time. A failed assignment is recorded and the batch moves on.
 */

import type { AssignmentSpec, AttemptReport, BatchResult } from './types';
import { errorMessage } from './errors';
import { log } from './log';

export interface AssignmentCreator {
  create(spec: AssignmentSpec): Promise<AttemptReport>;
}

export type BatchOptions = {
  pacingDelayMs: number;
  pause: (ms: number) => Promise<void>;
};

export async function runBatch(
  creator: AssignmentCreator,
  specs: readonly AssignmentSpec[],
  opts: BatchOptions,
): Promise<BatchResult> {
  let successCount = 0;
  const failedNames: string[] = [];
  const reports: AttemptReport[] = [];

  for (const [i, spec] of specs.entries()) {
    log.info(`[${i + 1}/${specs.length}] ${spec.name}`);

    let report: AttemptReport;
    try {
      report = await creator.create(spec);
    } catch (error) {
      // creators report failures instead of throwing, this only guards the isolation
      log.error(`Failed: ${spec.name} - ${errorMessage(error)}`);
      report = { name: spec.name, ok: false, state: 'Aborted', history: ['Aborted'], steps: [], error: errorMessage(error) };
    }

    reports.push(report);
    if (report.ok) {
      successCount++;
    } else {
      failedNames.push(spec.name);
    }

    // let the site settle before the next one
    if (i < specs.length - 1) await opts.pause(opts.pacingDelayMs);
  }

  return { successCount, failedNames, reports };
}
