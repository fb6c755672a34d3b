import { test, expect } from '@playwright/test';
import { runBatch, type AssignmentCreator } from '../src/creator/batch';
import { getDefaultConfig } from '../src/creator/config';
import type { AssignmentSpec, AttemptReport } from '../src/creator/types';
import { AssignmentWizard } from '../src/creator/wizard';
import { FakeCourseSite } from './helpers/fakeCourseSite';

function spec(name: string): AssignmentSpec {
  return { name, releaseDate: '2024-03-01 08:00', dueDate: '2024-03-08 23:59', totalPoints: 5 };
}

function report(name: string, ok: boolean): AttemptReport {
  return { name, ok, state: ok ? 'Listed' : 'Aborted', history: [], steps: [] };
}

test('processes in order, paces between attempts but not after the last', async () => {
  const seen: string[] = [];
  const pauses: number[] = [];
  const creator: AssignmentCreator = {
    async create(s) {
      seen.push(s.name);
      return report(s.name, s.name !== 'B');
    },
  };

  const result = await runBatch(creator, [spec('A'), spec('B'), spec('C')], {
    pacingDelayMs: 2_000,
    pause: async (ms) => {
      pauses.push(ms);
    },
  });

  expect(seen).toEqual(['A', 'B', 'C']);
  expect(pauses).toEqual([2_000, 2_000]);
  expect(result.successCount).toBe(2);
  expect(result.failedNames).toEqual(['B']);
  expect(result.reports.map((r) => r.name)).toEqual(['A', 'B', 'C']);
});

test('a creator that throws only fails its own assignment', async () => {
  const creator: AssignmentCreator = {
    async create(s) {
      if (s.name === 'A') throw new Error('browser hiccup');
      return report(s.name, true);
    },
  };

  const result = await runBatch(creator, [spec('A'), spec('B')], { pacingDelayMs: 0, pause: async () => {} });

  expect(result.successCount).toBe(1);
  expect(result.failedNames).toEqual(['A']);
  expect(result.reports[0]).toMatchObject({ ok: false, state: 'Aborted', error: 'browser hiccup' });
});

test('an empty batch does nothing', async () => {
  const creator: AssignmentCreator = {
    async create() {
      throw new Error('should not be called');
    },
  };

  const result = await runBatch(creator, [], { pacingDelayMs: 2_000, pause: async () => {} });

  expect(result).toEqual({ successCount: 0, failedNames: [], reports: [] });
});

test('the second of three failing a required field leaves the other two created', async () => {
  const site = new FakeCourseSite({ brokenDetailsOnAttempts: [2] });
  await site.driver.goto(site.listUrl);
  const wizard = new AssignmentWizard(site.driver, site.courseUrl, getDefaultConfig());

  const result = await runBatch(wizard, [spec('Lab 1'), spec('Lab 2'), spec('Lab 3')], {
    pacingDelayMs: 2_000,
    pause: (ms) => site.driver.pause(ms),
  });

  expect(result.successCount).toBe(2);
  expect(result.failedNames).toEqual(['Lab 2']);
  expect(site.attempts).toBe(3);
  expect(site.created.map((a) => [a.title, a.releaseDate, a.dueDate])).toEqual([
    ['Lab 1', '2024-03-01 08:00', '2024-03-08 23:59'],
    ['Lab 3', '2024-03-01 08:00', '2024-03-08 23:59'],
  ]);
  expect(site.created.map((a) => a.outline?.points)).toEqual(['5', '5']);
});

test('an assignment that cannot get back to the list counts as failed', async () => {
  const site = new FakeCourseSite({ listDownAfterCreates: 1 });
  await site.driver.goto(site.listUrl);
  const wizard = new AssignmentWizard(site.driver, site.courseUrl, getDefaultConfig());

  const result = await runBatch(wizard, [spec('Lab 1')], { pacingDelayMs: 2_000, pause: (ms) => site.driver.pause(ms) });

  expect(result.successCount).toBe(0);
  expect(result.failedNames).toEqual(['Lab 1']);
  expect(site.created.map((a) => a.title)).toEqual(['Lab 1']);
});
