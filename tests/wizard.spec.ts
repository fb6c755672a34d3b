import { test, expect } from '@playwright/test';
import { getDefaultConfig } from '../src/creator/config';
import { parseAssignments } from '../src/creator/io';
import type { AssignmentSpec } from '../src/creator/types';
import { AssignmentWizard, BLANK_ANSWER_MARKER, WizardSession } from '../src/creator/wizard';
import { FakeCourseSite, type SiteOptions } from './helpers/fakeCourseSite';

async function onAssignmentList(opts: SiteOptions = {}) {
  const site = new FakeCourseSite(opts);
  await site.driver.goto(site.listUrl);
  const wizard = new AssignmentWizard(site.driver, site.courseUrl, getDefaultConfig());
  return { site, wizard };
}

const basic: AssignmentSpec = {
  name: 'HW2',
  releaseDate: '2024-02-01 09:00',
  dueDate: '2024-02-08 17:00',
  totalPoints: 20,
};

test('creates a titled assignment with dates, outline points and a two-item rubric', async () => {
  const { site, wizard } = await onAssignmentList();
  const [spec] = parseAssignments([
    {
      name: 'HW1',
      release_date: '2024-01-01 00:00',
      due_date: '2024-01-08 23:59',
      total_points: 10,
      assignment_details: { rubric: { correct: 10, incorrect: 0 } },
    },
  ]);

  const report = await wizard.create(spec);

  expect(report.ok).toBe(true);
  expect(report.state).toBe('Listed');
  expect(report.history).toEqual([
    'Start',
    'TypeSelected',
    'DetailsFilled',
    'DetailsSubmitted',
    'Created',
    'OutlineFilled',
    'RubricApplied',
    'Listed',
  ]);
  expect(report.steps).toEqual([
    { step: 'title', status: 'ok' },
    { step: 'releaseDate', status: 'ok' },
    { step: 'dueDate', status: 'ok' },
    { step: 'outline', status: 'ok' },
    { step: 'rubric', status: 'ok' },
  ]);

  expect(site.created).toHaveLength(1);
  const [created] = site.created;
  expect(created.title).toBe('HW1');
  expect(created.releaseDate).toBe('2024-01-01 00:00');
  expect(created.dueDate).toBe('2024-01-08 23:59');
  expect(created.outline).toEqual({ title: '', points: '10', body: BLANK_ANSWER_MARKER });
  expect(site.rubricOf(created)).toEqual([
    { texts: ['Correct'], points: '10' },
    { texts: ['Incorrect'], points: '0' },
  ]);
  expect(site.driver.currentUrl()).toBe(site.listUrl);
});

test('dates are normalized before they are pasted', async () => {
  const { site, wizard } = await onAssignmentList();

  await wizard.create({ ...basic, releaseDate: ' 2024/2/1 9:00', dueDate: '2024-02-08T17:00' });

  expect(site.created[0].releaseDate).toBe('2024-02-01 09:00');
  expect(site.created[0].dueDate).toBe('2024-02-08 17:00');
});

test('the assignment type option is scrolled into view before it is clicked', async () => {
  const { site, wizard } = await onAssignmentList();

  await wizard.create(basic);

  const { actions } = site.driver;
  const scrolled = actions.indexOf('scroll .treeSelectorNode');
  expect(scrolled).toBeGreaterThan(-1);
  expect(actions[scrolled + 1]).toBe('click .treeSelectorNode');
});

test('optional settings tick their boxes and fill their fields', async () => {
  const { site, wizard } = await onAssignmentList();

  const report = await wizard.create({
    ...basic,
    lateDueDate: '2024-02-10T12:00',
    enforceTimeLimit: true,
    timeLimitMinutes: 45,
    anonymousGrading: true,
    groupSubmission: true,
    groupSize: 3,
    questionText: 'Question 1',
  });

  expect(report.ok).toBe(true);
  expect(site.created[0]).toMatchObject({
    allowLate: true,
    lateDueDate: '2024-02-10 12:00',
    enforceTimeLimit: true,
    timeLimit: '45',
    anonymous: true,
    groupSubmission: true,
    groupSize: '3',
    outline: { title: 'Question 1', points: '20', body: BLANK_ANSWER_MARKER },
  });
  expect(report.steps.map((s) => `${s.step}:${s.status}`)).toEqual([
    'title:ok',
    'releaseDate:ok',
    'dueDate:ok',
    'lateDueDate:ok',
    'timeLimit:ok',
    'anonymousGrading:ok',
    'groupSubmission:ok',
    'outline:ok',
  ]);
});

test('absent flags leave the form defaults untouched', async () => {
  const { site, wizard } = await onAssignmentList();

  await wizard.create({ ...basic, timeLimitMinutes: 30, groupSize: 4 });

  expect(site.created[0]).toMatchObject({
    allowLate: false,
    enforceTimeLimit: false,
    timeLimit: '',
    anonymous: false,
    groupSubmission: false,
    groupSize: '',
  });
});

test('a missing optional control is recorded as failed and the assignment is still created', async () => {
  const { site, wizard } = await onAssignmentList({ missingFields: ['assignment[group_submission]'] });

  const report = await wizard.create({ ...basic, groupSubmission: true, groupSize: 3, anonymousGrading: true });

  expect(report.ok).toBe(true);
  expect(report.steps).toContainEqual({
    step: 'groupSubmission',
    status: 'failed',
    reason: 'groupSubmissionCheckbox not found within 20000ms',
  });
  expect(report.steps).toContainEqual({ step: 'anonymousGrading', status: 'ok' });
  expect(site.created[0].anonymous).toBe(true);
  expect(site.created[0].groupSize).toBe('');
});

test('an unparseable date is skipped, not fatal', async () => {
  const { site, wizard } = await onAssignmentList();

  const report = await wizard.create({ ...basic, dueDate: 'next Friday' });

  expect(report.ok).toBe(true);
  expect(report.steps).toContainEqual({ step: 'dueDate', status: 'skipped', reason: 'unparseable date "next Friday"' });
  expect(site.created[0].dueDate).toBe('');
});

test('a missing title aborts the attempt and still returns to the list', async () => {
  const { site, wizard } = await onAssignmentList({ brokenDetailsOnAttempts: [1] });

  const report = await wizard.create(basic);

  expect(report.ok).toBe(false);
  expect(report.state).toBe('Aborted');
  expect(report.history).toEqual(['Start', 'TypeSelected', 'Aborted']);
  expect(report.error).toBe('titleField not found within 20000ms');
  expect(site.created).toEqual([]);
  expect(site.driver.currentUrl()).toBe(site.listUrl);
});

test('no online assignment type aborts before the details page', async () => {
  const { site, wizard } = await onAssignmentList({ withoutOnlineType: true });

  const report = await wizard.create(basic);

  expect(report.history).toEqual(['Start', 'Aborted']);
  expect(report.error).toBe('online assignment type option not found');
  expect(site.driver.currentUrl()).toBe(site.listUrl);
});

test('an outline page failure does not undo the created assignment', async () => {
  const { site, wizard } = await onAssignmentList({ withoutSaveButton: true });

  const report = await wizard.create({ ...basic, rubricItems: [{ description: 'Correct', points: 20 }] });

  expect(report.ok).toBe(true);
  expect(report.steps).toContainEqual({ step: 'outline', status: 'failed', reason: 'saveButton not clickable within 20000ms' });
  expect(site.created[0].outline).toBeNull();
  expect(site.rubricOf(site.created[0])).toEqual([{ texts: ['Correct'], points: '20' }]);
});

test('a partially applied rubric is reported without failing the attempt', async () => {
  const { wizard } = await onAssignmentList({ failingAddClicks: 5 });

  const report = await wizard.create({
    ...basic,
    rubricItems: [
      { description: 'Correct', points: 20 },
      { description: 'Incorrect', points: 0 },
    ],
  });

  expect(report.ok).toBe(true);
  expect(report.steps).toContainEqual({ step: 'rubric', status: 'failed', reason: 'partially applied' });
  expect(report.rubric?.failures).toEqual([{ index: 1, description: 'Incorrect', reason: 'rubric item could not be added' }]);
});

test('losing the assignment list after creating aborts the attempt', async () => {
  const { site, wizard } = await onAssignmentList({ listDownAfterCreates: 1 });

  const report = await wizard.create(basic);

  expect(report.ok).toBe(false);
  expect(report.state).toBe('Aborted');
  expect(report.history).toEqual([
    'Start',
    'TypeSelected',
    'DetailsFilled',
    'DetailsSubmitted',
    'Created',
    'OutlineFilled',
    'RubricApplied',
    'Aborted',
  ]);
  expect(report.steps).toEqual([
    { step: 'title', status: 'ok' },
    { step: 'releaseDate', status: 'ok' },
    { step: 'dueDate', status: 'ok' },
    { step: 'outline', status: 'ok' },
    { step: 'assignmentList', status: 'failed', reason: 'net::ERR_CONNECTION_REFUSED' },
  ]);
  expect(report.error).toBe('net::ERR_CONNECTION_REFUSED');
  expect(site.created.map((a) => a.title)).toEqual(['HW2']);
});

test('the session only moves one state forward at a time', () => {
  const session = new WizardSession(basic);
  session.advance('TypeSelected');

  expect(() => session.advance('Created')).toThrow('illegal wizard transition TypeSelected -> Created');

  session.abort(new Error('gone'));
  expect(session.report()).toMatchObject({ ok: false, state: 'Aborted', history: ['Start', 'TypeSelected', 'Aborted'], error: 'gone' });
});
