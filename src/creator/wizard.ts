/**
 * wizard.ts
 *
 * Creates one online assignment by walking the site's creation wizard:
 *
 *   Start -> TypeSelected -> DetailsFilled -> DetailsSubmitted -> Created
 *         -> OutlineFilled -> RubricApplied -> Listed
 *
 * Any state can fall to Aborted. Whatever happens, the attempt ends with a
 * navigation back to the assignment list so the next attempt starts from
 * a known page.
 *
 * Required steps (type selection, title, dates, Next/Create) abort the attempt.
 * Optional detail fields, the outline page and the rubric are best-effort:
 * their failures are recorded in the report and logged, not raised.
 */

import type { BrowserDriver } from './driver';
import type {
  AssignmentSpec,
  AttemptReport,
  AttemptStep,
  CreatorConfig,
  RubricReport,
  Role,
  StepOutcome,
  StepStatus,
  WizardState,
} from './types';
import { courseAssignmentsUrl, rubricEditUrl } from './config';
import { normalizeDateTime } from './datetime';
import { AttemptAbortedError, errorMessage } from './errors';
import { Interactor } from './interaction';
import { resolveRole } from './locators';
import { log } from './log';
import { RubricSynchronizer } from './rubric';

// problem body for the single outline question: an empty answer blank
export const BLANK_ANSWER_MARKER = '\n\n|____|';

const NEXT_STATE: Partial<Record<WizardState, WizardState>> = {
  Start: 'TypeSelected',
  TypeSelected: 'DetailsFilled',
  DetailsFilled: 'DetailsSubmitted',
  DetailsSubmitted: 'Created',
  Created: 'OutlineFilled',
  OutlineFilled: 'RubricApplied',
  RubricApplied: 'Listed',
};

// Per-attempt state. Never shared between assignments.
export class WizardSession {
  state: WizardState = 'Start';
  readonly history: WizardState[] = ['Start'];
  readonly steps: StepOutcome[] = [];
  rubric?: RubricReport;
  error?: string;

  constructor(readonly spec: AssignmentSpec) {}

  advance(to: WizardState): void {
    if (NEXT_STATE[this.state] !== to) {
      throw new Error(`illegal wizard transition ${this.state} -> ${to}`);
    }
    this.state = to;
    this.history.push(to);
  }

  abort(error: unknown): void {
    if (this.error === undefined) this.error = errorMessage(error);
    if (this.state === 'Aborted') return;
    this.state = 'Aborted';
    this.history.push('Aborted');
  }

  record(step: AttemptStep, status: StepStatus, reason?: string): void {
    this.steps.push(reason === undefined ? { step, status } : { step, status, reason });
  }

  report(): AttemptReport {
    return {
      name: this.spec.name,
      ok: this.state === 'Listed',
      state: this.state,
      history: [...this.history],
      steps: [...this.steps],
      rubric: this.rubric,
      error: this.error,
    };
  }
}

export class AssignmentWizard {
  private readonly ui: Interactor;
  private readonly rubric: RubricSynchronizer;

  constructor(
    private readonly driver: BrowserDriver,
    private readonly courseUrl: string,
    private readonly cfg: CreatorConfig,
  ) {
    this.ui = new Interactor(driver, cfg);
    this.rubric = new RubricSynchronizer(driver, this.ui, cfg);
  }

  // Never throws: the outcome is in the returned report.
  async create(spec: AssignmentSpec): Promise<AttemptReport> {
    const session = new WizardSession(spec);
    log.info(`Creating: ${spec.name}`);

    try {
      await this.selectType(session);
      await this.fillDetails(session);
      await this.submitDetails(session);
      await this.fillOutline(session);
      await this.applyRubric(session);
    } catch (error) {
      session.abort(error);
      log.error(`Failed: ${spec.name} - ${session.error}`);
    }

    await this.returnToList(session);
    if (session.state === 'Listed') log.info(`Created: ${spec.name}`);
    return session.report();
  }

  private async selectType(session: WizardSession): Promise<void> {
    await this.ui.click('createAssignmentButton');
    await this.driver.pause(this.cfg.pageSettleMs);

    const option = await resolveRole(this.driver, 'assignmentTypeButton', { timeoutMs: this.cfg.timeoutMs });
    if (!option.ok) throw new AttemptAbortedError('online assignment type option not found');
    await this.ui.reveal(option.element);
    await option.element.click();

    await this.ui.click('nextButton');
    await this.driver.pause(this.cfg.pageSettleMs);
    session.advance('TypeSelected');
  }

  private async fillDetails(session: WizardSession): Promise<void> {
    const { spec } = session;

    await this.ui.setField('titleField', spec.name);
    session.record('title', 'ok');
    await this.setDate(session, 'releaseDate', 'releaseDateField', spec.releaseDate);
    await this.setDate(session, 'dueDate', 'dueDateField', spec.dueDate);

    const lateDueDate = spec.lateDueDate;
    if (lateDueDate) {
      await this.optional(session, 'lateDueDate', async () => {
        await this.ui.toggle('allowLateCheckbox', true);
        return this.setDate(session, 'lateDueDate', 'lateDueDateField', lateDueDate, { record: false });
      });
    }

    const enforceTimeLimit = spec.enforceTimeLimit;
    if (enforceTimeLimit !== undefined) {
      await this.optional(session, 'timeLimit', async () => {
        await this.ui.toggle('enforceTimeLimitCheckbox', enforceTimeLimit);
        if (enforceTimeLimit && spec.timeLimitMinutes !== undefined) {
          await this.ui.setField('timeLimitField', String(spec.timeLimitMinutes));
        }
        return 'ok';
      });
    }

    const anonymousGrading = spec.anonymousGrading;
    if (anonymousGrading !== undefined) {
      await this.optional(session, 'anonymousGrading', async () => {
        await this.ui.toggle('anonymousGradingCheckbox', anonymousGrading);
        return 'ok';
      });
    }

    const groupSubmission = spec.groupSubmission;
    if (groupSubmission !== undefined) {
      await this.optional(session, 'groupSubmission', async () => {
        await this.ui.toggle('groupSubmissionCheckbox', groupSubmission);
        if (groupSubmission && spec.groupSize !== undefined) {
          await this.ui.setField('groupSizeField', String(spec.groupSize));
        }
        return 'ok';
      });
    }

    await this.driver.pause(this.cfg.commitDelayMs);
    session.advance('DetailsFilled');
  }

  private async submitDetails(session: WizardSession): Promise<void> {
    await this.ui.click('nextButton');
    await this.driver.pause(this.cfg.pageSettleMs);
    session.advance('DetailsSubmitted');

    await this.ui.click('createButton');
    await this.driver.pause(this.cfg.pageSettleMs);
    session.advance('Created');
  }

  // The assignment exists by now, so nothing in here aborts the attempt.
  private async fillOutline(session: WizardSession): Promise<void> {
    const { spec } = session;

    await this.optional(session, 'outline', async () => {
      await this.driver.pause(this.cfg.pageSettleMs);
      if (spec.questionText) {
        await this.ui.setField('outlineTitleField', spec.questionText);
      }
      await this.ui.setField('outlinePointsField', String(spec.totalPoints));
      await this.ui.setField('outlineProblemBodyField', BLANK_ANSWER_MARKER);
      await this.driver.pause(this.cfg.commitDelayMs);
      await this.ui.click('saveButton');
      await this.driver.pause(this.cfg.pageSettleMs);
      return 'ok';
    });
    session.advance('OutlineFilled');
  }

  private async applyRubric(session: WizardSession): Promise<void> {
    const items = session.spec.rubricItems;

    if (items && items.length > 0) {
      log.info('Setting up rubric...');
      await this.optional(session, 'rubric', async () => {
        const url = rubricEditUrl(this.courseUrl, this.driver.currentUrl());
        if (!url) throw new Error(`no assignment id in ${this.driver.currentUrl()}`);

        await this.driver.goto(url);
        await this.driver.pause(this.cfg.loadSettleMs);

        const report = await this.rubric.apply(items);
        session.rubric = report;
        return report.failures.length === 0 ? 'ok' : 'failed';
      });
    }
    session.advance('RubricApplied');
  }

  private async returnToList(session: WizardSession): Promise<void> {
    try {
      await this.driver.goto(courseAssignmentsUrl(this.courseUrl));
      await this.driver.pause(this.cfg.pageSettleMs);
    } catch (error) {
      log.warn(`Could not return to the assignment list after ${session.spec.name}: ${errorMessage(error)}`);
      session.record('assignmentList', 'failed', errorMessage(error));
      session.abort(error);
      return;
    }
    if (session.state === 'RubricApplied') session.advance('Listed');
  }

  // Required dates: a missing field aborts, unparseable text only skips the field.
  private async setDate(
    session: WizardSession,
    step: AttemptStep,
    role: Role,
    text: string,
    opts: { record?: boolean } = {},
  ): Promise<StepStatus> {
    const normalized = normalizeDateTime(text);
    const record = opts.record ?? true;

    if (!normalized.ok) {
      log.warn(`${session.spec.name}: "${text}" is not a recognised date, ${step} left unset`);
      if (record) session.record(step, 'skipped', `unparseable date "${text}"`);
      return 'skipped';
    }

    await this.ui.setField(role, normalized.value, 'paste');
    if (record) session.record(step, 'ok');
    return 'ok';
  }

  private async optional(session: WizardSession, step: AttemptStep, action: () => Promise<StepStatus>): Promise<void> {
    try {
      const status = await action();
      session.record(step, status, status === 'failed' ? 'partially applied' : undefined);
    } catch (error) {
      log.warn(`${session.spec.name}: ${step} not applied: ${errorMessage(error)}`);
      session.record(step, 'failed', errorMessage(error));
    }
  }
}
