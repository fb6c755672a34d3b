/**
 * types.ts
 *
 * Shared TypeScript types used across the creator modules.
 *
 */

export type CreatorConfig = {
  baseUrl: string;
  timeoutMs: number;
  pacingDelayMs: number;
  settleMs: number;
  commitDelayMs: number;
  pageSettleMs: number;
  loadSettleMs: number;
  headless: boolean;
};

export type RunInputs = {
  email: string;
  password: string;
  courseUrl: string;
  inputPath: string;
  headless: boolean;
};

export type RubricEntry = {
  readonly description: string;
  readonly points: number;
};

export type AssignmentSpec = {
  readonly name: string;
  readonly releaseDate: string;
  readonly dueDate: string;
  readonly totalPoints: number;
  readonly anonymousGrading?: boolean;
  readonly groupSubmission?: boolean;
  readonly enforceTimeLimit?: boolean;
  readonly lateDueDate?: string;
  readonly timeLimitMinutes?: number;
  readonly groupSize?: number;
  readonly questionText?: string;
  readonly rubricItems?: readonly RubricEntry[];
};

export type Role =
  | 'emailField'
  | 'passwordField'
  | 'loginButton'
  | 'titleField'
  | 'releaseDateField'
  | 'dueDateField'
  | 'lateDueDateField'
  | 'allowLateCheckbox'
  | 'enforceTimeLimitCheckbox'
  | 'timeLimitField'
  | 'anonymousGradingCheckbox'
  | 'groupSubmissionCheckbox'
  | 'groupSizeField'
  | 'createAssignmentButton'
  | 'assignmentTypeButton'
  | 'nextButton'
  | 'createButton'
  | 'outlineTitleField'
  | 'outlinePointsField'
  | 'outlineProblemBodyField'
  | 'saveButton'
  | 'addRubricItemButton';

export type WizardState =
  | 'Start'
  | 'TypeSelected'
  | 'DetailsFilled'
  | 'DetailsSubmitted'
  | 'Created'
  | 'OutlineFilled'
  | 'RubricApplied'
  | 'Listed'
  | 'Aborted';

export type AttemptStep =
  | 'title'
  | 'releaseDate'
  | 'dueDate'
  | 'lateDueDate'
  | 'timeLimit'
  | 'anonymousGrading'
  | 'groupSubmission'
  | 'outline'
  | 'rubric'
  | 'assignmentList';

export type StepStatus = 'ok' | 'skipped' | 'failed';

export type StepOutcome = {
  step: AttemptStep;
  status: StepStatus;
  reason?: string;
};

export type ObservedRubricItem = {
  description: string;
  points: number | null;
  positionIndex: number;
};

export type RubricFailure = {
  index: number;
  description: string;
  reason: string;
};

export type RubricReport = {
  requested: number;
  added: number;
  failures: RubricFailure[];
  observed: ObservedRubricItem[];
};

export type AttemptReport = {
  name: string;
  ok: boolean;
  state: WizardState;
  history: WizardState[];
  steps: StepOutcome[];
  rubric?: RubricReport;
  error?: string;
};

export type BatchResult = {
  readonly successCount: number;
  readonly failedNames: readonly string[];
  readonly reports: readonly AttemptReport[];
};

export type NormalizeResult =
  | { ok: true; value: string }
  | { ok: false; error: 'NotParseable' };
