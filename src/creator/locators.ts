/**
 * locators.ts
 *
 * Maps each logical control of the course site to how it is found on the page.
 * Structural selectors (field names, classes, aria labels) come first; matching
 * on visible text is only the fallback, or the only option where the page
 * offers nothing structural.
 */

import type { BrowserDriver, DriverElement, Selector } from './driver';
import type { Role } from './types';

export const LOCATORS: Record<Role, readonly Selector[]> = {
  emailField: [{ by: 'css', css: '#session_email' }, { by: 'name', name: 'session[email]' }],
  passwordField: [{ by: 'css', css: '#session_password' }, { by: 'name', name: 'session[password]' }],
  loginButton: [{ by: 'name', name: 'commit' }],

  titleField: [{ by: 'name', name: 'assignment[title]' }],
  releaseDateField: [{ by: 'name', name: 'assignment[release_date_string]' }],
  dueDateField: [{ by: 'name', name: 'assignment[due_date_string]' }],
  lateDueDateField: [{ by: 'name', name: 'assignment[hard_due_date_string]' }],
  allowLateCheckbox: [{ by: 'name', name: 'assignment[allow_late_submissions]', inputType: 'checkbox' }],
  enforceTimeLimitCheckbox: [{ by: 'name', name: 'assignment[enforce_time_limit]', inputType: 'checkbox' }],
  timeLimitField: [{ by: 'name', name: 'assignment[time_limit_in_minutes]' }],
  anonymousGradingCheckbox: [{ by: 'name', name: 'assignment[submissions_anonymized]', inputType: 'checkbox' }],
  groupSubmissionCheckbox: [{ by: 'name', name: 'assignment[group_submission]', inputType: 'checkbox' }],
  groupSizeField: [{ by: 'name', name: 'assignment[group_size]' }],

  createAssignmentButton: [{ by: 'css', css: '.js-newAssignment' }],
  // type options are sibling nodes that only differ by label
  assignmentTypeButton: [{ by: 'text', css: '.treeSelectorNode', text: 'Online Assignment' }],
  nextButton: [{ by: 'text', css: 'button', text: 'Next', enabledOnly: true }],
  createButton: [{ by: 'text', css: 'button', text: 'Create Assignment' }],

  outlineTitleField: [{ by: 'css', css: "input[placeholder='Title']" }],
  outlinePointsField: [{ by: 'css', css: "input[placeholder='0.0']" }],
  outlineProblemBodyField: [{ by: 'css', css: "textarea[placeholder='Type your problem here']" }],
  saveButton: [{ by: 'text', css: 'button', text: 'Save', enabledOnly: true }],

  addRubricItemButton: [
    { by: 'css', css: 'button[aria-label*="Add Rubric Item"]' },
    { by: 'text', css: 'button', text: 'Add Rubric Item' },
  ],
};

// Rubric editor structure. Items repeat, so these are looked up as lists
// (and inside one item) instead of through a role.
export const RUBRIC_ITEM: Selector = { by: 'css', css: '.rubricItem' };
export const RUBRIC_TEXT: Selector = { by: 'css', css: 'p' };
export const RUBRIC_POINTS: Selector = { by: 'css', css: '.rubricField-points' };

export type ResolveResult =
  | { ok: true; element: DriverElement }
  | { ok: false; error: 'NotFound' };

export type ResolveOptions = {
  timeoutMs: number;
  clickable?: boolean;
};

export async function resolveRole(driver: BrowserDriver, role: Role, options: ResolveOptions): Promise<ResolveResult> {
  const element = await driver.waitFor(LOCATORS[role], {
    timeoutMs: options.timeoutMs,
    clickable: options.clickable,
  });
  if (!element) return { ok: false, error: 'NotFound' };
  return { ok: true, element };
}
