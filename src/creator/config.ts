/**
 * Config.ts
 * Config for the creator: timeouts and pacing for driving the course site
 */

import type { CreatorConfig } from './types';

// returns the default settings for a run
// delays are only settle time for client-side re-rendering, the real readiness checks are the locator waits
export function getDefaultConfig(): CreatorConfig {
  return {
    baseUrl: 'https://www.gradescope.com',
    timeoutMs: 20_000,
    pacingDelayMs: 2_000,
    settleMs: 200,
    commitDelayMs: 300,
    pageSettleMs: 1_500,
    loadSettleMs: 3_000,
    headless: false,
  };
}

// Course URL as typed by the user, without trailing slashes
export function normalizeCourseUrl(courseUrl: string): string {
  return courseUrl.trim().replace(/\/+$/, '');
}

export function courseAssignmentsUrl(courseUrl: string): string {
  return `${normalizeCourseUrl(courseUrl)}/assignments`;
}

// Rubric editor for the assignment the browser is currently inside of.
// returns null if the URL doesn't carry an assignment id
export function rubricEditUrl(courseUrl: string, currentUrl: string): string | null {
  const m = currentUrl.match(/\/assignments\/([^/?#]+)/);
  if (!m) return null;
  return `${normalizeCourseUrl(courseUrl)}/assignments/${m[1]}/rubric/edit`;
}
