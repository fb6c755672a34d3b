/**
 * session.ts
 *
 * Gets the browser into a usable course session before any assignment is created:
 * - log in with email/password
 * - open the course's assignment list
 *
 * Both failures end the run: without a session nothing else can work.
 */

import type { BrowserDriver } from './driver';
import type { CreatorConfig } from './types';
import type { Interactor } from './interaction';
import { courseAssignmentsUrl } from './config';
import { AssignmentsPageUnreachableError, LoginFailedError, errorMessage } from './errors';
import { log } from './log';

export type Credentials = {
  email: string;
  password: string;
};

export async function login(driver: BrowserDriver, ui: Interactor, creds: Credentials, cfg: CreatorConfig): Promise<void> {
  try {
    await driver.goto(`${cfg.baseUrl}/login`);
    await ui.setField('emailField', creds.email);
    await ui.setField('passwordField', creds.password);
    await ui.click('loginButton');
    await driver.pause(cfg.loadSettleMs);
  } catch (error) {
    throw new LoginFailedError(`Login failed: ${errorMessage(error)}`, { cause: error });
  }

  // the site stays on /login when the credentials are rejected
  if (driver.currentUrl().includes('login')) {
    log.error('Login failed');
    throw new LoginFailedError('Login failed: still on the login page');
  }
  log.info('Login successful');
}

export async function openAssignments(driver: BrowserDriver, courseUrl: string, cfg: CreatorConfig): Promise<void> {
  try {
    await driver.goto(courseAssignmentsUrl(courseUrl));
    await driver.pause(cfg.pageSettleMs);
  } catch (error) {
    throw new AssignmentsPageUnreachableError(`Cannot access assignments: ${errorMessage(error)}`, { cause: error });
  }
}
