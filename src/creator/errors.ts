/**
 * errors.ts
 *
 * Centralizes the error taxonomy
 * - element lookups that ran out of time (recoverable per field / per step)
 * - an aborted attempt for one assignment
 * - fatal run errors (login, assignment list, input file)
 */

import type { Role } from './types';

export class CreatorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ElementUnavailableError extends CreatorError {
  constructor(readonly target: Role | string, timeoutMs?: number) {
    super(timeoutMs === undefined ? `${target} not found` : `${target} not found within ${timeoutMs}ms`);
  }
}

export class NotClickableError extends CreatorError {
  constructor(readonly target: Role | string, timeoutMs?: number) {
    super(timeoutMs === undefined ? `${target} not clickable` : `${target} not clickable within ${timeoutMs}ms`);
  }
}

export class AttemptAbortedError extends CreatorError {}

export class LoginFailedError extends CreatorError {}

export class AssignmentsPageUnreachableError extends CreatorError {}

export class InputFileError extends CreatorError {}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
