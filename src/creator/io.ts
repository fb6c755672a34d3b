/**
 * io.ts
 *
 * Contains the filesystem input for the creator
 * - read the assignments JSON file
 * - validate every entry before anything touches the browser
 * - map the file's snake_case entries to AssignmentSpec
 */

import fs from 'node:fs/promises';
import { z } from 'zod';
import type { AssignmentSpec, RubricEntry } from './types';
import { InputFileError } from './errors';
import { log } from './log';

// JSON null reads the same as a missing key
function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((v) => v ?? undefined);
}

const RubricSchema = z.record(z.string(), z.number().finite());

const AssignmentInputSchema = z.object({
  name: z.string().refine((s) => s.trim().length > 0, 'name must not be blank'),
  release_date: z.string(),
  due_date: z.string(),
  total_points: z.number().finite().nonnegative(),
  anonymous_grading: optional(z.boolean()),
  group_submission: optional(z.boolean()),
  late_due_date: optional(z.string()),
  enforce_time_limit: optional(z.boolean()),
  time_limit: optional(z.number().int().positive()),
  group_size: optional(z.number().int().min(2)),
  assignment_details: optional(
    z.object({
      question: optional(z.string()),
      rubric: optional(RubricSchema),
    }),
  ),
});

export const AssignmentFileSchema = z.array(AssignmentInputSchema);

export type AssignmentInput = z.infer<typeof AssignmentInputSchema>;

// "correct" -> "Correct", "PARTIAL credit" -> "Partial credit"
export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

// Rubric objects keep their key order. An empty rubric means "no rubric".
export function toRubricEntries(rubric: Record<string, number> | undefined): RubricEntry[] | undefined {
  if (!rubric) return undefined;
  const entries = Object.entries(rubric).map(([description, points]) => ({
    description: capitalize(description),
    points,
  }));
  return entries.length > 0 ? entries : undefined;
}

export function toAssignmentSpec(input: AssignmentInput): AssignmentSpec {
  const details = input.assignment_details;
  return {
    name: input.name,
    releaseDate: input.release_date,
    dueDate: input.due_date,
    totalPoints: Math.trunc(input.total_points),
    anonymousGrading: input.anonymous_grading,
    groupSubmission: input.group_submission,
    enforceTimeLimit: input.enforce_time_limit,
    lateDueDate: input.late_due_date,
    timeLimitMinutes: input.time_limit,
    groupSize: input.group_size,
    questionText: details?.question,
    rubricItems: toRubricEntries(details?.rubric),
  };
}

export function parseAssignments(data: unknown, source = 'input'): AssignmentSpec[] {
  const parsed = AssignmentFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InputFileError(`Invalid assignments in ${source}: ${issues.join('; ')}`);
  }
  return parsed.data.map(toAssignmentSpec);
}

export async function loadAssignments(filePath: string): Promise<AssignmentSpec[]> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    throw new InputFileError(`Cannot read assignments from ${filePath}`, { cause: error });
  }

  const assignments = parseAssignments(data, filePath);
  log.info(`Loaded ${assignments.length} assignments from ${filePath}`);
  return assignments;
}
