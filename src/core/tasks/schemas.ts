/**
 * Zod input schemas for the task operations, plus the parse helper that
 * turns validation failures into INVALID_INPUT errors.
 */

import { z } from 'zod';
import { LedgerError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { ParsedTaskNode, TaskNode } from '../../types/task.js';

/** Task ids arrive as numbers or numeric strings. */
export const taskIdSchema = z.coerce.number().int().positive();

export const taskNumberSchema = z.union([z.string().min(1), z.number().int().nonnegative()]);

export const nameSchema = z.string().trim().min(1).max(256);

export const descriptionSchema = z.string().default('');

/** Date objects or ISO-8601 strings. */
export const dateInputSchema = z
  .union([z.date(), z.string().datetime({ offset: true })])
  .transform(value => new Date(value));

export const taskNodeSchema: z.ZodType<ParsedTaskNode, z.ZodTypeDef, TaskNode> = z.lazy(() =>
  z.object({
    name: nameSchema,
    description: descriptionSchema,
    number: z.string().optional(),
    plannedStartTime: dateInputSchema.optional(),
    plannedFinishTime: dateInputSchema.optional(),
    children: z.array(taskNodeSchema).default([]),
  }),
);

export const addRootTaskSchema = z.object({
  name: nameSchema,
  description: descriptionSchema,
  number: z.string().default(''),
  plannedStartTime: dateInputSchema.optional(),
  plannedFinishTime: dateInputSchema.optional(),
});

export const numberedSubTaskSchema = z.object({
  number: taskNumberSchema,
  name: nameSchema,
  description: descriptionSchema,
});

export const addSubTaskSchema = numberedSubTaskSchema.extend({
  rootId: taskIdSchema,
});

export const addSubTasksSchema = z.object({
  rootId: taskIdSchema,
  subTasks: z.array(numberedSubTaskSchema).min(1),
});

export const addTaskTreeSchema = z.object({
  tree: taskNodeSchema,
  parentId: taskIdSchema.optional(),
});

export const taskRefSchema = z.object({ taskId: taskIdSchema });

export const rootRefSchema = z.object({ rootId: taskIdSchema });

export const findRootsSchema = z.object({ prefix: z.string() });

export const updateProgressSchema = z.object({
  taskId: taskIdSchema,
  progress: z.number(),
});

/**
 * Validate operation input, throwing INVALID_INPUT with every issue listed.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, operation: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue: z.ZodIssue) => `${issue.path.join('.') || '(input)'}: ${issue.message}`)
      .join('; ');
    throw new LedgerError(ExitCode.INVALID_INPUT, `Invalid input for ${operation}: ${detail}`, {
      cause: result.error,
    });
  }
  return result.data;
}
