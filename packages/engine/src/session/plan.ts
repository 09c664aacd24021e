import { parse, ARR, OBJ } from 'partial-json';
import type { PlanStep } from '@conduit/backend';
import type { TodoItem, TodoStatus } from '../types/index.js';

export const UPDATE_PLAN_TOOL = 'update_plan';

/**
 * Reads the todo list out of `update_plan` arguments.
 *
 * Arguments may arrive as an object or as a JSON string, possibly cut short
 * by a streaming backend; complete entries of a truncated string are kept.
 * Entries without a string `step` and `status` are skipped and unknown
 * statuses read as `pending`. Returns null when there is no `plan` array.
 */
export function parseUpdatePlanArgs(args: unknown): ReadonlyArray<TodoItem> | null {
  const value = typeof args === 'string' ? tryParseArgs(args) : args;

  if (typeof value !== 'object' || value === null || !('plan' in value)) {
    return null;
  }

  const plan: unknown = value.plan;
  if (!Array.isArray(plan)) {
    return null;
  }

  const todos: TodoItem[] = [];
  for (const entry of plan) {
    if (typeof entry !== 'object' || entry === null || !('step' in entry) || !('status' in entry)) {
      continue;
    }
    const { step, status } = entry;
    if (typeof step !== 'string' || typeof status !== 'string') {
      continue;
    }
    todos.push({ content: step, status: toTodoStatus(status) });
  }

  return todos;
}

export function toTodoStatus(status: string): TodoStatus {
  switch (status) {
    case 'in_progress':
    case 'completed':
    case 'blocked':
      return status;
    default:
      return 'pending';
  }
}

export function planStepsToTodos(steps: ReadonlyArray<PlanStep>): ReadonlyArray<TodoItem> {
  return steps.map((step) => ({ content: step.step, status: toTodoStatus(step.status) }));
}

function tryParseArgs(json: string): unknown {
  if (json.trim() === '') {
    return null;
  }

  try {
    const parsed: unknown = parse(json, OBJ | ARR);
    return parsed;
  } catch {
    return null;
  }
}
