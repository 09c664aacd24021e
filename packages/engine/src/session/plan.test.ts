import { describe, it, expect } from 'vitest';
import { parseUpdatePlanArgs, planStepsToTodos, toTodoStatus } from './plan.js';

describe('parseUpdatePlanArgs', () => {
  it('reads steps and statuses from an arguments object', () => {
    const todos = parseUpdatePlanArgs({
      explanation: 'starting',
      plan: [
        { step: 'Read the code', status: 'completed' },
        { step: 'Write the fix', status: 'in_progress' },
        { step: 'Run the tests', status: 'pending' },
      ],
    });

    expect(todos).toEqual([
      { content: 'Read the code', status: 'completed' },
      { content: 'Write the fix', status: 'in_progress' },
      { content: 'Run the tests', status: 'pending' },
    ]);
  });

  it('skips entries missing a step or a status', () => {
    const todos = parseUpdatePlanArgs({
      plan: [{ step: 'kept', status: 'pending' }, { step: 'no status' }, { status: 'pending' }, 'junk', null],
    });

    expect(todos).toEqual([{ content: 'kept', status: 'pending' }]);
  });

  it('maps unknown statuses to pending and accepts blocked', () => {
    const todos = parseUpdatePlanArgs({
      plan: [
        { step: 'a', status: 'waiting' },
        { step: 'b', status: 'blocked' },
      ],
    });

    expect(todos).toEqual([
      { content: 'a', status: 'pending' },
      { content: 'b', status: 'blocked' },
    ]);
  });

  it('parses arguments given as a JSON string', () => {
    const todos = parseUpdatePlanArgs('{"plan":[{"step":"one","status":"completed"}]}');

    expect(todos).toEqual([{ content: 'one', status: 'completed' }]);
  });

  it('keeps the complete entries of a truncated JSON string', () => {
    const todos = parseUpdatePlanArgs('{"plan":[{"step":"one","status":"completed"},{"step":"tw');

    expect(todos?.[0]).toEqual({ content: 'one', status: 'completed' });
  });

  it('returns null without a plan array', () => {
    expect(parseUpdatePlanArgs(null)).toBeNull();
    expect(parseUpdatePlanArgs({ plan: 'not a list' })).toBeNull();
    expect(parseUpdatePlanArgs({})).toBeNull();
    expect(parseUpdatePlanArgs('')).toBeNull();
    expect(parseUpdatePlanArgs('not json at all')).toBeNull();
  });

  it('returns an empty list for an empty plan', () => {
    expect(parseUpdatePlanArgs({ plan: [] })).toEqual([]);
  });
});

describe('toTodoStatus', () => {
  it('passes through known statuses', () => {
    expect(toTodoStatus('completed')).toBe('completed');
    expect(toTodoStatus('in_progress')).toBe('in_progress');
  });
});

describe('planStepsToTodos', () => {
  it('converts backend plan steps', () => {
    expect(planStepsToTodos([{ step: 'x', status: 'in_progress' }])).toEqual([{ content: 'x', status: 'in_progress' }]);
  });
});
