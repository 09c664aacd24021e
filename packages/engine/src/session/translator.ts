import type { BackendEvent, ToolCallEndEvent } from '@conduit/backend';
import type { OutputEvent, OutputMessage, PlanMessage } from '../types/index.js';
import { parseUpdatePlanArgs, planStepsToTodos, UPDATE_PLAN_TOOL } from './plan.js';

export const SHELL_TOOL = 'shell';

export type Translation = {
  readonly outputs: ReadonlyArray<OutputMessage>;
  readonly plan: PlanMessage | null;
};

export type EventTranslator = {
  readonly translate: (event: BackendEvent) => Translation;
  /** Number of `COMPLETED` outputs produced so far. */
  readonly turnId: () => number;
};

const NOTHING: Translation = { outputs: [], plan: null };

/**
 * Maps backend events onto the output vocabulary. The only state is the turn
 * id, which advances after each `task_complete`; every output of a turn
 * carries the same id.
 */
export function createEventTranslator(): EventTranslator {
  let turnId = 0;
  const decoder = new TextDecoder('utf-8', { fatal: false });

  const output = (data: OutputEvent): Translation => ({ outputs: [{ turnId, data }], plan: null });

  const planFromArgs = (args: unknown, description: string): PlanMessage | null => {
    const todos = parseUpdatePlanArgs(args);
    if (todos === null) {
      return null;
    }
    return { todos, metadata: { turnId, description } };
  };

  const translate = (event: BackendEvent): Translation => {
    switch (event.type) {
      case 'session_configured':
        return output({ kind: 'START' });

      case 'agent_message':
        return output({ kind: 'PRIMARY', text: event.message });

      case 'agent_message_delta':
        return output({ kind: 'PRIMARY_DELTA', text: event.delta });

      case 'agent_reasoning':
        return output({ kind: 'REASONING', text: event.text });

      case 'tool_call_begin': {
        const { tool, arguments: args } = event.invocation;
        return {
          outputs: [{ turnId, data: { kind: 'TOOL_START', toolName: tool, args: args ?? {} } }],
          plan:
            tool === UPDATE_PLAN_TOOL ? planFromArgs(args, 'Plan updated via update_plan tool') : null,
        };
      }

      case 'tool_call_end': {
        const { tool, arguments: args } = event.invocation;
        return {
          outputs: [{ turnId, data: { kind: 'TOOL_COMPLETE', toolName: tool, result: toolResultText(event) } }],
          // Derived from the arguments, not the result, so a failed call still reports its plan.
          plan:
            tool === UPDATE_PLAN_TOOL ? planFromArgs(args, 'Plan completed via update_plan tool') : null,
        };
      }

      case 'exec_command_begin':
        return output({ kind: 'TOOL_START', toolName: SHELL_TOOL, args: { command: event.command } });

      case 'exec_command_output_delta':
        return output({
          kind: 'TOOL_OUTPUT',
          toolName: SHELL_TOOL,
          chunk: decoder.decode(event.chunk),
        });

      case 'exec_command_end':
        return output({ kind: 'TOOL_COMPLETE', toolName: SHELL_TOOL, result: `exit code: ${event.exitCode}` });

      case 'task_complete': {
        const completed = output({ kind: 'COMPLETED' });
        turnId++;
        return completed;
      }

      case 'plan_update':
        return {
          outputs: [],
          plan: { todos: planStepsToTodos(event.plan), metadata: { turnId, description: event.explanation } },
        };

      case 'error':
        return output({ kind: 'ERROR', error: { kind: 'unknown', message: event.message } });

      case 'turn_aborted':
        return output({ kind: 'ERROR', error: { kind: 'interrupted' } });

      default:
        return NOTHING;
    }
  };

  return {
    translate,
    turnId: () => turnId,
  };
}

function toolResultText(event: ToolCallEndEvent): string {
  if (!event.result.ok) {
    return `Error: ${event.result.error}`;
  }
  const first = event.result.content[0];
  return first?.type === 'text' ? first.text : '';
}
