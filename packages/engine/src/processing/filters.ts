import type { OutputEvent } from '../types/index.js';
import type { MessageFilter } from './types.js';

export type OutputTypeName =
  | 'primary'
  | 'delta'
  | 'tool_start'
  | 'tool_output'
  | 'tool_complete'
  | 'completed'
  | 'error'
  | 'start'
  | 'unknown';

export function outputTypeName(event: OutputEvent): OutputTypeName {
  switch (event.kind) {
    case 'PRIMARY':
      return 'primary';
    case 'PRIMARY_DELTA':
      return 'delta';
    case 'TOOL_START':
      return 'tool_start';
    case 'TOOL_OUTPUT':
      return 'tool_output';
    case 'TOOL_COMPLETE':
      return 'tool_complete';
    case 'COMPLETED':
      return 'completed';
    case 'ERROR':
      return 'error';
    case 'START':
      return 'start';
    default:
      return 'unknown';
  }
}

/** Drops tool starts and streamed tool output; completions pass. */
export const toolOutputFilter: MessageFilter = {
  shouldKeep: ({ data }) => data.kind !== 'TOOL_OUTPUT' && data.kind !== 'TOOL_START',
};

export function typeFilter(types: Iterable<OutputTypeName>): MessageFilter {
  const allowed = new Set(types);
  return {
    shouldKeep: ({ data }) => allowed.has(outputTypeName(data)),
  };
}
