import type { OutputMessage } from '../types/index.js';

/**
 * Applies `fn` to the text-bearing field of primary, delta and tool-output
 * messages; other messages are returned as they are.
 */
export function mapMessageText(message: OutputMessage, fn: (text: string) => string): OutputMessage {
  const { data } = message;
  switch (data.kind) {
    case 'PRIMARY':
    case 'PRIMARY_DELTA':
      return { ...message, data: { ...data, text: fn(data.text) } };
    case 'TOOL_OUTPUT':
      return { ...message, data: { ...data, chunk: fn(data.chunk) } };
    default:
      return message;
  }
}

/** Text of a primary or delta message, else null. */
export function primaryText(message: OutputMessage): string | null {
  const { data } = message;
  return data.kind === 'PRIMARY' || data.kind === 'PRIMARY_DELTA' ? data.text : null;
}
