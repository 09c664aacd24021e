import { cleanAnsi } from '../utils/output.js';
import { mapMessageText } from './text.js';
import type { MessageTransformer } from './types.js';

export const ansiStripper: MessageTransformer = {
  transform: (message) => mapMessageText(message, cleanAnsi),
};

export function lineTruncator(maxLength: number): MessageTransformer {
  return {
    transform: (message) => mapMessageText(message, (text) => truncateLines(text, maxLength)),
  };
}

/** Cuts every line longer than `maxLength` characters and marks it with `...`. */
export function truncateLines(text: string, maxLength: number): string {
  return text
    .split('\n')
    .map((line) => (line.length > maxLength ? `${line.slice(0, maxLength)}...` : line))
    .join('\n');
}
