import { stripVTControlCharacters } from 'node:util';
import { formatOutputError } from '../types/error.js';
import type { OutputMessage } from '../types/index.js';

const SHELL_TOOLS = new Set(['shell', 'bash']);

/** Removes terminal escape sequences. */
export function cleanAnsi(text: string): string {
  return stripVTControlCharacters(text);
}

/**
 * Command lines started by a shell tool. An array command is joined with
 * spaces; anything else yields no commands.
 */
export function extractCommands(message: OutputMessage): string[] {
  const { data } = message;
  if (data.kind !== 'TOOL_START' || !SHELL_TOOLS.has(data.toolName)) {
    return [];
  }

  const { args } = data;
  if (typeof args !== 'object' || args === null || !('command' in args)) {
    return [];
  }

  const command: unknown = args.command;
  if (typeof command === 'string') {
    return [command];
  }
  if (Array.isArray(command)) {
    return [command.filter((part): part is string => typeof part === 'string').join(' ')];
  }
  return [];
}

/**
 * Keeps the first and last lines of long output, at most `maxLines` in
 * total, with a marker counting what was left out.
 */
export function formatToolOutput(output: string, maxLines: number): string {
  const lines = splitLines(output);
  if (lines.length <= maxLines) {
    return output;
  }

  const headCount = Math.floor(maxLines / 2);
  const tailCount = maxLines - headCount;
  const head = lines.slice(0, headCount).map((line) => `${line}\n`);
  const tail = lines.slice(lines.length - tailCount).map((line) => `${line}\n`);

  return [...head, `\n... (${lines.length - maxLines} lines omitted) ...\n\n`, ...tail].join('');
}

/**
 * Wraps each line at word boundaries to at most `width` characters. Words
 * longer than `width` are split.
 */
export function wrapText(text: string, width: number): string[] {
  if (text.length === 0 || width <= 0) {
    return [''];
  }

  const result: string[] = [];

  for (const line of splitLines(text)) {
    if (line.length <= width) {
      result.push(line);
      continue;
    }

    let current = '';
    for (const word of line.split(/\s+/).filter((w) => w.length > 0)) {
      if (current.length === 0) {
        if (word.length > width) {
          for (let i = 0; i < word.length; i += width) {
            result.push(word.slice(i, i + width));
          }
        } else {
          current = word;
        }
      } else if (current.length + 1 + word.length <= width) {
        current = `${current} ${word}`;
      } else {
        result.push(current);
        current = word;
      }
    }
    if (current.length > 0) {
      result.push(current);
    }
  }

  return result.length > 0 ? result : [''];
}

export function isToolMessage(message: OutputMessage): boolean {
  const { kind } = message.data;
  return kind === 'TOOL_START' || kind === 'TOOL_OUTPUT' || kind === 'TOOL_COMPLETE';
}

export function getToolName(message: OutputMessage): string | null {
  const { data } = message;
  switch (data.kind) {
    case 'TOOL_START':
    case 'TOOL_OUTPUT':
    case 'TOOL_COMPLETE':
      return data.toolName;
    default:
      return null;
  }
}

/** One-line rendering for logs and plain terminals. */
export function formatMessage(message: OutputMessage): string {
  const { data } = message;
  switch (data.kind) {
    case 'PRIMARY':
    case 'PRIMARY_DELTA':
      return data.text;
    case 'TOOL_START':
      return `Running: ${data.toolName}`;
    case 'TOOL_OUTPUT':
      return `${data.toolName}: ${data.chunk}`;
    case 'TOOL_COMPLETE':
      return `${data.toolName} completed`;
    case 'ERROR':
      return `Error: ${formatOutputError(data.error)}`;
    case 'COMPLETED':
      return 'Completed';
    case 'START':
      return 'Starting...';
    default:
      return '';
  }
}

// Line split without the empty entry a trailing newline would add.
function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
