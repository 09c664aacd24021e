import { describe, it, expect } from 'vitest';
import type { OutputEvent, OutputMessage } from '../types/index.js';
import {
  cleanAnsi,
  extractCommands,
  formatMessage,
  formatToolOutput,
  getToolName,
  isToolMessage,
  wrapText,
} from './output.js';

const msg = (data: OutputEvent): OutputMessage => ({ turnId: 0, data });

describe('cleanAnsi', () => {
  it('removes color and cursor sequences', () => {
    expect(cleanAnsi('\u001b[1;32mok\u001b[0m \u001b[2Kdone')).toBe('ok done');
  });
});

describe('extractCommands', () => {
  it('joins an array command', () => {
    const message = msg({ kind: 'TOOL_START', toolName: 'shell', args: { command: ['git', 'status', 1] } });

    expect(extractCommands(message)).toEqual(['git status']);
  });

  it('takes a string command from bash', () => {
    expect(extractCommands(msg({ kind: 'TOOL_START', toolName: 'bash', args: { command: 'ls -la' } }))).toEqual([
      'ls -la',
    ]);
  });

  it('ignores other tools and malformed arguments', () => {
    expect(extractCommands(msg({ kind: 'TOOL_START', toolName: 'read', args: { command: 'ls' } }))).toEqual([]);
    expect(extractCommands(msg({ kind: 'TOOL_START', toolName: 'shell', args: { cmd: 'ls' } }))).toEqual([]);
    expect(extractCommands(msg({ kind: 'TOOL_START', toolName: 'shell', args: 'ls' }))).toEqual([]);
    expect(extractCommands(msg({ kind: 'COMPLETED' }))).toEqual([]);
  });
});

describe('formatToolOutput', () => {
  it('returns short output unchanged', () => {
    expect(formatToolOutput('a\nb\n', 2)).toBe('a\nb\n');
  });

  it('keeps the head and tail of long output', () => {
    const output = ['1', '2', '3', '4', '5', '6'].join('\n');

    expect(formatToolOutput(output, 3)).toBe('1\n\n... (3 lines omitted) ...\n\n5\n6\n');
  });
});

describe('wrapText', () => {
  it('wraps at word boundaries', () => {
    expect(wrapText('the quick brown fox', 10)).toEqual(['the quick', 'brown fox']);
  });

  it('splits words longer than the width', () => {
    expect(wrapText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('wraps each line on its own', () => {
    expect(wrapText('short\nthis one is long', 8)).toEqual(['short', 'this one', 'is long']);
  });

  it('returns one empty line for empty input or zero width', () => {
    expect(wrapText('', 10)).toEqual(['']);
    expect(wrapText('text', 0)).toEqual(['']);
  });
});

describe('tool message helpers', () => {
  it('recognizes tool messages and their names', () => {
    const start = msg({ kind: 'TOOL_START', toolName: 'grep', args: {} });
    const primary = msg({ kind: 'PRIMARY', text: 'hi' });

    expect(isToolMessage(start)).toBe(true);
    expect(isToolMessage(primary)).toBe(false);
    expect(getToolName(msg({ kind: 'TOOL_COMPLETE', toolName: 'grep', result: '' }))).toBe('grep');
    expect(getToolName(primary)).toBeNull();
  });
});

describe('formatMessage', () => {
  it('renders each kind on one line', () => {
    expect(formatMessage(msg({ kind: 'PRIMARY', text: 'hello' }))).toBe('hello');
    expect(formatMessage(msg({ kind: 'TOOL_START', toolName: 'shell', args: {} }))).toBe('Running: shell');
    expect(formatMessage(msg({ kind: 'TOOL_OUTPUT', toolName: 'shell', chunk: 'out' }))).toBe('shell: out');
    expect(formatMessage(msg({ kind: 'TOOL_COMPLETE', toolName: 'shell', result: 'x' }))).toBe('shell completed');
    expect(formatMessage(msg({ kind: 'ERROR', error: { kind: 'turn_limit_exceeded' } }))).toBe(
      'Error: Turn limit exceeded',
    );
    expect(formatMessage(msg({ kind: 'COMPLETED' }))).toBe('Completed');
    expect(formatMessage(msg({ kind: 'START' }))).toBe('Starting...');
    expect(formatMessage(msg({ kind: 'REASONING', text: 'hidden' }))).toBe('');
  });
});
