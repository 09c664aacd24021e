import type { OutputError } from './error.js';

export type ImageRef =
  | { readonly kind: 'base64'; readonly data: string; readonly mimeType: string }
  | { readonly kind: 'path'; readonly path: string }
  | { readonly kind: 'url'; readonly url: string };

export type InputMessage = {
  readonly text: string;
  readonly images: ReadonlyArray<ImageRef>;
};

export function inputMessage(text: string, images: ReadonlyArray<ImageRef> = []): InputMessage {
  return { text, images };
}

export type TodoStatus = 'pending' | 'in_progress' | 'completed' | 'blocked';

export type TodoItem = {
  readonly content: string;
  readonly status: TodoStatus;
};

export type OutputEvent =
  | { readonly kind: 'START' }
  | { readonly kind: 'PRIMARY'; readonly text: string }
  | { readonly kind: 'PRIMARY_DELTA'; readonly text: string }
  | { readonly kind: 'DETAIL'; readonly text: string }
  | { readonly kind: 'REASONING'; readonly text: string }
  | { readonly kind: 'TOOL_START'; readonly toolName: string; readonly args: unknown }
  | { readonly kind: 'TOOL_OUTPUT'; readonly toolName: string; readonly chunk: string }
  | { readonly kind: 'TOOL_COMPLETE'; readonly toolName: string; readonly result: string }
  | { readonly kind: 'TODO_UPDATE'; readonly todos: ReadonlyArray<TodoItem> }
  | { readonly kind: 'COMPLETED' }
  | { readonly kind: 'ERROR'; readonly error: OutputError };

export type OutputEventKind = OutputEvent['kind'];

export type OutputMessage = {
  readonly turnId: number;
  readonly data: OutputEvent;
};

export type PlanMetadata = {
  readonly turnId: number;
  readonly description: string | null;
};

export type PlanMessage = {
  readonly todos: ReadonlyArray<TodoItem>;
  readonly metadata: PlanMetadata | null;
};

export function isTerminal(event: OutputEvent): boolean {
  return event.kind === 'COMPLETED' || event.kind === 'ERROR';
}

export function isError(event: OutputEvent): event is Extract<OutputEvent, { kind: 'ERROR' }> {
  return event.kind === 'ERROR';
}
