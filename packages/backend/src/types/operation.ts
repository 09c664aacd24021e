export type TextItem = {
  readonly type: 'text';
  readonly text: string;
};

export type ImageItem = {
  readonly type: 'image';
  readonly imageUrl: string;
};

export type LocalImageItem = {
  readonly type: 'local_image';
  readonly path: string;
};

export type InputItem = TextItem | ImageItem | LocalImageItem;

export type UserInputOperation = {
  readonly type: 'user_input';
  readonly items: ReadonlyArray<InputItem>;
};

export type ShutdownOperation = {
  readonly type: 'shutdown';
};

export type Operation = UserInputOperation | ShutdownOperation;

export function userInput(items: ReadonlyArray<InputItem>): UserInputOperation {
  return { type: 'user_input', items };
}

export function textItem(text: string): TextItem {
  return { type: 'text', text };
}

export const SHUTDOWN: ShutdownOperation = { type: 'shutdown' };
