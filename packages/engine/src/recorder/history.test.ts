import { describe, it, expect } from 'vitest';
import { createMessageHistory } from './history.js';

describe('createMessageHistory', () => {
  it('evicts the oldest messages beyond its size', () => {
    const history = createMessageHistory(2);

    history.add({ role: 'user', content: 'one', timestamp: 1 });
    history.add({ role: 'assistant', content: 'two', timestamp: 2 });
    history.add({ role: 'user', content: 'three', timestamp: 3 });

    expect(history.size()).toBe(2);
    expect(history.all().map((message) => message.content)).toEqual(['two', 'three']);
  });

  it('returns a copy and can be cleared', () => {
    const history = createMessageHistory();
    history.add({ role: 'user', content: 'hi', timestamp: 1 });

    const snapshot = history.all();
    history.clear();

    expect(snapshot).toHaveLength(1);
    expect(history.size()).toBe(0);
  });

  it('rejects a non-positive size', () => {
    expect(() => createMessageHistory(0)).toThrow(RangeError);
  });
});
