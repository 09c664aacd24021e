import { describe, it, expect } from 'vitest';
import { AbortError, ModelError, StreamClosedError } from '../types/error.js';
import { SHUTDOWN, textItem, userInput } from '../types/operation.js';
import { createScriptedBackend } from './scripted-backend.js';

describe('createScriptedBackend', () => {
  it('starts with a session_configured event by default', async () => {
    const backend = createScriptedBackend();

    await expect(backend.nextEvent()).resolves.toEqual({
      type: 'session_configured',
      sessionId: backend.conversationId,
      model: 'scripted',
    });
  });

  it('queues the responder events for each input', async () => {
    const backend = createScriptedBackend({
      sessionEvents: [],
      respond: (items, turnIndex) => [
        { type: 'agent_message', message: `${turnIndex}:${items.map((item) => (item.type === 'text' ? item.text : '')).join('')}` },
        { type: 'task_complete', lastAgentMessage: null },
      ],
    });

    await backend.submit(userInput([textItem('hello')]));

    await expect(backend.nextEvent()).resolves.toEqual({ type: 'agent_message', message: '0:hello' });
    await expect(backend.nextEvent()).resolves.toEqual({ type: 'task_complete', lastAgentMessage: null });
  });

  it('delivers events pushed while a consumer is waiting', async () => {
    const backend = createScriptedBackend({ sessionEvents: [] });

    const pending = backend.nextEvent();
    backend.push({ type: 'agent_reasoning', text: 'thinking' });

    await expect(pending).resolves.toEqual({ type: 'agent_reasoning', text: 'thinking' });
  });

  it('ends the stream after shutdown', async () => {
    const backend = createScriptedBackend({ sessionEvents: [] });

    await backend.submit(SHUTDOWN);

    await expect(backend.nextEvent()).resolves.toEqual({ type: 'shutdown_complete' });
    await expect(backend.nextEvent()).resolves.toBeNull();
    await expect(backend.submit(userInput([textItem('late')]))).rejects.toBeInstanceOf(StreamClosedError);
    expect(backend.operations()).toEqual([SHUTDOWN]);
  });

  it('fails submit when the responder throws', async () => {
    const backend = createScriptedBackend({
      respond: () => {
        throw new ModelError('model unavailable');
      },
    });

    await expect(backend.submit(userInput([textItem('hi')]))).rejects.toThrow('model unavailable');
    expect(backend.operations()).toHaveLength(1);
  });

  it('rejects a waiting nextEvent when failed', async () => {
    const backend = createScriptedBackend({ sessionEvents: [] });

    const pending = backend.nextEvent();
    backend.fail(new Error('connection lost'));

    await expect(pending).rejects.toThrow('connection lost');
  });

  it('rejects a waiting nextEvent when its signal aborts', async () => {
    const backend = createScriptedBackend({ sessionEvents: [] });
    const controller = new AbortController();

    const pending = backend.nextEvent(controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);

    // The queue still serves later calls.
    backend.push({ type: 'agent_message', message: 'after' });
    await expect(backend.nextEvent()).resolves.toEqual({ type: 'agent_message', message: 'after' });
  });
});
