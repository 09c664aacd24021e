import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createScriptedBackend, type BackendConnector } from '@conduit/backend';
import { createAgent, type Agent } from '../session/agent.js';
import { AlreadyRunningError, NotRunningError, SessionRecordError } from '../types/error.js';
import { createAgentSession, loadAgentSession } from './agent-session.js';

const connect: BackendConnector = async () =>
  createScriptedBackend({
    respond: () => [
      { type: 'plan_update', explanation: null, plan: [{ step: 'Reply', status: 'completed' }] },
      {
        type: 'tool_call_begin',
        callId: 't1',
        invocation: { server: null, tool: 'lookup', arguments: { q: 'greeting' } },
      },
      { type: 'agent_message', message: 'hi there' },
      { type: 'task_complete', lastAgentMessage: 'hi there' },
    ],
  });

function newAgent(): Agent {
  return createAgent({ connect, config: { model: 'test-model' } });
}

describe('AgentSession', () => {
  let dir: string;
  let clock: number;
  const now = () => clock;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'conduit-session-'));
    clock = 1_000;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('records the conversation, counters and latest plan', async () => {
    const session = createAgentSession(newAgent(), { now, custom: { project: 'demo' } });

    session.start();
    await session.send('hello');
    await vi.waitFor(() => {
      expect(session.metrics().messagesReceived).toBe(4);
    });
    clock = 1_500;
    await session.stop();

    expect(session.history()).toEqual([
      { role: 'user', content: 'hello', timestamp: 1_000 },
      { role: 'assistant', content: 'hi there', timestamp: 1_000 },
    ]);
    expect(session.metrics()).toEqual({
      messagesSent: 1,
      messagesReceived: 4,
      toolCalls: 1,
      errors: 0,
      durationMs: 500,
    });
    expect(session.plan()).toEqual({
      todos: [{ content: 'Reply', status: 'completed' }],
      metadata: { turnId: 0, description: null },
    });
    expect(session.record()).toEqual({
      messages: session.history(),
      turnCount: 1,
      metadata: {
        sessionId: session.sessionId,
        createdAt: 1_000,
        updatedAt: 1_000,
        model: 'test-model',
        custom: { project: 'demo' },
      },
    });
  });

  it('guards the lifecycle', async () => {
    const session = createAgentSession(newAgent());

    await expect(session.send('too early')).rejects.toBeInstanceOf(NotRunningError);

    session.start();
    expect(() => session.start()).toThrow(AlreadyRunningError);

    await session.stop();
    await session.stop();
    expect(session.metrics().messagesSent).toBe(0);
  });

  it('saves and loads a session', async () => {
    const path = join(dir, 'nested', 'session.json');
    const session = createAgentSession(newAgent(), { now });
    session.start();
    await session.send('hello');
    await vi.waitFor(() => {
      expect(session.history()).toHaveLength(2);
    });
    await session.stop();

    await session.save(path);
    const loaded = await loadAgentSession(path, newAgent(), { now });

    expect(loaded.sessionId).toBe(session.sessionId);
    expect(loaded.record()).toEqual(session.record());
    expect(loaded.history()).toEqual(session.history());
    expect(loaded.metrics().messagesSent).toBe(0);
  });

  it('rejects a file that is not JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, 'not json', 'utf-8');

    await expect(loadAgentSession(path, newAgent())).rejects.toThrow(
      new SessionRecordError(`Session file ${path} is not valid JSON`),
    );
  });

  it('rejects a record of the wrong shape', async () => {
    const path = join(dir, 'wrong.json');
    await writeFile(path, JSON.stringify({ messages: [], turnCount: -1 }), 'utf-8');

    await expect(loadAgentSession(path, newAgent())).rejects.toBeInstanceOf(SessionRecordError);
    await expect(loadAgentSession(path, newAgent())).rejects.toThrow(
      `Invalid session file ${path}: turnCount: Number must be greater than or equal to 0; metadata: Required`,
    );
  });
});
