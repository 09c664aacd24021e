import { describe, it, expect } from 'vitest';
import {
  ModelError,
  createScriptedBackend,
  scriptedConnector,
  type BackendConnector,
  type BackendEvent,
  type ScriptedResponder,
} from '@conduit/backend';
import { createChannel } from '../channel/channel.js';
import { createLogger } from '../logging/logger.js';
import { AlreadyRunningError, OutputEventError, SessionEndedError } from '../types/error.js';
import { inputMessage, type InputMessage, type OutputMessage, type PlanMessage } from '../types/index.js';
import { createAgent } from './agent.js';

// A fresh scripted backend per connection, as a conversation service would give.
function connectTo(respond: ScriptedResponder): BackendConnector {
  return async () => createScriptedBackend({ respond });
}

const streamed: ScriptedResponder = () => [
  { type: 'agent_message_delta', delta: 'Hello, ' },
  { type: 'agent_message_delta', delta: 'world' },
  { type: 'task_complete', lastAgentMessage: 'Hello, world' },
];

describe('createAgent', () => {
  it('exposes the parsed configuration', () => {
    const agent = createAgent({ connect: connectTo(streamed), config: { maxTurns: 5 } });

    expect(agent.config).toEqual({
      model: 'default',
      maxTurns: 5,
      pausePollIntervalMs: 100,
      channelCapacity: 100,
      logLevel: 'silent',
    });
    expect(agent.controller.phase()).toBe('INITIALIZED');
  });

  it('logs at the configured level and stays silent by default', () => {
    expect(createAgent({ connect: connectTo(streamed) }).logger.level).toBe('silent');
    expect(createAgent({ connect: connectTo(streamed), config: { logLevel: 'debug' } }).logger.level).toBe('debug');
  });

  it('prefers a logger passed by the caller over the configured level', () => {
    const logger = createLogger({ level: 'warn' });

    const agent = createAgent({ connect: connectTo(streamed), config: { logLevel: 'debug' }, logger });

    expect(agent.logger).toBe(logger);
  });

  describe('execute', () => {
    it('refuses to start twice and cannot restart a finished session', async () => {
      const agent = createAgent({ connect: connectTo(streamed) });
      const channels = () => ({
        input: createChannel<InputMessage>(4),
        plan: createChannel<PlanMessage>(4),
        output: createChannel<OutputMessage>(16),
      });

      const first = channels();
      const handle = agent.execute(first.input, first.plan, first.output);
      const second = channels();

      expect(handle.controller).toBe(agent.controller);
      expect(() => agent.execute(second.input, second.plan, second.output)).toThrow(AlreadyRunningError);

      first.input.close();
      await handle.join();

      expect(agent.controller.phase()).toBe('STOPPED');
      expect(() => agent.execute(second.input, second.plan, second.output)).toThrow(SessionEndedError);
    });
  });

  describe('query', () => {
    it('concatenates the reply text of one turn', async () => {
      const agent = createAgent({ connect: connectTo(streamed) });

      await expect(agent.query('greet me')).resolves.toBe('Hello, world');
      // Queries run on their own session.
      expect(agent.controller.phase()).toBe('INITIALIZED');
    });

    it('rejects with the error output of the turn', async () => {
      const agent = createAgent({ connect: connectTo(() => [{ type: 'error', message: 'quota exhausted' }]) });

      const result = agent.query('anything');

      await expect(result).rejects.toBeInstanceOf(OutputEventError);
      await expect(result).rejects.toThrow('Unknown error: quota exhausted');
    });

    it('rejects when the submission fails', async () => {
      const agent = createAgent({
        connect: connectTo(() => {
          throw new ModelError('model unavailable');
        }),
      });

      await expect(agent.query('anything')).rejects.toThrow('Model error: model unavailable');
    });
  });

  describe('stream', () => {
    it('yields the outputs of one turn and ends at the terminal event', async () => {
      const agent = createAgent({ connect: connectTo(streamed) });
      const kinds: string[] = [];

      for await (const message of agent.stream(inputMessage('greet me'))) {
        kinds.push(message.data.kind);
      }

      expect(kinds).toEqual(['START', 'PRIMARY_DELTA', 'PRIMARY_DELTA', 'COMPLETED']);
    });
  });

  describe('interactive', () => {
    it('delivers messages to the handler until it breaks', async () => {
      const events: BackendEvent[] = [
        { type: 'agent_message', message: 'one' },
        { type: 'task_complete', lastAgentMessage: 'one' },
      ];
      const agent = createAgent({ connect: connectTo(() => events) });
      const seen: string[] = [];

      const { input, handle } = agent.interactive((message) => {
        seen.push(message.data.kind);
        return message.data.kind === 'PRIMARY' ? 'break' : undefined;
      });

      await input.send(inputMessage('hi'));
      input.close();
      await handle.join();

      expect(seen).toEqual(['START', 'PRIMARY']);
      expect(handle.controller).toBe(agent.controller);
      expect(agent.controller.phase()).toBe('STOPPED');
    });
  });
});
