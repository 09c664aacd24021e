import { nanoid } from 'nanoid';
import { createChannel, type Channel } from '../channel/channel.js';
import type { Agent, ExecutionHandle } from '../session/agent.js';
import { AlreadyRunningError, NotRunningError } from '../types/error.js';
import { inputMessage, type InputMessage, type OutputMessage, type PlanMessage } from '../types/index.js';
import { createMessageHistory, DEFAULT_HISTORY_SIZE, type RecordedMessage } from './history.js';
import { readSessionRecord, writeSessionRecord, type SessionRecord } from './record.js';

export type SessionMetrics = {
  readonly messagesSent: number;
  readonly messagesReceived: number;
  readonly toolCalls: number;
  readonly errors: number;
  /** Time since `start()`, frozen by `stop()`; 0 before start. */
  readonly durationMs: number;
};

export type AgentSessionOptions = {
  readonly historySize?: number;
  /** Free-form data saved with the session. */
  readonly custom?: Record<string, unknown>;
  readonly now?: () => number;
};

export type AgentSession = {
  readonly sessionId: string;
  readonly start: () => void;
  /** Records `text` and hands it to the agent. */
  readonly send: (text: string) => Promise<void>;
  /** Stops the agent and waits for it; a no-op when not started. */
  readonly stop: () => Promise<void>;
  readonly history: () => ReadonlyArray<RecordedMessage>;
  readonly metrics: () => SessionMetrics;
  /** Latest plan received, if any. */
  readonly plan: () => PlanMessage | null;
  readonly record: () => SessionRecord;
  readonly save: (path: string) => Promise<void>;
};

type Running = {
  readonly input: Channel<InputMessage>;
  readonly handle: ExecutionHandle;
  readonly consumers: Promise<void>;
};

/**
 * Keeps a conversation record around an agent: message history, counters,
 * the latest plan, and a saveable summary.
 */
export function createAgentSession(agent: Agent, options: AgentSessionOptions = {}): AgentSession {
  const now = options.now ?? Date.now;
  const createdAt = now();
  return buildSession(agent, options, {
    messages: [],
    turnCount: 0,
    metadata: {
      sessionId: nanoid(),
      createdAt,
      updatedAt: createdAt,
      model: agent.config.model,
      custom: options.custom ?? {},
    },
  });
}

/** Restores a saved session; it starts out stopped. */
export async function loadAgentSession(
  path: string,
  agent: Agent,
  options: AgentSessionOptions = {},
): Promise<AgentSession> {
  return buildSession(agent, options, await readSessionRecord(path));
}

function buildSession(agent: Agent, options: AgentSessionOptions, initial: SessionRecord): AgentSession {
  const now = options.now ?? Date.now;
  const history = createMessageHistory(options.historySize ?? DEFAULT_HISTORY_SIZE);
  const messages: RecordedMessage[] = [...initial.messages];
  const { metadata } = initial;
  let turnCount = initial.turnCount;
  let updatedAt = metadata.updatedAt;

  for (const message of messages) {
    history.add(message);
  }

  let counters = { messagesSent: 0, messagesReceived: 0, toolCalls: 0, errors: 0 };
  let latestPlan: PlanMessage | null = null;
  let startedAt: number | null = null;
  let stoppedAt: number | null = null;
  let running: Running | null = null;

  const remember = (message: RecordedMessage): void => {
    history.add(message);
    messages.push(message);
  };

  const observe = (output: OutputMessage): void => {
    counters = { ...counters, messagesReceived: counters.messagesReceived + 1 };
    const { data } = output;
    switch (data.kind) {
      case 'PRIMARY':
        remember({ role: 'assistant', content: data.text, timestamp: now() });
        break;
      case 'TOOL_START':
        counters = { ...counters, toolCalls: counters.toolCalls + 1 };
        break;
      case 'ERROR':
        counters = { ...counters, errors: counters.errors + 1 };
        break;
      default:
        break;
    }
  };

  const start = (): void => {
    if (running !== null) {
      throw new AlreadyRunningError();
    }

    const capacity = agent.config.channelCapacity;
    const input = createChannel<InputMessage>(capacity);
    const plan = createChannel<PlanMessage>(capacity);
    const output = createChannel<OutputMessage>(capacity);

    const handle = agent.execute(input, plan, output);

    const consumeOutputs = async (): Promise<void> => {
      for await (const message of output) {
        observe(message);
      }
    };
    const consumePlans = async (): Promise<void> => {
      for await (const message of plan) {
        latestPlan = message;
      }
    };

    running = {
      input,
      handle,
      consumers: Promise.all([consumeOutputs(), consumePlans()]).then(() => undefined),
    };
    startedAt = now();
    stoppedAt = null;
  };

  const send = async (text: string): Promise<void> => {
    if (running === null) {
      throw new NotRunningError();
    }

    const timestamp = now();
    remember({ role: 'user', content: text, timestamp });
    counters = { ...counters, messagesSent: counters.messagesSent + 1 };
    turnCount++;
    updatedAt = timestamp;

    // Rejects with ChannelError once the loop has ended.
    await running.input.send(inputMessage(text));
  };

  const stop = async (): Promise<void> => {
    if (running === null) {
      return;
    }
    const { handle, consumers } = running;
    running = null;

    handle.controller.stop();
    await handle.join();
    await consumers;
    stoppedAt = now();
  };

  const record = (): SessionRecord => ({
    messages: [...messages],
    turnCount,
    metadata: { ...metadata, updatedAt },
  });

  return {
    sessionId: metadata.sessionId,
    start,
    send,
    stop,
    history: history.all,
    metrics: () => ({
      ...counters,
      durationMs: startedAt === null ? 0 : (stoppedAt ?? now()) - startedAt,
    }),
    plan: () => latestPlan,
    record,
    save: (path) => writeSessionRecord(path, record()),
  };
}
