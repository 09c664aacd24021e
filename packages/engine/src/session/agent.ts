import type { BackendConnector } from '@conduit/backend';
import { createChannel, type Receiver, type Sender } from '../channel/channel.js';
import { parseEngineConfig, type EngineConfig, type EngineConfigInput } from '../config/config.js';
import { createLogger, silentLogger, type Logger } from '../logging/logger.js';
import { OutputEventError, type OutputError } from '../types/error.js';
import { inputMessage, isTerminal, type InputMessage, type OutputMessage, type PlanMessage } from '../types/index.js';
import { runExecutionLoop } from './loop.js';
import { createSessionState, type SessionController, type SessionStateHandle } from './state.js';

export type AgentOptions = {
  readonly connect: BackendConnector;
  readonly config?: EngineConfigInput;
  readonly logger?: Logger;
};

export type ExecutionHandle = {
  readonly controller: SessionController;
  /** Resolves once the loop has finished; rejects only on an internal fault. */
  readonly join: () => Promise<void>;
};

/** Return `'break'` to stop receiving messages. */
export type MessageHandler = (message: OutputMessage) => void | 'break' | Promise<void | 'break'>;

export type InteractiveSession = {
  readonly input: Sender<InputMessage>;
  readonly handle: ExecutionHandle;
};

export type Agent = {
  readonly config: EngineConfig;
  /** The logger passed in, or one at `config.logLevel`. */
  readonly logger: Logger;
  readonly controller: SessionController;
  /**
   * Starts the loop on this agent's session. Throws `AlreadyRunningError`
   * while it runs and `SessionEndedError` once it has ended.
   */
  readonly execute: (
    input: Receiver<InputMessage>,
    plan: Sender<PlanMessage>,
    output: Sender<OutputMessage>,
  ) => ExecutionHandle;
  /** Sends one prompt on a fresh session and collects the reply text. */
  readonly query: (prompt: string | InputMessage) => Promise<string>;
  /** Outputs of one prompt on a fresh session, up to the first terminal event. */
  readonly stream: (prompt: string | InputMessage) => AsyncIterable<OutputMessage>;
  readonly interactive: (handler: MessageHandler) => InteractiveSession;
};

export function createAgent(options: AgentOptions): Agent {
  const config = parseEngineConfig(options.config);
  const logger =
    options.logger ?? (config.logLevel === 'silent' ? silentLogger() : createLogger({ level: config.logLevel }));
  const session = createSessionState();

  const start = (
    state: SessionStateHandle,
    input: Receiver<InputMessage>,
    plan: Sender<PlanMessage>,
    output: Sender<OutputMessage>,
  ): ExecutionHandle => {
    state.begin();

    const done = runExecutionLoop({
      state,
      connect: options.connect,
      config,
      logger: logger.child({ model: config.model }),
      input,
      plan,
      output,
    });
    done.catch((err: unknown) => {
      logger.error({ err }, 'Execution loop failed');
    });

    return { controller: state.controller, join: () => done };
  };

  // One-shot session whose plan stream nobody reads.
  const startPrompt = (prompt: string | InputMessage) => {
    const input = createChannel<InputMessage>(1);
    const plan = createChannel<PlanMessage>(config.channelCapacity);
    const output = createChannel<OutputMessage>(config.channelCapacity);
    plan.cancel();

    const handle = start(createSessionState(), input, plan, output);
    return { handle, input, output, request: typeof prompt === 'string' ? inputMessage(prompt) : prompt };
  };

  const query = async (prompt: string | InputMessage): Promise<string> => {
    const { handle, input, output, request } = startPrompt(prompt);
    let response = '';
    let failure: OutputError | null = null;

    try {
      await input.send(request);
      for await (const { data } of output) {
        if (data.kind === 'PRIMARY' || data.kind === 'PRIMARY_DELTA') {
          response += data.text;
        } else if (data.kind === 'COMPLETED') {
          break;
        } else if (data.kind === 'ERROR') {
          failure = data.error;
          break;
        }
      }
    } finally {
      handle.controller.stop();
      await handle.join();
    }

    if (failure !== null) {
      throw new OutputEventError(failure);
    }
    return response;
  };

  async function* stream(prompt: string | InputMessage): AsyncGenerator<OutputMessage> {
    const { handle, input, output, request } = startPrompt(prompt);

    try {
      await input.send(request);
      for await (const message of output) {
        yield message;
        if (isTerminal(message.data)) {
          return;
        }
      }
    } finally {
      handle.controller.stop();
      await handle.join();
    }
  }

  const interactive = (handler: MessageHandler): InteractiveSession => {
    const input = createChannel<InputMessage>(config.channelCapacity);
    const plan = createChannel<PlanMessage>(config.channelCapacity);
    const output = createChannel<OutputMessage>(config.channelCapacity);
    plan.cancel();

    const handle = start(session, input, plan, output);

    const delivery = (async () => {
      for await (const message of output) {
        if ((await handler(message)) === 'break') {
          return;
        }
      }
    })();
    delivery.catch((err: unknown) => {
      logger.error({ err }, 'Message handler failed');
    });

    return {
      input,
      handle: {
        controller: handle.controller,
        join: async () => {
          await Promise.all([handle.join(), delivery]);
        },
      },
    };
  };

  return {
    config,
    logger,
    controller: session.controller,
    execute: (input, plan, output) => start(session, input, plan, output),
    query,
    stream,
    interactive,
  };
}
