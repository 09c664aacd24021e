import type { Backend, BackendConnector, BackendEvent, InputItem } from '@conduit/backend';
import { abortable, SHUTDOWN, textItem, userInput } from '@conduit/backend';
import type { Logger } from '../logging/logger.js';
import type { Receiver, Sender } from '../channel/channel.js';
import { sendBestEffort } from '../channel/send.js';
import type { EngineConfig } from '../config/config.js';
import { toOutputError, type OutputError } from '../types/error.js';
import type { ImageRef, InputMessage, OutputMessage, PlanMessage } from '../types/index.js';
import type { SessionController, SessionStateHandle } from './state.js';
import { createEventTranslator, type EventTranslator } from './translator.js';

export type LoopContext = {
  readonly state: SessionStateHandle;
  readonly connect: BackendConnector;
  readonly config: EngineConfig;
  readonly logger: Logger;
  readonly input: Receiver<InputMessage>;
  readonly plan: Sender<PlanMessage>;
  readonly output: Sender<OutputMessage>;
};

/**
 * Runs one session: connects, then drives the input and event activities
 * until the input ends, `stop()` is called or the backend fails. Faults are
 * reported on the output channel; the returned promise rejects only on an
 * internal error. Output and plan channels are closed on the way out.
 */
export async function runExecutionLoop(context: LoopContext): Promise<void> {
  const { state, logger } = context;
  const { controller } = state;
  const translator = createEventTranslator();

  try {
    let backend: Backend;
    try {
      backend = await abortable(context.connect(controller.signal), controller.signal);
    } catch (err) {
      if (!controller.stopRequested()) {
        logger.error({ err }, 'Failed to connect to backend');
        await emitError(context, 0, toOutputError(err));
        state.fail();
      }
      return;
    }

    logger.info({ maxTurns: context.config.maxTurns }, 'Execution loop started');

    const events = runEventActivity(backend, context, translator);
    try {
      await runInputActivity(backend, context, translator);
    } finally {
      try {
        await backend.submit(SHUTDOWN);
      } catch (err) {
        logger.warn({ err }, 'Shutdown request failed');
      }
      await events;
    }
  } finally {
    state.finish();
    context.input.cancel();
    context.output.close();
    context.plan.close();
    logger.info({ phase: controller.phase(), turnCount: controller.turnCount() }, 'Execution loop finished');
  }
}

async function runEventActivity(
  backend: Backend,
  context: LoopContext,
  translator: EventTranslator,
): Promise<void> {
  const { state, logger } = context;
  const { controller } = state;

  while (!controller.stopRequested()) {
    let event: BackendEvent | null;
    try {
      event = await backend.nextEvent(controller.signal);
    } catch (err) {
      if (controller.stopRequested()) {
        return;
      }
      logger.error({ err }, 'Failed to receive backend event');
      await emitError(context, translator.turnId(), toOutputError(err));
      // Cancels the input activity as well.
      state.fail();
      return;
    }

    if (event === null) {
      logger.debug('Backend event stream ended');
      return;
    }

    const { outputs, plan } = translator.translate(event);

    if (plan !== null) {
      await sendBestEffort(context.plan, plan, controller.signal);
    }
    for (const output of outputs) {
      await sendBestEffort(context.output, output, controller.signal);
    }
    if (plan === null && outputs.length === 0) {
      logger.debug({ type: event.type }, 'Ignored backend event');
    }

    if (event.type === 'shutdown_complete') {
      return;
    }
  }
}

async function runInputActivity(
  backend: Backend,
  context: LoopContext,
  translator: EventTranslator,
): Promise<void> {
  const { state, logger, config } = context;
  const { controller } = state;

  while (!controller.stopRequested()) {
    const next = await context.input.receive(controller.signal);
    if (next.done || controller.stopRequested()) {
      return;
    }

    await waitWhilePaused(controller, config.pausePollIntervalMs);
    if (controller.stopRequested()) {
      return;
    }

    if (controller.turnCount() >= config.maxTurns) {
      logger.warn({ maxTurns: config.maxTurns }, 'Turn limit exceeded');
      await emitError(context, translator.turnId(), { kind: 'turn_limit_exceeded' });
      return;
    }

    // Not abortable: shutdown must not overtake an input already on its way.
    try {
      await backend.submit(userInput(toInputItems(next.value)));
    } catch (err) {
      if (!controller.stopRequested()) {
        logger.error({ err }, 'Failed to submit input');
        await emitError(context, translator.turnId(), toOutputError(err));
      }
    }

    state.recordTurn();
  }
}

/**
 * Returns once the session is no longer `PAUSED` or cancellation is
 * requested. Wakes on phase changes and at least every `intervalMs`.
 */
export async function waitWhilePaused(controller: SessionController, intervalMs: number): Promise<void> {
  while (controller.phase() === 'PAUSED' && !controller.stopRequested()) {
    await new Promise<void>((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        unsubscribe();
        controller.signal.removeEventListener('abort', wake);
        resolve();
      };
      const timer = setTimeout(wake, intervalMs);
      const unsubscribe = controller.onPhaseChange(wake);
      controller.signal.addEventListener('abort', wake, { once: true });
    });
  }
}

export function toInputItems(message: InputMessage): ReadonlyArray<InputItem> {
  return [textItem(message.text), ...message.images.map(imageItem)];
}

function imageItem(image: ImageRef): InputItem {
  switch (image.kind) {
    case 'base64':
      return { type: 'image', imageUrl: `data:${image.mimeType};base64,${image.data}` };
    case 'url':
      return { type: 'image', imageUrl: image.url };
    case 'path':
      return { type: 'local_image', path: image.path };
  }
}

async function emitError(context: LoopContext, turnId: number, error: OutputError): Promise<void> {
  await sendBestEffort(context.output, { turnId, data: { kind: 'ERROR', error } }, context.state.controller.signal);
}
