import { AbortError } from '@conduit/backend';
import { ChannelError } from '../types/error.js';
import type { Sender } from './channel.js';

/**
 * Sends without treating a gone receiver as a failure. Returns whether the
 * value was delivered; a closed channel or an aborted send yields `false`,
 * any other error propagates.
 */
export async function sendBestEffort<T>(
  sender: Pick<Sender<T>, 'send'>,
  value: T,
  signal?: AbortSignal,
): Promise<boolean> {
  try {
    await sender.send(value, signal);
    return true;
  } catch (err) {
    if (err instanceof ChannelError || err instanceof AbortError) {
      return false;
    }
    throw err;
  }
}
