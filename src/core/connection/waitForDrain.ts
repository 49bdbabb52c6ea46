import type { BrokerChannel } from '../types/Amqp';
import { TransportError, toTransportError } from '../types/Errors';

/**
 * Wait until a channel whose write buffer is full accepts writes again.
 *
 * Rejects with a TransportError when the channel closes or fails first; a
 * closed channel never emits 'drain'.
 */
export function waitForDrain(channel: BrokerChannel, label: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanup = (): void => {
      channel.removeListener('drain', onDrain);
      channel.removeListener('close', onClose);
      channel.removeListener('error', onError);
    };
    const onDrain = (): void => {
      cleanup();
      resolve();
    };
    const onClose = (): void => {
      cleanup();
      reject(new TransportError(`${label} channel closed while waiting for drain`, { label }));
    };
    const onError = (error: unknown): void => {
      cleanup();
      reject(toTransportError(`${label} channel failed while waiting for drain`, error, { label }));
    };

    channel.once('drain', onDrain);
    channel.once('close', onClose);
    channel.once('error', onError);
  });
}
