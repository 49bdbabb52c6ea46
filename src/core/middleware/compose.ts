import type { Envelope } from '../message/Envelope';
import type { Middleware, Processor } from './types';

/**
 * Composes middleware and a final processor into a single processor.
 *
 * Middleware run in the order given; each decides whether to call next().
 */
export const compose = (middlewares: readonly Middleware[], processor: Processor): Processor => {
  if (typeof processor !== 'function') {
    throw new Error('A processor function is required');
  }

  if (middlewares.length === 0) {
    return processor;
  }

  return async (envelope: Envelope): Promise<void> => {
    let lastIndex = -1;

    const dispatch = async (index: number): Promise<void> => {
      if (index <= lastIndex) {
        throw new Error('next() called multiple times');
      }
      lastIndex = index;

      if (index === middlewares.length) {
        await processor(envelope);
        return;
      }

      await middlewares[index](envelope, () => dispatch(index + 1));
    };

    await dispatch(0);
  };
};

/**
 * Invoke a processor and settle the envelope: a thrown error is recorded on it,
 * then its completions run.
 *
 * @returns the processing error, if any, as it stood before completions ran
 */
export async function runPipeline(processor: Processor, envelope: Envelope): Promise<Error | null> {
  try {
    await processor(envelope);
  } catch (error) {
    envelope.setError(error instanceof Error ? error : new Error(String(error)));
  }

  const processingError = envelope.getError();
  await envelope.done();
  return processingError;
}
