import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { ConsumerWorker, createEnvelope } from '../../src/server/consumer/ConsumerWorker';
import {
  HEADERS,
  type EndpointConfig,
  type Envelope,
  type Processor,
  SilentLogger,
  TimeoutError,
  TransportError,
  resolveEndpointConfig,
} from '../../src/core';
import { MockConnectionSource, flush } from '../helpers/Broker';
import { createDelivery } from '../helpers/Delivery';

describe('createEnvelope()', () => {
  it('should expose delivery metadata as headers', () => {
    const envelope = createEnvelope(
      createDelivery({
        body: 'payload',
        deliveryTag: 5,
        routingKey: 'order.created',
        exchange: 'events',
        replyTo: 'amq.gen-client',
        correlationId: 'c-1',
        messageId: 'm-9',
        headers: { tenant: 'acme', 'x-death': [{ count: 1 }] },
      })
    );

    expect(envelope.messageId).toBe('m-9');
    expect(envelope.getBodyAsString()).toBe('payload');
    expect(envelope.getHeaders()).toEqual({
      tenant: 'acme',
      [HEADERS.ROUTING_KEY]: 'order.created',
      [HEADERS.EXCHANGE_NAME]: 'events',
      [HEADERS.DELIVERY_TAG]: 5,
      [HEADERS.REPLY_TO]: 'amq.gen-client',
      [HEADERS.CORRELATION_ID]: 'c-1',
    });
  });

  it('should set reply-to and correlation id to null when absent', () => {
    const envelope = createEnvelope(createDelivery());

    expect(envelope.getHeader(HEADERS.REPLY_TO)).toBeNull();
    expect(envelope.getHeader(HEADERS.CORRELATION_ID)).toBeNull();
  });
});

describe('ConsumerWorker', () => {
  let source: MockConnectionSource;
  let report: Mock;

  beforeEach(() => {
    source = new MockConnectionSource();
    report = vi.fn();
  });

  const createWorker = (
    processor: Processor,
    overrides: Partial<EndpointConfig> = {}
  ): ConsumerWorker =>
    new ConsumerWorker({
      name: 'worker-1',
      queue: 'invoices',
      config: resolveEndpointConfig({
        connection: { url: 'amqp://localhost' },
        queue: 'invoices',
        autoAck: false,
        prefetch: 4,
        ...overrides,
      }),
      source,
      processor,
      logger: new SilentLogger(),
      report,
    });

  it('should subscribe on its own channel with prefetch applied', async () => {
    const worker = createWorker(vi.fn());

    await worker.start();

    const channel = source.channel(0);
    expect(worker.getState()).toBe('subscribed');
    expect(channel.prefetch).toHaveBeenCalledWith(4);
    expect(channel.consume).toHaveBeenCalledWith('invoices', expect.any(Function), {
      noAck: false,
    });
  });

  it('should not start twice', async () => {
    const worker = createWorker(vi.fn());
    await worker.start();

    await expect(worker.start()).rejects.toThrow('Worker worker-1 cannot start from state subscribed');
  });

  it('should hand each delivery to the processor and track it while in flight', async () => {
    let release: () => void = () => undefined;
    const processor = vi.fn(
      (_envelope: Envelope) =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        })
    );
    const worker = createWorker(processor);
    await worker.start();
    const channel = source.channel(0);
    const delivery = createDelivery({ body: 'invoice-1', deliveryTag: 11 });

    channel.deliver(delivery);

    expect(worker.getState()).toBe('dispatching');
    expect(worker.getInFlightCount()).toBe(1);
    await vi.waitFor(() => expect(processor).toHaveBeenCalledTimes(1));
    const envelope: Envelope = processor.mock.calls[0][0];
    expect(envelope.getBodyAsString()).toBe('invoice-1');

    release();
    await vi.waitFor(() => expect(channel.ack).toHaveBeenCalledWith(delivery));
    await vi.waitFor(() => expect(worker.getState()).toBe('subscribed'));
    expect(worker.getInFlightCount()).toBe(0);
  });

  it('should run one delivery at a time through the pipeline', async () => {
    let active = 0;
    let peak = 0;
    const processor = vi.fn(async (_envelope: Envelope) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 2));
      active -= 1;
    });
    const worker = createWorker(processor, { prefetch: 0 });
    await worker.start();
    const channel = source.channel(0);

    for (let tag = 1; tag <= 5; tag++) {
      channel.deliver(createDelivery({ body: `invoice-${tag}`, deliveryTag: tag }));
    }

    expect(worker.getInFlightCount()).toBe(5);
    await vi.waitFor(() => expect(channel.ack).toHaveBeenCalledTimes(5));
    expect(peak).toBe(1);
    expect(processor.mock.calls.map(([envelope]) => envelope.getBodyAsString())).toEqual([
      'invoice-1',
      'invoice-2',
      'invoice-3',
      'invoice-4',
      'invoice-5',
    ]);
    await vi.waitFor(() => expect(worker.getState()).toBe('subscribed'));
  });

  it('should report a processing error once and keep consuming', async () => {
    const failure = new Error('handler failed');
    const processor = vi.fn().mockRejectedValueOnce(failure).mockResolvedValue(undefined);
    const worker = createWorker(processor);
    await worker.start();
    const channel = source.channel(0);

    channel.deliver(createDelivery({ deliveryTag: 1 }));
    await vi.waitFor(() => expect(channel.nack).toHaveBeenCalledTimes(1));
    channel.deliver(createDelivery({ deliveryTag: 2 }));
    await vi.waitFor(() => expect(channel.ack).toHaveBeenCalledTimes(1));

    expect(report).toHaveBeenCalledTimes(1);
    expect(report).toHaveBeenCalledWith(
      failure,
      expect.objectContaining({ stage: 'dispatch', worker: 'worker-1', deliveryTag: 1 })
    );
  });

  it('should stop and report when the broker cancels the subscription', async () => {
    const worker = createWorker(vi.fn());
    await worker.start();

    source.channel(0).deliver(null);

    expect(worker.getState()).toBe('stopped');
    expect(report).toHaveBeenCalledWith(expect.any(TransportError), {
      stage: 'channel',
      worker: 'worker-1',
    });
    expect(report.mock.calls[0][0].message).toBe('Subscription of worker-1 cancelled by broker');
  });

  it('should close its channels once in-flight deliveries settle after a broker cancel', async () => {
    let release: () => void = () => undefined;
    const worker = createWorker(
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        })
    );
    await worker.start();
    const channel = source.channel(0);
    const delivery = createDelivery({ replyTo: 'amq.gen-client', correlationId: 'c-7' });
    channel.deliver(delivery);

    channel.deliver(null);
    await flush();
    expect(channel.close).not.toHaveBeenCalled();

    release();

    await vi.waitFor(() => expect(source.connection.channels).toHaveLength(2));
    const replyChannel = source.channel(1);
    await vi.waitFor(() => expect(replyChannel.close).toHaveBeenCalledTimes(1));
    expect(replyChannel.publish).toHaveBeenCalledWith('', 'amq.gen-client', Buffer.from('payload'), {
      correlationId: 'c-7',
    });
    expect(channel.ack).toHaveBeenCalledWith(delivery);
    expect(channel.close).toHaveBeenCalledTimes(1);
    expect(channel.ack.mock.invocationCallOrder[0]).toBeLessThan(
      channel.close.mock.invocationCallOrder[0]
    );
    expect(worker.isActive()).toBe(false);
  });

  it('should stop and report when the broker closes the channel', async () => {
    const worker = createWorker(vi.fn());
    await worker.start();

    source.channel(0).brokerClose();

    expect(worker.getState()).toBe('stopped');
    expect(worker.isActive()).toBe(false);
    expect(report.mock.calls[0][0].message).toBe('worker-1 channel closed by broker');
  });

  it('should cancel, drain in-flight deliveries, then close on stop', async () => {
    let release: () => void = () => undefined;
    const worker = createWorker(
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        })
    );
    await worker.start();
    const channel = source.channel(0);
    const delivery = createDelivery();
    channel.deliver(delivery);

    const stopping = worker.stop();
    await vi.waitFor(() => expect(channel.cancel).toHaveBeenCalledWith('ctag-1-1'));
    expect(channel.close).not.toHaveBeenCalled();

    release();
    await stopping;

    expect(channel.ack).toHaveBeenCalledWith(delivery);
    expect(channel.close).toHaveBeenCalledTimes(1);
    expect(channel.ack.mock.invocationCallOrder[0]).toBeLessThan(
      channel.close.mock.invocationCallOrder[0]
    );
    expect(worker.getState()).toBe('stopped');
  });

  it('should still process a delivery pushed before the broker confirms the cancel', async () => {
    const processor = vi.fn(async (_envelope: Envelope) => undefined);
    const worker = createWorker(processor, { autoAck: true });
    await worker.start();
    const channel = source.channel(0);
    const delivery = createDelivery({ body: 'late-invoice', deliveryTag: 3 });
    channel.cancel.mockImplementationOnce(async (consumerTag: string) => {
      channel.deliver(delivery);
      channel.subscriptions.delete(consumerTag);
      return { consumerTag };
    });

    await worker.stop();

    expect(processor).toHaveBeenCalledTimes(1);
    expect(processor.mock.calls[0][0].getBodyAsString()).toBe('late-invoice');
    expect(processor.mock.invocationCallOrder[0]).toBeLessThan(
      channel.close.mock.invocationCallOrder[0]
    );
    expect(worker.getState()).toBe('stopped');
  });

  it('should ignore deliveries once the cancel is confirmed', async () => {
    const processor = vi.fn(async (_envelope: Envelope) => undefined);
    const worker = createWorker(processor);
    await worker.start();
    const channel = source.channel(0);
    const [subscription] = [...channel.subscriptions.values()];

    await worker.stop();
    subscription.callback(createDelivery());
    await flush();

    expect(processor).not.toHaveBeenCalled();
  });

  it('should give up draining after shutdownTimeout', async () => {
    const worker = createWorker(() => new Promise<void>(() => undefined), { shutdownTimeout: 20 });
    await worker.start();
    source.channel(0).deliver(createDelivery());

    await worker.stop();

    expect(source.channel(0).close).toHaveBeenCalledTimes(1);
    expect(report).toHaveBeenCalledWith(expect.any(TimeoutError), {
      stage: 'channel',
      worker: 'worker-1',
    });
  });

  it('should fail to start and release its channel when the subscription is refused', async () => {
    source.connection.prepareChannel(0, (channel) => {
      channel.consume.mockRejectedValueOnce(new Error('NOT_FOUND - no queue'));
    });
    const worker = createWorker(vi.fn());

    const starting = worker.start();

    await expect(starting).rejects.toBeInstanceOf(TransportError);
    await expect(starting).rejects.toThrow(
      'Worker worker-1 failed to subscribe: NOT_FOUND - no queue'
    );
    expect(worker.getState()).toBe('stopped');
    expect(source.channel(0).close).toHaveBeenCalledTimes(1);
  });
});
