import type { EventEmitter } from 'events';
import type * as amqp from 'amqplib';

/**
 * The slice of an amqplib channel the bridge relies on.
 *
 * Keeping the surface narrow makes the transport boundary explicit: declare,
 * qos, publish, consume, settle, and teardown.
 */
export type BrokerChannel = Pick<
  amqp.Channel,
  | 'assertExchange'
  | 'assertQueue'
  | 'bindQueue'
  | 'deleteQueue'
  | 'prefetch'
  | 'publish'
  | 'consume'
  | 'cancel'
  | 'ack'
  | 'nack'
  | 'close'
  | 'on'
  | 'once'
  | 'removeListener'
>;

/**
 * Anything able to open channels. amqplib's connection (ChannelModel) satisfies it.
 */
export interface BrokerConnection extends EventEmitter {
  createChannel(): Promise<BrokerChannel>;
  close(): Promise<void>;
}

/**
 * Where channels come from. ConnectionManager implements it; tests substitute a fake.
 */
export interface ConnectionSource {
  getConnection(): Promise<BrokerConnection>;
}

export type Delivery = amqp.ConsumeMessage;
export type PublishProperties = amqp.Options.Publish;
