import type { ConsumeMessage } from 'amqplib';

export interface DeliveryInit {
  body?: string | Buffer;
  deliveryTag?: number;
  routingKey?: string;
  exchange?: string;
  replyTo?: string;
  correlationId?: string;
  messageId?: string;
  headers?: ConsumeMessage['properties']['headers'];
}

// Helper to create an AMQP delivery
export const createDelivery = (init: DeliveryInit = {}): ConsumeMessage => ({
  content: Buffer.isBuffer(init.body) ? init.body : Buffer.from(init.body ?? 'payload'),
  fields: {
    deliveryTag: init.deliveryTag ?? 1,
    redelivered: false,
    exchange: init.exchange ?? '',
    routingKey: init.routingKey ?? 'test.key',
    consumerTag: 'ctag-test',
  },
  properties: {
    contentType: undefined,
    contentEncoding: undefined,
    headers: init.headers ?? {},
    deliveryMode: undefined,
    priority: undefined,
    correlationId: init.correlationId,
    replyTo: init.replyTo,
    expiration: undefined,
    messageId: init.messageId,
    timestamp: undefined,
    type: undefined,
    userId: undefined,
    appId: undefined,
    clusterId: undefined,
  },
});
