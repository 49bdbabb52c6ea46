import type { ResolvedEndpointConfig } from '../../core/config/EndpointConfig';
import type { ChannelProvisioner } from '../../core/connection/ChannelProvisioner';
import { waitForDrain } from '../../core/connection/waitForDrain';
import { DEFAULT_EXCHANGE, FAILURE_POLICY, HEADERS } from '../../core/constants';
import type { Envelope, Synchronization } from '../../core/message/Envelope';
import type { BrokerChannel, Delivery } from '../../core/types/Amqp';
import { AckFailureError, errorMessage, toTransportError } from '../../core/types/Errors';
import type { Logger } from '../../core/types/Logger';

/**
 * Where a delivery-level error happened
 */
export type DeliveryErrorStage = 'dispatch' | 'ack' | 'reject' | 'reply' | 'channel';

export interface DeliveryErrorContext {
  stage: DeliveryErrorStage;
  worker: string;
  deliveryTag?: number;
  messageId?: string;
  envelope?: Envelope;
}

export type DeliveryErrorReporter = (error: Error, context: DeliveryErrorContext) => void;

export interface DeliveryCompletionOptions {
  config: Pick<ResolvedEndpointConfig, 'autoAck' | 'failurePolicy'>;
  delivery: Delivery;
  /**
   * Channel the delivery arrived on; the only channel allowed to settle it
   */
  channel: BrokerChannel;
  /**
   * The worker's own reply path, distinct from the consuming channel
   */
  replyChannel: ChannelProvisioner;
  worker: string;
  logger: Logger;
  report: DeliveryErrorReporter;
}

/**
 * Settles one delivery after the pipeline has finished with it.
 *
 * Success: publish the reply when the delivery asked for one, then ack (manual
 * mode). Failure: apply the failure policy (manual mode). Settlement always
 * happens on the consuming channel and exactly once; errors on the way are
 * recorded on the envelope and reported, never thrown.
 */
export class DeliveryCompletion implements Synchronization {
  private settled = false;

  constructor(private readonly options: DeliveryCompletionOptions) {}

  async onComplete(envelope: Envelope): Promise<void> {
    const replyTo = envelope.getStringHeader(HEADERS.REPLY_TO);
    if (replyTo) {
      await this.reply(envelope, replyTo);
    }

    if (!this.options.config.autoAck) {
      await this.settle(envelope, 'ack');
    }
  }

  async onFailure(envelope: Envelope): Promise<void> {
    const { config, logger, worker } = this.options;

    // the error itself reaches the consumer's errorHandler through the worker
    logger.warn('Delivery processing failed', {
      worker,
      deliveryTag: this.deliveryTag,
      messageId: envelope.messageId,
      error: envelope.getError()?.message,
      failurePolicy: config.autoAck ? undefined : config.failurePolicy,
    });

    if (!config.autoAck) {
      await this.settle(envelope, 'reject');
    }
  }

  private get deliveryTag(): number {
    return this.options.delivery.fields.deliveryTag;
  }

  private async reply(envelope: Envelope, replyTo: string): Promise<void> {
    const { replyChannel, worker, logger } = this.options;
    const correlationId = envelope.getStringHeader(HEADERS.CORRELATION_ID);
    const response = envelope.getResponseBody() ?? envelope.getBody();
    const content =
      response === null
        ? Buffer.alloc(0)
        : typeof response === 'string'
          ? Buffer.from(response, 'utf8')
          : response;

    try {
      const channel = await replyChannel.getChannel();
      if (!channel.publish(DEFAULT_EXCHANGE, replyTo, content, { correlationId })) {
        await waitForDrain(channel, `${worker}-reply`);
      }
      logger.debug('Reply sent', { worker, replyTo, correlationId });
    } catch (error) {
      const failure = toTransportError('Failed to publish reply', error, { replyTo, correlationId });
      envelope.setError(failure);
      this.options.report(failure, this.context('reply', envelope));
    }
  }

  private async settle(envelope: Envelope, outcome: 'ack' | 'reject'): Promise<void> {
    if (this.settled) {
      return;
    }
    this.settled = true;

    const { channel, delivery, config, worker, logger } = this.options;
    try {
      if (outcome === 'ack' || config.failurePolicy === FAILURE_POLICY.DROP) {
        channel.ack(delivery);
      } else {
        channel.nack(delivery, false, config.failurePolicy === FAILURE_POLICY.REQUEUE);
      }
      logger.debug(`Delivery ${outcome === 'ack' ? 'acknowledged' : 'rejected'}`, {
        worker,
        deliveryTag: this.deliveryTag,
        failurePolicy: outcome === 'reject' ? config.failurePolicy : undefined,
      });
    } catch (error) {
      const failure = new AckFailureError(
        `Failed to ${outcome === 'ack' ? 'acknowledge' : 'reject'} delivery ${this.deliveryTag}`,
        { deliveryTag: this.deliveryTag, cause: errorMessage(error) }
      );
      envelope.setError(failure);
      this.options.report(failure, this.context(outcome, envelope));
    }
  }

  private context(stage: DeliveryErrorStage, envelope: Envelope): DeliveryErrorContext {
    return {
      stage,
      worker: this.options.worker,
      deliveryTag: this.deliveryTag,
      messageId: envelope.messageId,
      envelope,
    };
  }
}
