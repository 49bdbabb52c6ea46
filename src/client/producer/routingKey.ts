import type { ResolvedEndpointConfig } from '../../core/config/EndpointConfig';
import { HEADERS } from '../../core/constants';
import type { Envelope } from '../../core/message/Envelope';
import type { Logger } from '../../core/types/Logger';

/**
 * Routing key for an outbound envelope.
 *
 * Starts from the configured routing key, becomes the queue name when no
 * exchange is configured, and yields to the envelope's ROUTING_KEY header when
 * an exchange or a queue is configured. With neither configured the header is
 * ignored with a warning.
 */
export function resolveRoutingKey(
  config: Pick<ResolvedEndpointConfig, 'exchange' | 'queue' | 'routingKey'>,
  envelope: Envelope,
  logger: Logger
): string {
  let key = config.routingKey;

  if (!config.exchange) {
    key = config.queue;
  }

  const header = envelope.getHeader(HEADERS.ROUTING_KEY);
  if (header !== undefined && header !== null) {
    if (config.exchange || config.queue) {
      key = String(header);
    } else {
      logger.warn('No exchange or queue set, ignoring routing key header', {
        routingKey: String(header),
      });
    }
  }

  return key;
}
