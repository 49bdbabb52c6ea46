export { Producer } from './producer/Producer';
export type { ProducerOptions, SendOptions } from './producer/Producer';
export { resolveRoutingKey } from './producer/routingKey';
export { ReplySubscription } from './rpc/ReplySubscription';
export type { ReplyWaitOptions } from './rpc/ReplySubscription';
