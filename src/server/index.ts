export { Consumer } from './consumer/Consumer';
export type { ConsumerOptions } from './consumer/Consumer';
export { ConsumerWorker, createEnvelope } from './consumer/ConsumerWorker';
export type { ConsumerWorkerOptions, WorkerState } from './consumer/ConsumerWorker';
export { DeliveryCompletion } from './consumer/DeliveryCompletion';
export type {
  DeliveryCompletionOptions,
  DeliveryErrorContext,
  DeliveryErrorReporter,
  DeliveryErrorStage,
} from './consumer/DeliveryCompletion';
export { WorkerPool } from './consumer/WorkerPool';
export type { Worker } from './consumer/WorkerPool';
