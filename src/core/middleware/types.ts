import type { Envelope } from '../message/Envelope';

export type NextFunction = () => Promise<void>;

/**
 * Pipeline step that may act before and after the rest of the chain
 */
export type Middleware = (envelope: Envelope, next: NextFunction) => Promise<void> | void;

/**
 * Application logic at the end of the pipeline. It signals completion by
 * returning (or resolving) and failure by throwing (or rejecting).
 */
export type Processor = (envelope: Envelope) => Promise<void> | void;
