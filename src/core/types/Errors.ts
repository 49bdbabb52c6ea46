/**
 * Base error class for all bridge errors
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Connection or channel failures (broker unreachable, channel closed).
 * Never retried by the bridge itself.
 */
export class TransportError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', details);
  }
}

/**
 * Declare-time mismatch with topology that already exists on the broker
 */
export class TopologyConflictError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TOPOLOGY_CONFLICT', details);
  }
}

/**
 * Nothing to send
 */
export class EmptyBodyError extends BridgeError {
  constructor(message = 'Message body is empty', details?: Record<string, unknown>) {
    super(message, 'EMPTY_BODY', details);
  }
}

/**
 * Acknowledgment (or rejection) of a delivery failed after processing
 */
export class AckFailureError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ACK_FAILURE', details);
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', details);
  }
}

/**
 * Validation errors
 */
export class ValidationError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

/**
 * AMQP reply code for PRECONDITION_FAILED, raised on mismatched redeclaration
 */
const PRECONDITION_FAILED = 406;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isPreconditionFailed = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === PRECONDITION_FAILED;

/**
 * Normalize anything thrown by the transport into a TransportError
 */
export const toTransportError = (
  message: string,
  error: unknown,
  details?: Record<string, unknown>
): TransportError => {
  if (error instanceof TransportError) {
    return error;
  }
  return new TransportError(`${message}: ${errorMessage(error)}`, {
    ...details,
    cause: errorMessage(error),
  });
};
