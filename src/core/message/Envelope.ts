import { randomUUID } from 'crypto';

export type Body = Buffer | string | null;

export type HeaderValue = string | number | boolean | Date | Buffer | null;

/**
 * Completion registration, run once after the pipeline has settled
 */
export interface Synchronization {
  onComplete(envelope: Envelope): Promise<void> | void;
  onFailure(envelope: Envelope): Promise<void> | void;
}

export interface EnvelopeInit {
  body?: Body;
  headers?: Record<string, HeaderValue>;
  messageId?: string;
}

/**
 * Message envelope travelling through the application pipeline.
 *
 * Holds the inbound body and headers, an optional response body, the error
 * state of processing, and the completions to run once processing is done.
 */
export class Envelope {
  readonly messageId: string;
  private body: Body;
  private headers = new Map<string, HeaderValue>();
  private response: Body = null;
  private hasResponse = false;
  private error: Error | null = null;
  private synchronizations: Synchronization[] = [];
  private completed = false;

  constructor(init: EnvelopeInit = {}) {
    this.messageId = init.messageId ?? randomUUID();
    this.body = init.body ?? null;
    for (const [key, value] of Object.entries(init.headers ?? {})) {
      this.headers.set(key, value);
    }
  }

  getBody(): Body {
    return this.body;
  }

  /**
   * @returns the body decoded as UTF-8, or null when there is none
   */
  getBodyAsString(): string | null {
    if (this.body === null) {
      return null;
    }
    return typeof this.body === 'string' ? this.body : this.body.toString('utf8');
  }

  setBody(body: Body): void {
    this.body = body;
  }

  getHeader(key: string): HeaderValue | undefined {
    return this.headers.get(key);
  }

  /**
   * @returns the header when it holds a non-empty string
   */
  getStringHeader(key: string): string | undefined {
    const value = this.headers.get(key);
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }

  setHeader(key: string, value: HeaderValue): void {
    this.headers.set(key, value);
  }

  removeHeader(key: string): boolean {
    return this.headers.delete(key);
  }

  getHeaders(): Record<string, HeaderValue> {
    return Object.fromEntries(this.headers);
  }

  /**
   * Response produced by processing (an RPC reply, or what a consumer sends back)
   */
  getResponseBody(): Body | undefined {
    return this.hasResponse ? this.response : undefined;
  }

  setResponseBody(body: Body): void {
    this.response = body;
    this.hasResponse = true;
  }

  getError(): Error | null {
    return this.error;
  }

  setError(error: Error | null): void {
    this.error = error;
  }

  isFailed(): boolean {
    return this.error !== null;
  }

  addOnCompletion(synchronization: Synchronization): void {
    if (this.completed) {
      throw new Error('Envelope is already completed');
    }
    this.synchronizations.push(synchronization);
  }

  isCompleted(): boolean {
    return this.completed;
  }

  /**
   * Run registered completions once, in registration order: onFailure when an
   * error is recorded, onComplete otherwise. Later calls are no-ops.
   */
  async done(): Promise<void> {
    if (this.completed) {
      return;
    }
    this.completed = true;

    const failed = this.error !== null;
    for (const synchronization of this.synchronizations) {
      if (failed) {
        await synchronization.onFailure(this);
      } else {
        await synchronization.onComplete(this);
      }
    }
  }
}
