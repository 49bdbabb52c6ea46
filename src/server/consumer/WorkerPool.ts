import { errorMessage } from '../../core/types/Errors';
import type { Logger } from '../../core/types/Logger';

export interface Worker {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  /**
   * False once the worker has stopped or halted on its own
   */
  isActive(): boolean;
}

/**
 * Fixed-size group of workers owned by a single component.
 *
 * start() launches all of them; if any fails, the ones already running are
 * stopped again and the first failure is thrown. stop() stops every worker and
 * waits for all of them, whatever the individual outcome. A started pool counts
 * as running while at least one worker is still active.
 */
export class WorkerPool<W extends Worker> {
  private readonly workers: W[];
  private running = false;

  constructor(
    size: number,
    factory: (index: number) => W,
    private readonly logger: Logger
  ) {
    this.workers = Array.from({ length: size }, (_, index) => factory(index));
  }

  get size(): number {
    return this.workers.length;
  }

  getWorkers(): readonly W[] {
    return this.workers;
  }

  isRunning(): boolean {
    return this.running && this.workers.some((worker) => worker.isActive());
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    const results = await Promise.allSettled(this.workers.map((worker) => worker.start()));
    const failure = results.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );

    if (failure) {
      this.logger.error(
        'Worker pool failed to start',
        failure.reason instanceof Error ? failure.reason : undefined,
        { size: this.workers.length }
      );
      await this.stopAll();
      throw failure.reason;
    }

    this.running = true;
    this.logger.debug('Worker pool started', { size: this.workers.length });
  }

  async stop(): Promise<void> {
    this.running = false;
    await this.stopAll();
    this.logger.debug('Worker pool stopped', { size: this.workers.length });
  }

  private async stopAll(): Promise<void> {
    const results = await Promise.allSettled(this.workers.map((worker) => worker.stop()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn(`Worker ${this.workers[index].name} failed to stop`, {
          error: errorMessage(result.reason),
        });
      }
    });
  }
}
