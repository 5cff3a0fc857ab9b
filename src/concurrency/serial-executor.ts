import { logger } from '../observability/logger.js';

export interface ExecutorStats {
  queued: number;
  completed: number;
  failed: number;
  peakQueued: number;
}

/**
 * Single-writer lane: tasks run one at a time in submission order, so the
 * commit, the snapshot write and the event append of one mutation finish
 * before the next mutation starts.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private queued: number = 0;
  private peakQueued: number = 0;
  private completed: number = 0;
  private failed: number = 0;

  constructor(private readonly name: string) {}

  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    if (this.queued > this.peakQueued) {
      this.peakQueued = this.queued;
    }

    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.queued--;
        this.completed++;
      },
      (error: unknown) => {
        this.queued--;
        this.failed++;
        logger.info('serial_task_failed', 'Serialized task rejected', {
          executor: this.name,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    );
    return result;
  }

  /** Resolves when every task submitted so far has settled. */
  async idle(): Promise<void> {
    await this.tail;
  }

  getStats(): ExecutorStats {
    return {
      queued: this.queued,
      completed: this.completed,
      failed: this.failed,
      peakQueued: this.peakQueued,
    };
  }
}
