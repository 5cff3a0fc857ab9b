import type { Clock } from './clock.js';
import type { EventSink, LedgerEvent } from '../events/types.js';
import { ReentrancyGuard } from '../concurrency/reentrancy-guard.js';

/** Anything whose state must roll back with a failed operation. */
export interface Transactional {
  /** Captures current state and returns a function that restores it. */
  checkpoint(): () => void;
}

export interface Transaction {
  readonly now: number;
  emit(event: LedgerEvent): void;
}

export interface TransactionRunnerOptions {
  component: string;
  clock: Clock;
  sink: EventSink;
  participants: Transactional[];
}

/**
 * Runs one mutating operation as an all-or-nothing step: every participant
 * is checkpointed first and restored if the body or `beforeCommit` throws.
 * Events are buffered and reach the sink only on commit.
 */
export class TransactionRunner {
  private readonly clock: Clock;
  private readonly sink: EventSink;
  private readonly participants: Transactional[];
  private readonly guard: ReentrancyGuard;

  constructor(options: TransactionRunnerOptions) {
    this.clock = options.clock;
    this.sink = options.sink;
    this.participants = options.participants;
    this.guard = new ReentrancyGuard(options.component);
  }

  run<T>(operation: string, body: (tx: Transaction) => T, beforeCommit?: () => void): T {
    this.guard.enter(operation);

    const rollbacks = this.participants.map(p => p.checkpoint());
    const events: LedgerEvent[] = [];
    const tx: Transaction = {
      now: this.clock.now(),
      emit: (event) => {
        events.push(event);
      },
    };

    try {
      const result = body(tx);
      beforeCommit?.();
      if (events.length > 0) {
        this.sink.publish({ emittedAt: tx.now, events });
      }
      return result;
    } catch (error) {
      for (const rollback of rollbacks.reverse()) {
        rollback();
      }
      throw error;
    } finally {
      this.guard.exit();
    }
  }

  isBusy(): boolean {
    return this.guard.isLocked();
  }
}
