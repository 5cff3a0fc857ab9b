import { isDomainError } from '../errors/domain-error.js';
import type { HybridEventLog } from '../events/event-log.js';
import type { EventBatch } from '../events/types.js';
import { SerialExecutor, type ExecutorStats } from '../concurrency/serial-executor.js';
import { metrics } from '../metrics/metrics.js';
import { logger } from '../observability/logger.js';
import type { StateStore } from '../persistence/types.js';
import type { LedgerHost } from './ledger-host.js';

export interface LedgerServiceOptions {
  host: LedgerHost;
  stateStore: StateStore;
  eventLog: HybridEventLog;
}

/**
 * Front door for every caller. Mutations go through one serial lane that
 * commits, appends the committed events and persists a snapshot before the
 * next mutation starts. Reads run directly against the host.
 */
export class LedgerService {
  readonly host: LedgerHost;
  readonly eventLog: HybridEventLog;
  private readonly stateStore: StateStore;
  private readonly executor: SerialExecutor;

  constructor(options: LedgerServiceOptions) {
    this.host = options.host;
    this.stateStore = options.stateStore;
    this.eventLog = options.eventLog;
    this.executor = new SerialExecutor('ledger');
  }

  async initialize(): Promise<void> {
    const snapshot = await this.stateStore.load();
    if (snapshot) {
      this.host.restore(snapshot);
      logger.info('ledger_restored', 'Ledger state restored from snapshot', {
        savedAt: snapshot.savedAt,
        store: this.stateStore.getType(),
        requestCount: this.host.queue.getRequestCount(),
        auditCount: this.host.registry.getAuditCount(),
      });
    } else {
      logger.info('ledger_initialized', 'Starting from empty ledger state', {
        store: this.stateStore.getType(),
      });
    }
    await this.eventLog.initialize();
  }

  mutate<T>(operation: string, action: (host: LedgerHost) => T): Promise<T> {
    return this.executor.run(async () => {
      let result: T;
      try {
        result = action(this.host);
      } catch (error) {
        metrics.recordFailure(operation, isDomainError(error) ? error.code : 'Internal');
        // A failed outer call can still contain committed inner calls.
        await this.flush(operation, false);
        throw error;
      }

      metrics.recordOperation(operation);
      await this.flush(operation, true);
      return result;
    });
  }

  read<T>(query: (host: LedgerHost) => T): T {
    return query(this.host);
  }

  async idle(): Promise<void> {
    await this.executor.idle();
  }

  getExecutorStats(): ExecutorStats {
    return this.executor.getStats();
  }

  getStoreType(): 'memory' | 'redis' {
    return this.stateStore.getType();
  }

  private async flush(operation: string, committed: boolean): Promise<void> {
    const batches = this.host.events.drain();
    if (!committed && batches.length === 0) return;

    for (const batch of batches) {
      this.recordFundMovements(batch);
      try {
        await this.eventLog.append(batch);
      } catch (error) {
        logger.error('event_append_failed', 'Committed events were not recorded in the event log', {
          operation,
          count: batch.events.length,
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    }

    try {
      await this.stateStore.save(this.host.snapshot());
      metrics.recordSnapshotWrite(true);
    } catch (error) {
      metrics.recordSnapshotWrite(false);
      logger.error('snapshot_write_failed', 'Committed state was not persisted', {
        operation,
        store: this.stateStore.getType(),
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private recordFundMovements(batch: EventBatch): void {
    for (const event of batch.events) {
      switch (event.type) {
        case 'RequestSubmitted':
          metrics.recordDeposit(event.depositAmount);
          break;
        case 'RequestRefunded':
          metrics.recordRefund(event.amount);
          break;
        case 'FundsWithdrawn':
          metrics.recordWithdrawal(event.amount);
          break;
      }
    }
  }
}
