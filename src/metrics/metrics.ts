import type { DomainErrorCode } from '../errors/domain-error.js';
import type { BalanceReport } from '../requests/types.js';
import type { ExecutorStats } from '../concurrency/serial-executor.js';
import type { EventLogStats } from '../events/event-log.js';

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  storage: {
    mode: 'memory' | 'durable' | 'degraded';
    snapshotWrites: number;
    snapshotWriteFailures: number;
  };
  operations: {
    total: number;
    succeeded: number;
    failed: number;
    byOperation: Record<string, number>;
    failuresByCode: Partial<Record<DomainErrorCode | 'Internal', number>>;
  };
  funds: {
    deposited: string;
    refunded: string;
    withdrawn: string;
    custodyBalance: string;
    outstandingEscrow: string;
    collectedFees: string;
    surplus: string;
  };
  executor: ExecutorStats;
  events: EventLogStats;
}

class Metrics {
  private startTime: Date = new Date();

  private counters = {
    operationsTotal: 0,
    operationsSucceeded: 0,
    operationsFailed: 0,
    snapshotWrites: 0,
    snapshotWriteFailures: 0,
    deposited: 0n,
    refunded: 0n,
    withdrawn: 0n,
  };

  private byOperation: Map<string, number> = new Map();
  private failuresByCode: Map<DomainErrorCode | 'Internal', number> = new Map();

  recordOperation(operation: string): void {
    this.counters.operationsTotal++;
    this.counters.operationsSucceeded++;
    this.byOperation.set(operation, (this.byOperation.get(operation) ?? 0) + 1);
  }

  recordFailure(operation: string, code: DomainErrorCode | 'Internal'): void {
    this.counters.operationsTotal++;
    this.counters.operationsFailed++;
    this.failuresByCode.set(code, (this.failuresByCode.get(code) ?? 0) + 1);
    this.byOperation.set(`${operation}:failed`, (this.byOperation.get(`${operation}:failed`) ?? 0) + 1);
  }

  recordDeposit(amount: bigint): void {
    this.counters.deposited += amount;
  }

  recordRefund(amount: bigint): void {
    this.counters.refunded += amount;
  }

  recordWithdrawal(amount: bigint): void {
    this.counters.withdrawn += amount;
  }

  recordSnapshotWrite(ok: boolean): void {
    if (ok) {
      this.counters.snapshotWrites++;
    } else {
      this.counters.snapshotWriteFailures++;
    }
  }

  reset(): void {
    this.startTime = new Date();
    this.counters = {
      operationsTotal: 0,
      operationsSucceeded: 0,
      operationsFailed: 0,
      snapshotWrites: 0,
      snapshotWriteFailures: 0,
      deposited: 0n,
      refunded: 0n,
      withdrawn: 0n,
    };
    this.byOperation.clear();
    this.failuresByCode.clear();
  }

  snapshot(
    storageMode: MetricsSnapshot['storage']['mode'],
    balances: BalanceReport,
    executor: ExecutorStats,
    events: EventLogStats
  ): MetricsSnapshot {
    const uptimeMs = Date.now() - this.startTime.getTime();

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds: Math.floor(uptimeMs / 1000),
      storage: {
        mode: storageMode,
        snapshotWrites: this.counters.snapshotWrites,
        snapshotWriteFailures: this.counters.snapshotWriteFailures,
      },
      operations: {
        total: this.counters.operationsTotal,
        succeeded: this.counters.operationsSucceeded,
        failed: this.counters.operationsFailed,
        byOperation: Object.fromEntries(this.byOperation),
        failuresByCode: Object.fromEntries(this.failuresByCode),
      },
      funds: {
        deposited: this.counters.deposited.toString(),
        refunded: this.counters.refunded.toString(),
        withdrawn: this.counters.withdrawn.toString(),
        custodyBalance: balances.custodyBalance.toString(),
        outstandingEscrow: balances.outstandingEscrow.toString(),
        collectedFees: balances.collectedFees.toString(),
        surplus: balances.surplus.toString(),
      },
      executor,
      events,
    };
  }
}

export const metrics = new Metrics();
