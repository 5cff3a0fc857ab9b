import { systemClock, type Clock } from '../chain/clock.js';
import { InMemoryFundsLedger } from '../chain/funds.js';
import type { Identity } from '../chain/identity.js';
import { PendingEventSink } from '../events/pending-sink.js';
import { AuditRequestQueue } from '../requests/queue.js';
import { ReportRegistry } from '../registry/report-registry.js';
import { logger } from '../observability/logger.js';
import type { QueueConfig } from '../requests/types.js';
import {
  SNAPSHOT_VERSION,
  deserializeQueueState,
  deserializeRegistryState,
  serializeQueueState,
  serializeRegistryState,
  type LedgerSnapshot,
} from '../persistence/snapshot.js';

export interface LedgerHostOptions {
  owner: Identity;
  auditor: Identity;
  custody: Identity;
  minimumFee: bigint;
  refundTimeoutSeconds: number;
  registryCooldownSeconds: number;
  feeExemptTargets: Identity[];
  clock?: Clock;
}

/**
 * The execution environment both components live in: one clock, one set of
 * native balances and one event stream.
 */
export class LedgerHost {
  readonly clock: Clock;
  readonly funds: InMemoryFundsLedger;
  readonly events: PendingEventSink;
  readonly queue: AuditRequestQueue;
  readonly registry: ReportRegistry;
  private readonly options: LedgerHostOptions;

  constructor(options: LedgerHostOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.funds = new InMemoryFundsLedger();
    this.events = new PendingEventSink();
    this.queue = new AuditRequestQueue({
      custody: options.custody,
      owner: options.owner,
      auditor: options.auditor,
      minimumFee: options.minimumFee,
      refundTimeoutSeconds: options.refundTimeoutSeconds,
      feeExemptTargets: options.feeExemptTargets,
      funds: this.funds,
      clock: this.clock,
      events: this.events,
    });
    this.registry = new ReportRegistry({
      owner: options.owner,
      clock: this.clock,
      events: this.events,
      cooldownSeconds: options.registryCooldownSeconds,
    });
  }

  snapshot(): LedgerSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      savedAt: new Date().toISOString(),
      queue: serializeQueueState(this.queue.exportState()),
      registry: serializeRegistryState(this.registry.exportState()),
      balances: this.funds.snapshot(),
    };
  }

  /**
   * Replaces all state with the snapshot. Restored configuration wins over
   * the configured one; returns the names of the settings it overrode.
   */
  restore(snapshot: LedgerSnapshot): string[] {
    const queueState = deserializeQueueState(snapshot.queue);
    const registryState = deserializeRegistryState(snapshot.registry);

    this.queue.importState(queueState);
    this.registry.importState(registryState);
    this.funds.restore(snapshot.balances);

    const overridden = this.configDrift(queueState.config, queueState.feeExempt);
    if (overridden.length > 0) {
      logger.warn('config_overridden_by_snapshot', 'Restored configuration differs from settings', {
        overridden,
        owner: queueState.config.owner,
        auditor: queueState.config.auditor,
        minimumFee: queueState.config.minimumFee,
        refundTimeoutSeconds: queueState.config.refundTimeoutSeconds,
      });
    }
    return overridden;
  }

  private configDrift(config: QueueConfig, feeExempt: ReadonlySet<Identity>): string[] {
    const drift: string[] = [];
    if (config.owner !== this.options.owner) drift.push('owner');
    if (config.auditor !== this.options.auditor) drift.push('auditor');
    if (config.minimumFee !== this.options.minimumFee) drift.push('minimumFee');
    if (config.refundTimeoutSeconds !== this.options.refundTimeoutSeconds) drift.push('refundTimeoutSeconds');
    if (this.options.feeExemptTargets.some(target => !feeExempt.has(target))) drift.push('feeExemptTargets');
    return drift;
  }
}
