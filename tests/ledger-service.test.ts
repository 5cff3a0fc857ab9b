import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createEventLog } from '../src/events/event-log.js';
import { faultController } from '../src/faults/controller.js';
import { metrics } from '../src/metrics/metrics.js';
import { SnapshotFormatError, parseSnapshot } from '../src/persistence/snapshot.js';
import { InMemoryStateStore } from '../src/persistence/state-store.js';
import { LedgerService } from '../src/runtime/ledger-service.js';
import { ALICE, AUDITOR, CUSTODY, OWNER, REFUND_TIMEOUT, TARGET, createHost } from './helpers.js';

function createService() {
  const { host, clock } = createHost();
  const stateStore = new InMemoryStateStore();
  const service = new LedgerService({ host, stateStore, eventLog: createEventLog(false) });
  return { host, clock, stateStore, service };
}

describe('LedgerService', () => {
  beforeEach(() => {
    metrics.reset();
  });

  afterEach(() => {
    faultController.reset();
  });

  it('records committed events and persists a snapshot', async () => {
    const { host, service, stateStore } = createService();
    await service.initialize();
    host.funds.credit(ALICE, 20n);

    const id = await service.mutate('submitRequest', h => h.queue.submitRequest(ALICE, TARGET, 5n));

    expect(id).toBe(1);
    const events = await service.eventLog.getRecent();
    expect(events.map(e => e.event.type)).toEqual(['RequestSubmitted']);

    const snapshot = await stateStore.load();
    expect(snapshot?.queue.requests).toEqual([
      {
        id: 1,
        requester: ALICE,
        targetAddress: TARGET,
        payment: '5',
        status: 'Pending',
        requestedAt: host.clock.now(),
        completedAt: 0,
        reportId: 0,
      },
    ]);
    expect(snapshot?.balances).toEqual({ [ALICE]: '15', [CUSTODY]: '5' });
  });

  it('restores a host from the stored snapshot', async () => {
    const first = createService();
    first.host.funds.credit(ALICE, 20n);
    await first.service.mutate('submitRequest', h => h.queue.submitRequest(ALICE, TARGET, 5n));
    await first.service.mutate('grantFeeExemption', h => h.queue.grantFeeExemption(OWNER, TARGET));
    await first.service.mutate('authorizeAuditor', h => h.registry.authorizeAuditor(OWNER, AUDITOR, 'Auditor'));

    const { host } = createHost();
    const restored = new LedgerService({ host, stateStore: first.stateStore, eventLog: createEventLog(false) });
    await restored.initialize();

    expect(host.queue.getRequest(1).payment).toBe(5n);
    expect(host.queue.listByRequester(ALICE)).toEqual([1]);
    expect(host.queue.isFeeExempt(TARGET)).toBe(true);
    expect(host.queue.getCollectedFees()).toBe(5n);
    expect(host.funds.balanceOf(CUSTODY)).toBe(5n);
    expect(host.registry.isAuditor(AUDITOR)).toBe(true);
  });

  it('counts failures without recording events', async () => {
    const { service } = createService();

    await expect(
      service.mutate('submitRequest', h => h.queue.submitRequest(ALICE, TARGET, 1n))
    ).rejects.toMatchObject({ code: 'InsufficientPayment' });

    expect(await service.eventLog.getRecent()).toEqual([]);
    const snapshot = metrics.snapshot('memory', service.host.queue.getBalanceReport(), service.getExecutorStats(), await service.eventLog.getStats());
    expect(snapshot.operations).toEqual({
      total: 1,
      succeeded: 0,
      failed: 1,
      byOperation: { 'submitRequest:failed': 1 },
      failuresByCode: { InsufficientPayment: 1 },
    });
  });

  it('tracks fund movements in metrics', async () => {
    const { host, clock, service } = createService();
    host.funds.credit(ALICE, 20n);
    await service.mutate('submitRequest', h => h.queue.submitRequest(ALICE, TARGET, 5n));
    await service.mutate('submitRequest', h => h.queue.submitRequest(ALICE, TARGET, 6n));
    clock.advance(REFUND_TIMEOUT);
    await service.mutate('refundRequest', h => h.queue.refundRequest(ALICE, 1));
    await service.mutate('withdrawFunds', h => h.queue.withdrawFunds(OWNER, OWNER));

    const snapshot = metrics.snapshot('memory', host.queue.getBalanceReport(), service.getExecutorStats(), await service.eventLog.getStats());

    expect(snapshot.funds).toEqual({
      deposited: '11',
      refunded: '5',
      withdrawn: '6',
      custodyBalance: '0',
      outstandingEscrow: '6',
      collectedFees: '6',
      surplus: '-6',
    });
  });

  it('turns an injected payout failure into TransferFailed', async () => {
    const { host, clock, service } = createService();
    host.funds.credit(ALICE, 5n);
    await service.mutate('submitRequest', h => h.queue.submitRequest(ALICE, TARGET, 5n));
    clock.advance(REFUND_TIMEOUT);
    faultController.initialize({ FAULTS_ENABLED: 'true', FAULT_PAYOUT_FAILURE: 'always' });

    await expect(service.mutate('refundRequest', h => h.queue.refundRequest(ALICE, 1))).rejects.toMatchObject({
      code: 'TransferFailed',
      detail: { requestId: 1, cause: 'FaultInjectionError' },
    });
    expect(host.queue.getRequest(1).status).toBe('Pending');
  });

  it('keeps the committed result when the snapshot write fails', async () => {
    const { host, service, stateStore } = createService();
    host.funds.credit(ALICE, 5n);
    faultController.initialize({ FAULTS_ENABLED: 'true', FAULT_SNAPSHOT_WRITE_FAILURE: 'always' });

    await expect(service.mutate('submitRequest', h => h.queue.submitRequest(ALICE, TARGET, 5n))).resolves.toBe(1);

    expect(host.queue.getRequestCount()).toBe(1);
    expect(await stateStore.load()).toBeNull();
    const snapshot = metrics.snapshot('memory', host.queue.getBalanceReport(), service.getExecutorStats(), await service.eventLog.getStats());
    expect(snapshot.storage).toEqual({ mode: 'memory', snapshotWrites: 0, snapshotWriteFailures: 1 });
  });

  it('rejects snapshots of another version', () => {
    expect(() => parseSnapshot(JSON.stringify({ version: 2, queue: {}, registry: {}, balances: {} }))).toThrow(
      SnapshotFormatError
    );
  });

  it('rejects snapshots whose sections are malformed', () => {
    const { host } = createHost();
    const valid = host.snapshot();

    expect(JSON.parse(JSON.stringify(parseSnapshot(JSON.stringify(valid))))).toEqual(JSON.parse(JSON.stringify(valid)));
    expect(() => parseSnapshot('{bad')).toThrow(SnapshotFormatError);
    expect(() => parseSnapshot(JSON.stringify({ ...valid, queue: { ...valid.queue, requests: 'x' } }))).toThrow(
      'Snapshot queue section is malformed'
    );
    expect(() => parseSnapshot(JSON.stringify({ ...valid, registry: { audits: [] } }))).toThrow(
      'Snapshot registry section is malformed'
    );
    expect(() => parseSnapshot(JSON.stringify({ ...valid, balances: { [ALICE]: 5 } }))).toThrow(
      'Snapshot balances section is malformed'
    );
  });

  it('reports settings that the restored snapshot overrides', () => {
    const { host: original } = createHost();
    original.queue.setMinimumFee(OWNER, 8n);
    const { host } = createHost({ feeExemptTargets: [TARGET] });

    expect(host.restore(original.snapshot())).toEqual(['minimumFee', 'feeExemptTargets']);
    expect(host.queue.getConfig().minimumFee).toBe(8n);
    expect(host.queue.isFeeExempt(TARGET)).toBe(false);

    const { host: matching } = createHost({ minimumFee: 8n });
    expect(matching.restore(original.snapshot())).toEqual([]);
  });
});
