import { afterEach, describe, expect, it } from 'vitest';
import { createEventLog } from '../src/events/event-log.js';
import { faultController } from '../src/faults/controller.js';
import { FaultInjectionError } from '../src/faults/types.js';
import { ALICE, TARGET } from './helpers.js';

describe('HybridEventLog (memory)', () => {
  afterEach(() => {
    faultController.reset();
  });

  it('numbers events and serializes amounts', async () => {
    const log = createEventLog(false);

    const records = await log.append({
      emittedAt: 10,
      events: [
        { type: 'RequestSubmitted', requestId: 1, requester: ALICE, targetAddress: TARGET, depositAmount: 5n },
        { type: 'WorkCompleted', requestId: 1, reportId: 42 },
      ],
    });

    expect(records).toEqual([
      {
        sequence: 1,
        emittedAt: 10,
        event: { type: 'RequestSubmitted', requestId: 1, requester: ALICE, targetAddress: TARGET, depositAmount: '5' },
      },
      { sequence: 2, emittedAt: 10, event: { type: 'WorkCompleted', requestId: 1, reportId: 42 } },
    ]);
  });

  it('returns the newest events first and keeps only the latest', async () => {
    const log = createEventLog(false, 2);
    for (const requestId of [1, 2, 3]) {
      await log.append({ emittedAt: requestId, events: [{ type: 'WorkStarted', requestId }] });
    }

    const recent = await log.getRecent(10);

    expect(recent.map(r => r.sequence)).toEqual([3, 2]);
    expect(await log.getStats()).toEqual({ count: 2, maxSize: 2, lastSequence: 3, type: 'memory' });
  });

  it('surfaces injected write failures', async () => {
    faultController.initialize({ FAULTS_ENABLED: 'true', FAULT_EVENT_WRITE_FAILURE: 'always' });
    const log = createEventLog(false);

    await expect(log.append({ emittedAt: 1, events: [{ type: 'WorkStarted', requestId: 1 }] })).rejects.toBeInstanceOf(
      FaultInjectionError
    );
    expect(await log.getRecent()).toEqual([]);
  });
});
