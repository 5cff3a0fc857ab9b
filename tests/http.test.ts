import { beforeEach, describe, expect, it } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import type { ManualClock } from '../src/chain/clock.js';
import { createEventLog } from '../src/events/event-log.js';
import { createApp } from '../src/http/app.js';
import { metrics } from '../src/metrics/metrics.js';
import { InMemoryStateStore } from '../src/persistence/state-store.js';
import { LedgerService } from '../src/runtime/ledger-service.js';
import { ALICE, AUDITOR, OWNER, REFUND_TIMEOUT, TARGET, createHost } from './helpers.js';

const ISSUES = { critical: 0, high: 0, medium: 1, low: 2, informational: 3 };

describe('HTTP API', () => {
  let app: Express;
  let clock: ManualClock;

  beforeEach(async () => {
    metrics.reset();
    const created = createHost();
    clock = created.clock;
    const service = new LedgerService({
      host: created.host,
      stateStore: new InMemoryStateStore(),
      eventLog: createEventLog(false),
    });
    await service.initialize();
    app = createApp(service);

    await request(app).post(`/accounts/${ALICE}/credit`).set('x-caller', OWNER).send({ amount: '100' }).expect(200);
  });

  async function submit(depositAmount: string) {
    return request(app).post('/requests').set('x-caller', ALICE).send({ targetAddress: TARGET, depositAmount });
  }

  it('runs a request from submission to completion', async () => {
    const submitted = await submit('5');
    expect(submitted.status).toBe(201);
    expect(submitted.body).toEqual({ requestId: 1 });

    const fetched = await request(app).get('/requests/1');
    expect(fetched.body).toMatchObject({ id: 1, requester: ALICE, payment: '5', status: 'Pending', reportId: 0 });

    expect((await request(app).get('/requests?status=pending')).body).toEqual({ ids: [1] });

    const completed = await request(app).post('/requests/1/complete').set('x-caller', AUDITOR).send({ reportId: 42 });
    expect(completed.status).toBe(200);
    expect(completed.body).toMatchObject({ status: 'Completed', reportId: 42 });

    expect((await request(app).get('/requests?status=pending')).body).toEqual({ ids: [] });
    expect((await request(app).get(`/requesters/${ALICE}/requests`)).body).toEqual({ ids: [1] });
    expect((await request(app).get('/balance')).body).toEqual({
      custodyBalance: '5',
      collectedFees: '5',
      outstandingEscrow: '0',
      surplus: '5',
    });
    expect((await request(app).get(`/accounts/${ALICE}`)).body).toEqual({ identity: ALICE, balance: '95' });
  });

  it('refunds after the timeout', async () => {
    await submit('5');

    const early = await request(app).post('/requests/1/refund').set('x-caller', ALICE);
    expect(early.status).toBe(409);
    expect(early.body.error).toBe('TimeoutNotReached');

    clock.advance(REFUND_TIMEOUT);
    const refunded = await request(app).post('/requests/1/refund').set('x-caller', ALICE);
    expect(refunded.status).toBe(200);
    expect(refunded.body).toMatchObject({ status: 'Refunded', payment: '0' });
  });

  it('maps domain errors to status codes', async () => {
    const anonymous = await request(app).post('/requests').send({ targetAddress: TARGET, depositAmount: '5' });
    expect(anonymous.status).toBe(403);
    expect(anonymous.body).toEqual({ error: 'Unauthorized', message: 'x-caller header is required' });

    const underpaid = await submit('1');
    expect(underpaid.status).toBe(402);
    expect(underpaid.body.error).toBe('InsufficientPayment');

    expect((await request(app).get('/requests/abc')).status).toBe(400);
    expect((await request(app).get('/requests/7')).body).toEqual({
      error: 'NotFound',
      message: 'Request 7 does not exist',
    });
    expect((await request(app).get('/requests')).status).toBe(400);

    const renounce = await request(app).delete('/admin/owner').set('x-caller', OWNER);
    expect(renounce.status).toBe(405);
    expect(renounce.body.error).toBe('OperationDisabled');

    expect((await request(app).get('/unknown')).body).toEqual({ error: 'NotFound', message: 'Route not found' });
  });

  it('answers a malformed JSON body with InvalidInput', async () => {
    const response = await request(app)
      .post('/requests')
      .set('x-caller', ALICE)
      .set('content-type', 'application/json')
      .send('{bad');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'InvalidInput', message: 'Request body is not valid JSON' });
  });

  it('applies administrative changes', async () => {
    const updated = await request(app).put('/admin/minimum-fee').set('x-caller', OWNER).send({ amount: '10' });
    expect(updated.body).toMatchObject({ minimumFee: '10', owner: OWNER, auditor: AUDITOR, paused: false });

    expect((await submit('5')).status).toBe(402);

    await request(app).post('/admin/fee-exemptions').set('x-caller', OWNER).send({ targetAddress: TARGET }).expect(200);
    expect((await submit('0')).status).toBe(201);
    expect((await request(app).get(`/fee-exemptions/${TARGET}`)).body).toEqual({ targetAddress: TARGET, feeExempt: true });
    expect((await request(app).get('/config')).body).toMatchObject({ minimumFee: '10', requestCount: 1 });

    const paused = await request(app).post('/admin/pause').set('x-caller', OWNER);
    expect(paused.body.paused).toBe(true);
    expect((await submit('0')).status).toBe(503);

    const forbidden = await request(app).put('/admin/minimum-fee').set('x-caller', ALICE).send({ amount: '1' });
    expect(forbidden.status).toBe(403);
  });

  it('serves the report registry', async () => {
    const auditor = await request(app)
      .post('/registry/auditors')
      .set('x-caller', OWNER)
      .send({ identity: AUDITOR, name: 'Auditor' });
    expect(auditor.status).toBe(201);
    expect(auditor.body).toEqual({ identity: AUDITOR, name: 'Auditor', authorized: true });

    const report = { targetAddress: TARGET, ipfsHash: 'QmTestReport', score: 90, issues: ISSUES };
    const submitted = await request(app).post('/registry/audits').set('x-caller', AUDITOR).send(report);
    expect(submitted.body).toEqual({ reportId: 1 });

    const again = await request(app).post('/registry/audits').set('x-caller', AUDITOR).send(report);
    expect(again.status).toBe(429);

    expect((await request(app).get(`/registry/contracts/${TARGET}/latest`)).body).toMatchObject({
      id: 1,
      score: 90,
      issues: ISSUES,
    });
    expect((await request(app).get('/registry/stats')).body).toEqual({
      auditCount: 1,
      auditedContractsCount: 1,
      auditorCount: 1,
    });
  });

  it('reports health, events and metrics', async () => {
    await submit('5');

    expect((await request(app).get('/health')).body).toEqual({ status: 'ok', storage: 'memory' });

    const events = await request(app).get('/events?limit=1');
    expect(events.body.events).toHaveLength(1);
    expect(events.body.events[0].event).toEqual({
      type: 'RequestSubmitted',
      requestId: 1,
      requester: ALICE,
      targetAddress: TARGET,
      depositAmount: '5',
    });

    const snapshot = await request(app).get('/metrics');
    expect(snapshot.status).toBe(200);
    expect(snapshot.body.funds).toMatchObject({ deposited: '5', custodyBalance: '5' });
    expect(snapshot.body.faults).toEqual({ enabled: false, config: null });
  });
});
