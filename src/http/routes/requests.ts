import { Router } from 'express';
import { parseAmount } from '../../chain/amount.js';
import { requireIdentity } from '../../chain/identity.js';
import { DomainError } from '../../errors/domain-error.js';
import { logger } from '../../observability/logger.js';
import type { LedgerService } from '../../runtime/ledger-service.js';
import { getCaller, parseRouteId, parseRouteIdentity, route } from '../context.js';
import { serializeBalance, serializeRequest } from '../serializers.js';

export function requestsRouter(service: LedgerService): Router {
  const router = Router();

  router.post('/requests', route('submit_request', async (req, res) => {
    const caller = getCaller(req);
    const targetAddress = requireIdentity(req.body?.targetAddress, 'targetAddress');
    const depositAmount = parseAmount(req.body?.depositAmount, 'depositAmount');

    const requestId = await service.mutate('submitRequest', host =>
      host.queue.submitRequest(caller, targetAddress, depositAmount)
    );

    res.status(201).json({ requestId });
  }));

  router.post('/requests/:id/start', route('start_work', async (req, res) => {
    const caller = getCaller(req);
    const requestId = parseRouteId(req.params.id, 'requestId');

    const request = await service.mutate('startWork', host => host.queue.startWork(caller, requestId));
    res.status(200).json(serializeRequest(request));
  }));

  router.post('/requests/:id/complete', route('complete_work', async (req, res) => {
    const caller = getCaller(req);
    const requestId = parseRouteId(req.params.id, 'requestId');
    const reportId = req.body?.reportId;
    if (typeof reportId !== 'number') {
      throw new DomainError('InvalidInput', 'reportId must be a number');
    }

    const request = await service.mutate('completeWork', host =>
      host.queue.completeWork(caller, requestId, reportId)
    );
    res.status(200).json(serializeRequest(request));
  }));

  router.post('/requests/:id/refund', route('refund_request', async (req, res) => {
    const caller = getCaller(req);
    const requestId = parseRouteId(req.params.id, 'requestId');

    const request = await service.mutate('refundRequest', host => host.queue.refundRequest(caller, requestId));
    res.status(200).json(serializeRequest(request));
  }));

  router.get('/requests/:id', route('get_request', (req, res) => {
    const requestId = parseRouteId(req.params.id, 'requestId');
    const request = service.read(host => host.queue.getRequest(requestId));
    res.status(200).json(serializeRequest(request));
  }));

  router.get('/requests', route('list_requests', (req, res) => {
    const status = req.query.status;
    if (status !== 'pending') {
      throw new DomainError('InvalidInput', 'Only status=pending listing is supported');
    }

    const ids = service.read(host => [...host.queue.listPending()]);
    logger.info('pending_listed', 'Pending requests listed', { count: ids.length });
    res.status(200).json({ ids });
  }));

  router.get('/requesters/:identity/requests', route('list_by_requester', (req, res) => {
    const requester = parseRouteIdentity(req.params.identity, 'identity');
    const ids = service.read(host => host.queue.listByRequester(requester));
    res.status(200).json({ ids });
  }));

  router.get('/balance', route('get_balance', (_req, res) => {
    const report = service.read(host => host.queue.getBalanceReport());
    res.status(200).json(serializeBalance(report));
  }));

  return router;
}
