import { Router } from 'express';
import { parseAmount } from '../../chain/amount.js';
import { requireIdentity } from '../../chain/identity.js';
import { DomainError } from '../../errors/domain-error.js';
import type { LedgerService } from '../../runtime/ledger-service.js';
import { getCaller, parseRouteIdentity, route } from '../context.js';
import { serializeConfig } from '../serializers.js';

export function adminRouter(service: LedgerService): Router {
  const router = Router();
  const custody = service.read(host => host.queue.getCustodyIdentity());

  router.get('/config', route('get_config', (_req, res) => {
    const config = service.read(host => host.queue.getConfig());
    const requestCount = service.read(host => host.queue.getRequestCount());
    res.status(200).json({ ...serializeConfig(config, custody), requestCount });
  }));

  router.put('/admin/minimum-fee', route('set_minimum_fee', async (req, res) => {
    const caller = getCaller(req);
    const amount = parseAmount(req.body?.amount, 'amount');
    const config = await service.mutate('setMinimumFee', host => host.queue.setMinimumFee(caller, amount));
    res.status(200).json(serializeConfig(config, custody));
  }));

  router.put('/admin/refund-timeout', route('set_refund_timeout', async (req, res) => {
    const caller = getCaller(req);
    const seconds = req.body?.seconds;
    if (typeof seconds !== 'number') {
      throw new DomainError('InvalidInput', 'seconds must be a number');
    }
    const config = await service.mutate('setRefundTimeout', host => host.queue.setRefundTimeout(caller, seconds));
    res.status(200).json(serializeConfig(config, custody));
  }));

  router.put('/admin/auditor', route('set_auditor', async (req, res) => {
    const caller = getCaller(req);
    const auditor = requireIdentity(req.body?.identity, 'identity');
    const config = await service.mutate('setAuditor', host => host.queue.setAuditor(caller, auditor));
    res.status(200).json(serializeConfig(config, custody));
  }));

  router.post('/admin/fee-exemptions', route('grant_fee_exemption', async (req, res) => {
    const caller = getCaller(req);
    const targetAddress = requireIdentity(req.body?.targetAddress, 'targetAddress');
    await service.mutate('grantFeeExemption', host => host.queue.grantFeeExemption(caller, targetAddress));
    res.status(200).json({ targetAddress, feeExempt: true });
  }));

  router.get('/fee-exemptions/:identity', route('get_fee_exemption', (req, res) => {
    const targetAddress = parseRouteIdentity(req.params.identity, 'identity');
    const feeExempt = service.read(host => host.queue.isFeeExempt(targetAddress));
    res.status(200).json({ targetAddress, feeExempt });
  }));

  router.post('/admin/withdraw', route('withdraw_funds', async (req, res) => {
    const caller = getCaller(req);
    const to = requireIdentity(req.body?.to, 'to');
    const amount = await service.mutate('withdrawFunds', host => host.queue.withdrawFunds(caller, to));
    res.status(200).json({ to, amount: amount.toString() });
  }));

  router.post('/admin/pause', route('pause', async (req, res) => {
    const caller = getCaller(req);
    const config = await service.mutate('pause', host => host.queue.pause(caller));
    res.status(200).json(serializeConfig(config, custody));
  }));

  router.post('/admin/unpause', route('unpause', async (req, res) => {
    const caller = getCaller(req);
    const config = await service.mutate('unpause', host => host.queue.unpause(caller));
    res.status(200).json(serializeConfig(config, custody));
  }));

  router.put('/admin/owner', route('transfer_ownership', async (req, res) => {
    const caller = getCaller(req);
    const newOwner = requireIdentity(req.body?.identity, 'identity');
    const config = await service.mutate('transferOwnership', host => host.queue.transferOwnership(caller, newOwner));
    res.status(200).json(serializeConfig(config, custody));
  }));

  router.delete('/admin/owner', route('renounce_ownership', async (req) => {
    const caller = getCaller(req);
    await service.mutate('renounceOwnership', host => host.queue.renounceOwnership(caller));
  }));

  router.post('/accounts/:identity/credit', route('credit_account', async (req, res) => {
    const caller = getCaller(req);
    const identity = parseRouteIdentity(req.params.identity, 'identity');
    const amount = parseAmount(req.body?.amount, 'amount');
    const balance = await service.mutate('creditAccount', host => {
      if (caller !== host.queue.getConfig().owner) {
        throw new DomainError('Unauthorized', 'Only the owner can credit accounts');
      }
      return host.funds.credit(identity, amount);
    });
    res.status(200).json({ identity, balance: balance.toString() });
  }));

  router.get('/accounts/:identity', route('get_account', (req, res) => {
    const identity = parseRouteIdentity(req.params.identity, 'identity');
    const balance = service.read(host => host.funds.balanceOf(identity));
    res.status(200).json({ identity, balance: balance.toString() });
  }));

  return router;
}
