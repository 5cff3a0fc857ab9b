import { Router } from 'express';
import { requireIdentity } from '../../chain/identity.js';
import { DomainError } from '../../errors/domain-error.js';
import type { LedgerService } from '../../runtime/ledger-service.js';
import { DISCLAIMER, type IssueCounts } from '../../registry/types.js';
import { getCaller, parseRouteId, parseRouteIdentity, route } from '../context.js';

function readIssues(value: unknown): IssueCounts {
  if (typeof value !== 'object' || value === null) {
    throw new DomainError('InvalidInput', 'issues must be an object');
  }
  const count = (field: keyof IssueCounts): number => {
    const raw: unknown = field in value ? Reflect.get(value, field) : 0;
    if (typeof raw !== 'number') {
      throw new DomainError('InvalidInput', `issues.${field} must be a number`, { field });
    }
    return raw;
  };
  return {
    critical: count('critical'),
    high: count('high'),
    medium: count('medium'),
    low: count('low'),
    informational: count('informational'),
  };
}

export function registryRouter(service: LedgerService): Router {
  const router = Router();

  router.get('/registry/disclaimer', (_req, res) => {
    res.status(200).json({ disclaimer: DISCLAIMER });
  });

  router.post('/registry/auditors', route('authorize_auditor', async (req, res) => {
    const caller = getCaller(req);
    const auditor = requireIdentity(req.body?.identity, 'identity');
    const name = req.body?.name;
    if (typeof name !== 'string') {
      throw new DomainError('InvalidInput', 'name must be a string');
    }
    const info = await service.mutate('authorizeAuditor', host => host.registry.authorizeAuditor(caller, auditor, name));
    res.status(201).json(info);
  }));

  router.delete('/registry/auditors/:identity', route('revoke_auditor', async (req, res) => {
    const caller = getCaller(req);
    const auditor = parseRouteIdentity(req.params.identity, 'identity');
    await service.mutate('revokeAuditor', host => host.registry.revokeAuditor(caller, auditor));
    res.status(204).end();
  }));

  router.get('/registry/auditors/:identity', route('get_auditor', (req, res) => {
    const auditor = parseRouteIdentity(req.params.identity, 'identity');
    res.status(200).json(service.read(host => host.registry.getAuditor(auditor)));
  }));

  router.post('/registry/audits', route('submit_audit', async (req, res) => {
    const caller = getCaller(req);
    const targetAddress = requireIdentity(req.body?.targetAddress, 'targetAddress');
    const ipfsHash = req.body?.ipfsHash;
    const score = req.body?.score;
    if (typeof ipfsHash !== 'string' || typeof score !== 'number') {
      throw new DomainError('InvalidInput', 'ipfsHash must be a string and score a number');
    }
    const issues = readIssues(req.body?.issues);

    const reportId = await service.mutate('submitAudit', host =>
      host.registry.submitAudit(caller, { targetAddress, ipfsHash, score, issues })
    );
    res.status(201).json({ reportId });
  }));

  router.get('/registry/audits/:id', route('get_audit', (req, res) => {
    const reportId = parseRouteId(req.params.id, 'reportId');
    res.status(200).json(service.read(host => host.registry.getAudit(reportId)));
  }));

  router.get('/registry/contracts/:identity/audits', route('list_contract_audits', (req, res) => {
    const target = parseRouteIdentity(req.params.identity, 'identity');
    res.status(200).json({ ids: service.read(host => host.registry.getAuditsForContract(target)) });
  }));

  router.get('/registry/contracts/:identity/latest', route('get_latest_audit', (req, res) => {
    const target = parseRouteIdentity(req.params.identity, 'identity');
    res.status(200).json(service.read(host => host.registry.getLatestAudit(target)));
  }));

  router.get('/registry/stats', route('registry_stats', (_req, res) => {
    res.status(200).json(service.read(host => host.registry.getStats()));
  }));

  return router;
}
