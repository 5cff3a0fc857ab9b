import { Router } from 'express';
import { faultController } from '../../faults/controller.js';
import { metrics } from '../../metrics/metrics.js';
import { logger } from '../../observability/logger.js';
import { storageMode } from '../../persistence/redis-client.js';
import type { LedgerService } from '../../runtime/ledger-service.js';

export function opsRouter(service: LedgerService): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', storage: storageMode() });
  });

  router.get('/metrics', async (_req, res) => {
    try {
      const balances = service.read(host => host.queue.getBalanceReport());
      const events = await service.eventLog.getStats();
      const snapshot = metrics.snapshot(storageMode(), balances, service.getExecutorStats(), events);

      res.status(200).json({
        ...snapshot,
        faults: {
          enabled: faultController.isEnabled(),
          config: faultController.isEnabled() ? faultController.getConfig() : null,
        },
      });
    } catch (error) {
      logger.error('metrics_error', 'Failed to generate metrics snapshot', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      res.status(500).json({ error: 'Internal', message: 'Failed to generate metrics' });
    }
  });

  router.get('/events', async (req, res) => {
    try {
      const limit = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) || 50 : 50;
      const actualLimit = Math.min(Math.max(1, limit), 100);

      const events = await service.eventLog.getRecent(actualLimit);
      const stats = await service.eventLog.getStats();

      res.status(200).json({
        events,
        meta: {
          count: events.length,
          limit: actualLimit,
          total: stats.count,
          maxSize: stats.maxSize,
          lastSequence: stats.lastSequence,
          storageType: stats.type,
        },
      });
    } catch (error) {
      logger.error('events_error', 'Failed to retrieve event history', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      res.status(500).json({ error: 'Internal', message: 'Failed to retrieve events' });
    }
  });

  return router;
}
