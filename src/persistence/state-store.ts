import type { StateStore } from './types.js';
import { parseSnapshot, type LedgerSnapshot } from './snapshot.js';
import { getRedisClient, isRedisHealthy } from './redis-client.js';
import { logger } from '../observability/logger.js';
import { maybeInjectFault } from '../faults/injector.js';

const REDIS_KEY = 'ledger:snapshot';

export class InMemoryStateStore implements StateStore {
  private raw: string | null = null;

  async load(): Promise<LedgerSnapshot | null> {
    return this.raw ? parseSnapshot(this.raw) : null;
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    maybeInjectFault('SNAPSHOT_WRITE_FAILURE');
    this.raw = JSON.stringify(snapshot);
  }

  getType(): 'memory' {
    return 'memory';
  }
}

export class RedisStateStore implements StateStore {
  async load(): Promise<LedgerSnapshot | null> {
    const redis = getRedisClient();

    if (!redis || !isRedisHealthy()) {
      logger.warn('state_store_degraded', 'Redis unavailable, starting from empty state');
      return null;
    }

    const raw = await redis.get(REDIS_KEY);
    return raw ? parseSnapshot(raw) : null;
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    maybeInjectFault('SNAPSHOT_WRITE_FAILURE');

    const redis = getRedisClient();

    if (!redis || !isRedisHealthy()) {
      logger.warn('state_store_degraded', 'Redis unavailable, snapshot not persisted', {
        savedAt: snapshot.savedAt,
      });
      return;
    }

    await redis.set(REDIS_KEY, JSON.stringify(snapshot));
  }

  getType(): 'redis' {
    return 'redis';
  }
}

export function createStateStore(useRedis: boolean): StateStore {
  if (useRedis) {
    logger.info('state_store_initialization', 'Using Redis-backed state store');
    return new RedisStateStore();
  }
  logger.info('state_store_initialization', 'Using in-memory state store');
  return new InMemoryStateStore();
}
