import type { EventBatch, SerializedEventRecord } from './types.js';
import { serializeEventRecord } from './serialize.js';
import { getRedisClient, isRedisHealthy } from '../persistence/redis-client.js';
import { logger } from '../observability/logger.js';
import { maybeInjectFault } from '../faults/injector.js';
import { FaultInjectionError } from '../faults/types.js';

const DEFAULT_MAX_EVENTS = 500;
const REDIS_KEY = 'ledger:events';

export interface EventLogStats {
  count: number;
  maxSize: number;
  lastSequence: number;
  type: 'memory' | 'redis';
}

class InMemoryEventLog {
  private records: SerializedEventRecord[] = [];

  constructor(private readonly maxSize: number) {}

  append(records: SerializedEventRecord[]): void {
    this.records.push(...records);
    
    if (this.records.length > this.maxSize) {
      this.records.splice(0, this.records.length - this.maxSize);
    }
  }

  getRecent(limit: number = 50): SerializedEventRecord[] {
    const actualLimit = Math.min(limit, this.records.length);
    return this.records.slice(this.records.length - actualLimit).reverse();
  }

  getStats(lastSequence: number): EventLogStats {
    return {
      count: this.records.length,
      maxSize: this.maxSize,
      lastSequence,
      type: 'memory',
    };
  }
}

class RedisEventLog {
  constructor(private readonly maxSize: number) {}

  async append(records: SerializedEventRecord[]): Promise<void> {
    const redis = getRedisClient();
    
    if (!redis || !isRedisHealthy()) {
      logger.warn('event_log_degraded', 'Redis unavailable, events not persisted', {
        count: records.length,
      });
      return;
    }

    try {
      await redis.lpush(REDIS_KEY, ...records.map(r => JSON.stringify(r)));
      await redis.ltrim(REDIS_KEY, 0, this.maxSize - 1);
    } catch (error) {
      logger.error('event_log_error', 'Failed to append events to Redis', {
        error: error instanceof Error ? error.message : 'Unknown error',
        count: records.length,
      });
    }
  }

  async getRecent(limit: number = 50): Promise<SerializedEventRecord[]> {
    const redis = getRedisClient();
    
    if (!redis || !isRedisHealthy()) {
      return [];
    }

    try {
      const actualLimit = Math.min(limit, this.maxSize);
      const serialized = await redis.lrange(REDIS_KEY, 0, actualLimit - 1);
      return serialized.map(s => {
        const parsed: SerializedEventRecord = JSON.parse(s);
        return parsed;
      });
    } catch (error) {
      logger.error('event_log_error', 'Failed to read events from Redis', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return [];
    }
  }

  async getLastSequence(): Promise<number> {
    const [latest] = await this.getRecent(1);
    return latest?.sequence ?? 0;
  }

  async getStats(lastSequence: number): Promise<EventLogStats> {
    const redis = getRedisClient();
    
    if (!redis || !isRedisHealthy()) {
      return { count: 0, maxSize: this.maxSize, lastSequence, type: 'redis' };
    }

    try {
      const count = await redis.llen(REDIS_KEY);
      return { count, maxSize: this.maxSize, lastSequence, type: 'redis' };
    } catch (error) {
      logger.warn('event_log_error', 'Failed to read event log length from Redis', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return { count: 0, maxSize: this.maxSize, lastSequence, type: 'redis' };
    }
  }
}

/**
 * Recent ledger events, numbered in commit order. Always kept in memory;
 * mirrored to a capped Redis list when Redis is configured.
 */
export class HybridEventLog {
  private inMemory: InMemoryEventLog;
  private redis: RedisEventLog;
  private useRedis: boolean;
  private sequence: number = 0;

  constructor(useRedis: boolean, maxSize: number = DEFAULT_MAX_EVENTS) {
    this.inMemory = new InMemoryEventLog(maxSize);
    this.redis = new RedisEventLog(maxSize);
    this.useRedis = useRedis;
  }

  async initialize(): Promise<void> {
    if (this.useRedis && isRedisHealthy()) {
      this.sequence = await this.redis.getLastSequence();
      logger.info('event_log_initialized', 'Event sequence resumed from Redis', {
        lastSequence: this.sequence,
      });
    }
  }

  async append(batch: EventBatch): Promise<SerializedEventRecord[]> {
    const records = batch.events.map(event => serializeEventRecord({
      sequence: ++this.sequence,
      emittedAt: batch.emittedAt,
      event,
    }));

    try {
      maybeInjectFault('EVENT_WRITE_FAILURE');
      this.inMemory.append(records);
      
      if (this.useRedis) {
        await this.redis.append(records);
      }
    } catch (error) {
      if (error instanceof FaultInjectionError) {
        logger.warn('fault_handling', 'Handling injected fault in event log', {
          faultCode: error.faultCode,
        });
        throw error;
      }
      
      logger.error('event_log_append_error', 'Failed to append events', {
        error: error instanceof Error ? error.message : 'Unknown error',
        count: records.length,
      });
    }

    return records;
  }

  async getRecent(limit: number = 50): Promise<SerializedEventRecord[]> {
    if (this.useRedis && isRedisHealthy()) {
      return await this.redis.getRecent(limit);
    }
    return this.inMemory.getRecent(limit);
  }

  async getStats(): Promise<EventLogStats> {
    if (this.useRedis && isRedisHealthy()) {
      return await this.redis.getStats(this.sequence);
    }
    return this.inMemory.getStats(this.sequence);
  }
}

export function createEventLog(useRedis: boolean, maxSize?: number): HybridEventLog {
  return new HybridEventLog(useRedis, maxSize);
}
