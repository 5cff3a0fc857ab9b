import { Redis } from 'ioredis';
import { logger } from '../observability/logger.js';

const CONNECT_TIMEOUT_MS = 5000;
const COMMAND_TIMEOUT_MS = 2000;
const MAX_CONNECT_RETRIES = 3;

let redisClient: Redis | null = null;
let isHealthy = false;

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    connectTimeout: CONNECT_TIMEOUT_MS,
    commandTimeout: COMMAND_TIMEOUT_MS,
    retryStrategy: (times: number) => {
      if (times > MAX_CONNECT_RETRIES) {
        logger.error('redis_connection', 'Max retries exceeded, giving up', { times });
        return null;
      }
      const delay = Math.min(times * 200, 2000);
      logger.warn('redis_connection', 'Retrying connection', { times, delay });
      return delay;
    },
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  client.on('ready', () => {
    logger.info('redis_lifecycle', 'Redis ready');
    isHealthy = true;
  });

  client.on('error', (error) => {
    logger.error('redis_lifecycle', 'Redis error', {
      error: error.message,
    });
    isHealthy = false;
  });

  client.on('close', () => {
    logger.warn('redis_lifecycle', 'Redis connection closed');
    isHealthy = false;
  });

  return client;
}

/** Resolves once the client is ready, or after the connect timeout. */
export async function initializeRedis(url?: string): Promise<void> {
  if (!url) {
    logger.info('redis_initialization', 'REDIS_URL not provided, ledger state kept in memory only');
    return;
  }

  try {
    redisClient = createRedisClient(url);
    await waitForReady(redisClient);
    logger.info('redis_initialization', 'Redis client initialized', {
      mode: 'durable',
      healthy: isHealthy,
    });
  } catch (error) {
    logger.error('redis_initialization', 'Failed to initialize Redis', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    redisClient = null;
  }
}

function waitForReady(client: Redis): Promise<void> {
  if (client.status === 'ready') return Promise.resolve();

  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      logger.warn('redis_initialization', 'Redis not ready before timeout, continuing degraded', {
        timeoutMs: CONNECT_TIMEOUT_MS,
      });
      resolve();
    }, CONNECT_TIMEOUT_MS);
    client.once('ready', () => {
      clearTimeout(timer);
      resolve();
    });
  });
}

export function getRedisClient(): Redis | null {
  return redisClient;
}

export function isRedisHealthy(): boolean {
  return redisClient !== null && isHealthy;
}

export function storageMode(): 'memory' | 'durable' | 'degraded' {
  if (!redisClient) return 'memory';
  return isHealthy ? 'durable' : 'degraded';
}

export async function shutdownRedis(): Promise<void> {
  if (redisClient) {
    logger.info('redis_shutdown', 'Shutting down Redis connection');
    await redisClient.quit();
    redisClient = null;
    isHealthy = false;
  }
}
