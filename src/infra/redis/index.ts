import Redis, { RedisOptions } from 'ioredis';

import { AppConfig } from '@config';
import { logger } from '@infra/logging/logger';

let redisClient: Redis | null = null;

const MAX_RECONNECT_DELAY_MS = 5_000;

const baseOptions = (): RedisOptions => ({
  // BullMQ workers block on Redis and require unlimited per-request retries.
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
  connectionName: 'transfer-orchestrator',
  retryStrategy: (times) => Math.min(times * 200, MAX_RECONNECT_DELAY_MS),
  password: AppConfig.redis.password,
  tls: AppConfig.redis.tls ? {} : undefined
});

export const initializeRedis = async (): Promise<void> => {
  if (redisClient) {
    return;
  }

  redisClient = new Redis(AppConfig.redis.url, baseOptions());

  redisClient.on('error', (error) => {
    logger.error(error, 'Redis connection error');
  });

  redisClient.on('ready', () => {
    logger.info('Redis connection established');
  });

  await redisClient.connect();
};

export const getRedisClient = (): Redis => {
  if (!redisClient) {
    throw new Error('Redis client not initialised. Call initializeRedis first.');
  }

  return redisClient;
};

export const pingRedis = async (): Promise<boolean> => {
  if (!redisClient) {
    return false;
  }

  try {
    return (await redisClient.ping()) === 'PONG';
  } catch (error) {
    logger.warn({ err: error }, 'Redis ping failed');
    return false;
  }
};

export const shutdownRedis = async (): Promise<void> => {
  if (!redisClient) {
    return;
  }

  await redisClient.quit();
  redisClient = null;
  logger.info('Redis connection closed');
};
