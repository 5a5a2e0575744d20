import { Redis } from 'ioredis';
import { defaultLogger, Logger } from '../services/logger.js';

export function createRedisClient(redisUrl: string, logger: Logger = defaultLogger): Redis {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    logger.error('Redis connection error', { error: err.message });
  });

  redis.on('connect', () => {
    logger.debug('Connected to Redis');
  });

  return redis;
}
