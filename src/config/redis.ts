import Redis from 'ioredis';
import logger from './logger';
import { config } from './env';

/**
 * Creates the Redis client used for conversation sessions
 * Returns null when REDIS_URL is not set so sessions stay in memory
 */
export function createRedisClient(url: string = config.redisUrl): Redis | null {
  if (!url) {
    logger.warn('REDIS_URL not set. Sessions will be kept in memory and lost on restart.');
    return null;
  }

  const client = new Redis(url, {
    lazyConnect: true,
    retryStrategy: (times) => {
      const delay = Math.min(times * 50, 2000);
      if (times <= 3) {
        logger.warn(`Redis connection retry attempt ${times}, waiting ${delay}ms`);
      }
      return delay;
    },
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
  });

  client.on('ready', () => {
    logger.info('Redis client ready');
  });

  // Log errors at most once per minute
  let lastErrorLogTime = 0;
  client.on('error', (err: Error) => {
    const now = Date.now();
    if (now - lastErrorLogTime > 60000) {
      logger.warn('Redis client error:', err.message);
      lastErrorLogTime = now;
    }
  });

  client.on('close', () => {
    logger.warn('Redis client connection closed');
  });

  return client;
}
