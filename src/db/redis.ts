import { Redis } from 'ioredis';
import { config } from '../config/index.js';
import logger from '../utils/logger.js';

let client: Redis | null = null;

/**
 * Shared Redis connection, created on first use so that processes running
 * on the in-memory storage driver never open a socket.
 */
export function getRedis(): Redis {
  if (client) return client;

  client = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password || undefined,
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
  });

  client.on('connect', () => {
    logger.info('Redis connected');
  });

  client.on('error', (err) => {
    logger.error('Redis error', { error: err.message });
  });

  client.on('reconnecting', () => {
    logger.warn('Redis reconnecting');
  });

  return client;
}

// Health check
export async function healthCheck(): Promise<boolean> {
  try {
    const result = await getRedis().ping();
    return result === 'PONG';
  } catch {
    return false;
  }
}

export async function closeRedis(): Promise<void> {
  if (!client) return;
  await client.quit();
  client = null;
  logger.info('Redis connection closed');
}
