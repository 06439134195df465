import { createClient } from 'redis';

import { log, maskUrlCredentials } from '../logger';

/**
 * Redis client singleton for the processed-message ledger.
 * Created on the first initRedis() call with the configured REDIS_URL.
 */

export type RedisClient = ReturnType<typeof createClient>;

const MAX_RECONNECT_ATTEMPTS = 10;

let client: RedisClient | null = null;
let redisReady = false;

function createRedisClient(url: string): RedisClient {
  const redis = createClient({
    url,
    socket: {
      reconnectStrategy: (retries) => {
        if (retries > MAX_RECONNECT_ATTEMPTS) {
          log('error', 'Redis: Max reconnection attempts reached');
          return new Error('Max reconnection attempts reached');
        }
        // Linear backoff capped at 3s: 100ms, 200ms, 300ms, ...
        const delay = Math.min(retries * 100, 3000);
        log('warn', 'Redis: Reconnecting', { delay, attempt: retries });
        return delay;
      },
    },
  });

  redis.on('error', (error) => log('error', 'Redis client error', { error }));
  redis.on('connect', () => log('info', 'Redis: Connected'));
  redis.on('reconnecting', () => {
    redisReady = false;
    log('info', 'Redis: Reconnecting...');
  });
  redis.on('ready', () => {
    redisReady = true;
    log('info', 'Redis: Ready');
  });
  redis.on('end', () => {
    redisReady = false;
  });

  return redis;
}

/**
 * Create the client (once) and open the connection.
 */
export async function initRedis(url: string): Promise<void> {
  if (!client) {
    log('info', 'Creating Redis client', { redisUrl: maskUrlCredentials(url) });
    client = createRedisClient(url);
  }
  if (!client.isOpen) {
    await client.connect();
  }
}

/**
 * Close the Redis connection gracefully.
 */
export async function closeRedisConnection(): Promise<void> {
  if (client?.isOpen) {
    redisReady = false;
    await client.quit();
    log('info', 'Redis connection closed gracefully');
  }
}

/**
 * Get the Redis client instance.
 * @throws Error if initRedis() has not been called
 */
export function getRedisClient(): RedisClient {
  if (!client) {
    throw new Error('Redis client not initialized; call initRedis() first');
  }
  return client;
}

/**
 * Check if Redis connection is ready.
 */
export function isRedisReady(): boolean {
  return redisReady && client !== null && client.isOpen;
}
