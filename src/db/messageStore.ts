import { getRedisClient } from './redisClient';

/**
 * Processed-message ledger.
 * WhatsApp retries webhook deliveries, so each inbound message id is claimed
 * once before it is answered.
 */

/** How long a processed id is remembered (24 hours) */
export const PROCESSED_TTL_SECONDS = 24 * 60 * 60;

/** Redis key prefix for processed message ids */
export const PROCESSED_KEY_PREFIX = 'topup:processed:';

export interface MessageLedger {
  /**
   * Record a message id as processed.
   * @returns true the first time an id is claimed, false for a repeat
   */
  claim(messageId: string): Promise<boolean>;
}

function getProcessedKey(messageId: string): string {
  return `${PROCESSED_KEY_PREFIX}${messageId}`;
}

export class RedisMessageLedger implements MessageLedger {
  constructor(private readonly ttlSeconds: number = PROCESSED_TTL_SECONDS) {}

  async claim(messageId: string): Promise<boolean> {
    const redis = getRedisClient();
    const result = await redis.set(getProcessedKey(messageId), '1', {
      NX: true,
      EX: this.ttlSeconds,
    });
    return result === 'OK';
  }
}
