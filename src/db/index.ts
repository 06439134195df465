// Redis client exports
export {
  getRedisClient,
  closeRedisConnection,
  isRedisReady,
  initRedis,
  type RedisClient,
} from './redisClient';

// Message ledger exports
export {
  type MessageLedger,
  RedisMessageLedger,
  PROCESSED_KEY_PREFIX,
  PROCESSED_TTL_SECONDS,
} from './messageStore';
