import IORedis from 'ioredis';

export function createRedisClient(url: string): IORedis {
  const redis = new IORedis(url, {
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => {
      if (times > 10) return null; // stop retrying after 10 attempts
      return Math.min(times * 200, 3000);
    },
  });

  redis.on('error', (err: Error) => {
    console.error('[redis] connection error:', err.message);
  });

  redis.on('connect', () => {
    console.log('[redis] connected');
  });

  redis.on('reconnecting', () => {
    console.log('[redis] reconnecting...');
  });

  return redis;
}
