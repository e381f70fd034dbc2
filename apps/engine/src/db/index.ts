/**
 * Redis connection management. Run state, cancellation flags, results and the
 * run queue all live in one Redis instance.
 */
import Redis from 'ioredis';

/** Redis client for state, queueing and pub/sub */
export function createRedis(url: string = process.env.REDIS_URL || 'redis://localhost:6379'): Redis {
    const redis = new Redis(url, {
        maxRetriesPerRequest: 3,
        lazyConnect: true,
    });
    redis.on('error', (err) => console.error('[redis] connection error:', err.message));
    return redis;
}
