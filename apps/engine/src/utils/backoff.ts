import { BackoffConfig } from '../config';

export const DEFAULT_BACKOFF: BackoffConfig = {
    initialIntervalMs: 1000,
    multiplier: 2,
    maxIntervalMs: 8000,
};

const JITTER = 0.1;

/**
 * Delay before the next session-open attempt. `attempt` is the 1-based
 * number of the attempt that just failed: 1s, 2s, 4s, then 8s flat, each
 * within ±10%.
 */
export function calculateBackOff(
    attempt: number,
    backoff: BackoffConfig = DEFAULT_BACKOFF,
    random: () => number = Math.random,
): number {
    const base = Math.min(
        backoff.initialIntervalMs * Math.pow(backoff.multiplier, Math.max(0, attempt - 1)),
        backoff.maxIntervalMs,
    );
    const spread = base * JITTER;
    return Math.floor(base - spread + random() * spread * 2);
}
