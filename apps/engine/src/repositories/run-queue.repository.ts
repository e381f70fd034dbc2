import { RunJob, runJobSchema } from '../db/run.entity';
import { RunKeys } from './keys';

const TAG = '[queue]';

export interface ListClient {
    rpush(key: string, ...elements: string[]): Promise<number>;
    lpush(key: string, ...elements: string[]): Promise<number>;
    lmove(source: string, destination: string, from: 'LEFT', to: 'RIGHT'): Promise<string | null>;
    lrem(key: string, count: number, element: string): Promise<number>;
    rpop(key: string, count: number): Promise<string[] | null>;
    llen(key: string): Promise<number>;
}

export interface RequeuedRun {
    runId: string;
    redeliveries: number;
    action: 'requeued' | 'dropped';
}

/**
 * FIFO of run jobs on a Redis list. A dequeued job moves to this worker's
 * processing list and stays there until acknowledged, so a crash mid-run
 * leaves it for the reaper to hand back.
 */
export class RunQueueRepository {
    // Raw entries as claimed; LREM needs the exact bytes that were moved.
    private readonly claims = new WeakMap<RunJob, string>();
    private readonly processingKey: string;

    constructor(
        private readonly redis: ListClient,
        private readonly keys: Pick<RunKeys, 'queue' | 'processing'>,
        workerId: string,
    ) {
        this.processingKey = keys.processing(workerId);
    }

    async enqueue(job: RunJob): Promise<void> {
        const payload: RunJob = { ...job, submittedAt: job.submittedAt ?? new Date().toISOString() };
        await this.redis.rpush(this.keys.queue, JSON.stringify(payload));
    }

    async dequeue(batchSize: number): Promise<RunJob[]> {
        const jobs: RunJob[] = [];
        while (jobs.length < batchSize) {
            const entry = await this.redis.lmove(this.keys.queue, this.processingKey, 'LEFT', 'RIGHT');
            if (entry === null) break;

            const job = parseJob(entry);
            if (!job) {
                console.warn(`${TAG} dropping malformed job: ${entry.slice(0, 200)}`);
                await this.redis.lrem(this.processingKey, 1, entry);
                continue;
            }
            this.claims.set(job, entry);
            jobs.push(job);
        }
        return jobs;
    }

    /** Releases a claimed job once its run has ended, whatever the outcome. */
    async acknowledge(job: RunJob): Promise<void> {
        const entry = this.claims.get(job);
        if (entry === undefined) {
            console.warn(`${TAG} run ${job.runId} was not claimed by this worker`);
            return;
        }
        await this.redis.lrem(this.processingKey, 1, entry);
        this.claims.delete(job);
    }

    /**
     * Hands another worker's claimed jobs back to the head of the queue in
     * their original order. A job already redelivered `maxRedeliveries`
     * times is dropped instead.
     */
    async requeueAbandoned(workerId: string, maxRedeliveries: number): Promise<RequeuedRun[]> {
        const source = this.keys.processing(workerId);
        const requeued: RequeuedRun[] = [];

        for (;;) {
            const entry = (await this.redis.rpop(source, 1))?.[0];
            if (entry === undefined) break;

            const job = parseJob(entry);
            if (!job) {
                console.warn(`${TAG} dropping malformed job from ${workerId}: ${entry.slice(0, 200)}`);
                continue;
            }

            const redeliveries = (job.redeliveries ?? 0) + 1;
            if (redeliveries > maxRedeliveries) {
                console.error(`${TAG} run ${job.runId} abandoned ${redeliveries} times, dropping it`);
                requeued.push({ runId: job.runId, redeliveries, action: 'dropped' });
                continue;
            }
            await this.redis.lpush(this.keys.queue, JSON.stringify({ ...job, redeliveries }));
            requeued.push({ runId: job.runId, redeliveries, action: 'requeued' });
        }
        return requeued;
    }

    async size(): Promise<number> {
        return this.redis.llen(this.keys.queue);
    }
}

function parseJob(entry: string): RunJob | null {
    let decoded: unknown;
    try {
        decoded = JSON.parse(entry);
    } catch {
        return null;
    }
    const result = runJobSchema.safeParse(decoded);
    return result.success ? result.data : null;
}
