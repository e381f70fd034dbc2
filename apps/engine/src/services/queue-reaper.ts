import { RequeuedRun } from '../repositories/run-queue.repository';

const TAG = '[reaper]';

export interface AbandonedWork {
    requeueAbandoned(workerId: string, maxRedeliveries: number): Promise<RequeuedRun[]>;
}

export interface WorkerDirectory {
    list(): Promise<string[]>;
    isAlive(workerId: string): Promise<boolean>;
    remove(workerId: string): Promise<void>;
}

export interface QueueReaperOptions {
    workerId: string;
    intervalMs: number;
    maxRedeliveries: number;
}

/**
 * Hands the claimed jobs of dead workers back to the queue. Every worker
 * runs one; RPOP hands each entry to exactly one reaper.
 */
export class QueueReaper {
    private intervalHandle: NodeJS.Timeout | null = null;
    private isReaping = false;

    constructor(
        private readonly queue: AbandonedWork,
        private readonly workers: WorkerDirectory,
        private readonly options: QueueReaperOptions,
    ) { }

    /**
     * Reclaims jobs left under this worker's own id by an earlier process,
     * then reaps on schedule.
     */
    async start(): Promise<void> {
        if (this.intervalHandle) {
            console.warn(`${TAG} already running`);
            return;
        }

        const leftovers = await this.queue.requeueAbandoned(this.options.workerId, this.options.maxRedeliveries);
        this.logReaped(this.options.workerId, leftovers);

        await this.reap();
        this.intervalHandle = setInterval(() => {
            this.reap().catch(err => console.error(`${TAG} error during reap cycle:`, err));
        }, this.options.intervalMs);
        console.log(`${TAG} started (interval: ${this.options.intervalMs}ms)`);
    }

    stop(): void {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        console.log(`${TAG} stopped`);
    }

    async reap(): Promise<RequeuedRun[]> {
        if (this.isReaping) return [];
        this.isReaping = true;

        const reaped: RequeuedRun[] = [];
        try {
            for (const workerId of await this.workers.list()) {
                if (workerId === this.options.workerId) continue;
                if (await this.workers.isAlive(workerId)) continue;

                const runs = await this.queue.requeueAbandoned(workerId, this.options.maxRedeliveries);
                await this.workers.remove(workerId);
                this.logReaped(workerId, runs);
                reaped.push(...runs);
            }
        } catch (err) {
            console.error(`${TAG} error during reap cycle:`, err);
        } finally {
            this.isReaping = false;
        }
        return reaped;
    }

    private logReaped(workerId: string, runs: RequeuedRun[]): void {
        if (runs.length === 0) return;
        console.log(`${TAG} reclaimed ${runs.length} run(s) from ${workerId}: ${runs.map(r => `${r.runId}(${r.action})`).join(', ')}`);
    }
}
