import { RunJob } from '../db/run.entity';

const TAG = '[poller]';

export interface JobSource {
    dequeue(batchSize: number): Promise<RunJob[]>;
}

export interface PollerConfig {
    workerId: string;
    onJobReceived: (job: RunJob) => Promise<void>;
    batchSize?: number;
    checkBackpressure?: () => boolean;
}

export class Poller {
    private interval = 100;
    private readonly minInterval = 100;
    private readonly maxInterval = 500;
    private readonly batchSize: number;
    private running = false;
    private currentTimeout: NodeJS.Timeout | null = null;
    private readonly workerId: string;
    private readonly onJobReceived: (job: RunJob) => Promise<void>;
    private readonly checkBackpressure?: () => boolean;

    constructor(
        private readonly queue: JobSource,
        config: PollerConfig,
    ) {
        this.workerId = config.workerId;
        this.onJobReceived = config.onJobReceived;
        this.batchSize = config.batchSize || 5;
        this.checkBackpressure = config.checkBackpressure;
    }

    get currentInterval(): number {
        return this.interval;
    }

    start(): void {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.running = true;
        console.log(`${TAG} started (worker: ${this.workerId})`);
        this.schedule(0);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.currentTimeout) {
            clearTimeout(this.currentTimeout);
            this.currentTimeout = null;
        }
        console.log(`${TAG} stopped`);
    }

    private schedule(delayMs: number): void {
        if (!this.running) return;
        this.currentTimeout = setTimeout(() => {
            this.poll().catch(err => console.error(`${TAG} poll cycle error:`, err));
        }, delayMs);
    }

    private async poll(): Promise<void> {
        if (!this.running) return;

        if (this.checkBackpressure && this.checkBackpressure()) {
            console.warn(`${TAG} backpressure detected, skipping poll`);
            this.schedule(1000);
            return;
        }

        try {
            const jobs = await this.queue.dequeue(this.batchSize);

            if (jobs.length > 0) {
                this.interval = this.minInterval;
                for (const job of jobs) {
                    if (!this.running) break;
                    this.onJobReceived(job).catch(
                        err => console.error(`${TAG} run ${job.runId} callback error:`, err),
                    );
                }
            } else {
                // backoff: 100 -> 200 -> 400 -> 500ms cap
                this.interval = Math.min(this.interval * 2, this.maxInterval);
            }
        } catch (err) {
            console.error(`${TAG} dequeue error:`, err);
            this.interval = this.maxInterval;
        }

        this.schedule(this.interval);
    }
}
