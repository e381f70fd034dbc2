import { describeError } from '../utils/error-message';

const TAG = '[heartbeat]';

export interface HeartbeatTarget {
    beat(workerId: string, ttlSeconds: number): Promise<void>;
    remove(workerId: string): Promise<void>;
}

export interface WorkerHeartbeatOptions {
    intervalMs: number;
    /** How long a missed heartbeat keeps the worker alive. Several intervals. */
    ttlSeconds: number;
}

/**
 * Keeps this worker's liveness key fresh. Once it lapses, other workers'
 * reapers treat the worker's claimed jobs as abandoned.
 */
export class WorkerHeartbeat {
    private intervalHandle: NodeJS.Timeout | null = null;

    constructor(
        private readonly target: HeartbeatTarget,
        private readonly workerId: string,
        private readonly options: WorkerHeartbeatOptions,
    ) { }

    /** Registers with a first beat, which must succeed, then beats on schedule. */
    async start(): Promise<void> {
        if (this.intervalHandle) {
            console.warn(`${TAG} already running for ${this.workerId}`);
            return;
        }

        await this.target.beat(this.workerId, this.options.ttlSeconds);
        this.intervalHandle = setInterval(() => {
            this.tick().catch(err => console.error(`${TAG} failed to update for ${this.workerId}: ${describeError(err)}`));
        }, this.options.intervalMs);
        console.log(`${TAG} started for ${this.workerId} (interval: ${this.options.intervalMs}ms, ttl: ${this.options.ttlSeconds}s)`);
    }

    isRunning(): boolean {
        return this.intervalHandle !== null;
    }

    /** Stops beating and deregisters. Only call once no claimed jobs remain. */
    async stop(): Promise<void> {
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        try {
            await this.target.remove(this.workerId);
        } catch (err) {
            console.error(`${TAG} failed to deregister ${this.workerId}: ${describeError(err)}`);
        }
        console.log(`${TAG} stopped for ${this.workerId}`);
    }

    private async tick(): Promise<void> {
        await this.target.beat(this.workerId, this.options.ttlSeconds);
    }
}
