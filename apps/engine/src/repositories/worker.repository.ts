import { RunKeys } from './keys';

export interface WorkerClient {
    set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
    exists(...keys: string[]): Promise<number>;
    del(...keys: string[]): Promise<number>;
    sadd(key: string, member: string): Promise<number>;
    srem(key: string, member: string): Promise<number>;
    smembers(key: string): Promise<string[]>;
}

/** Registered workers and their liveness keys. A worker is alive while its heartbeat key exists. */
export class WorkerRepository {
    constructor(
        private readonly redis: WorkerClient,
        private readonly keys: Pick<RunKeys, 'workers' | 'heartbeat'>,
    ) { }

    async beat(workerId: string, ttlSeconds: number): Promise<void> {
        await this.redis.set(this.keys.heartbeat(workerId), new Date().toISOString(), 'EX', ttlSeconds);
        await this.redis.sadd(this.keys.workers, workerId);
    }

    async isAlive(workerId: string): Promise<boolean> {
        return (await this.redis.exists(this.keys.heartbeat(workerId))) > 0;
    }

    async list(): Promise<string[]> {
        return this.redis.smembers(this.keys.workers);
    }

    async remove(workerId: string): Promise<void> {
        await this.redis.del(this.keys.heartbeat(workerId));
        await this.redis.srem(this.keys.workers, workerId);
    }
}
