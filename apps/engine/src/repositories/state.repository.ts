import { serialize, deserialize } from '@conduit/sdk';
import { RunKeys } from './keys';

/** The slice of the Redis client the state repository needs. */
export interface KeyValueClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
    del(...keys: string[]): Promise<number>;
    exists(...keys: string[]): Promise<number>;
    publish(channel: string, message: string): Promise<number>;
}

/** Polled between phases. Set out of band by an operator or API. */
export interface CancellationSource {
    isCancellationRequested(runId: string): Promise<boolean>;
}

export interface StateRepository extends CancellationSource {
    /** Raw decoded value, unvalidated. null when nothing is stored. */
    load(runId: string): Promise<unknown>;
    save(runId: string, value: unknown): Promise<void>;
    delete(runId: string): Promise<void>;
    publish(event: Record<string, unknown>): Promise<void>;
    requestCancellation(runId: string): Promise<void>;
    saveResult(runId: string, value: unknown): Promise<void>;
    loadResult(runId: string): Promise<unknown>;
    clearResult(runId: string): Promise<void>;
}

export interface StateTtls {
    stateTtlSeconds: number;
    cancelTtlSeconds: number;
    resultTtlSeconds: number;
}

export class RedisStateRepository implements StateRepository {
    constructor(
        private readonly redis: KeyValueClient,
        private readonly keys: RunKeys,
        private readonly ttls: StateTtls,
    ) { }

    async load(runId: string): Promise<unknown> {
        const raw = await this.redis.get(this.keys.state(runId));
        return raw === null ? null : deserialize(raw);
    }

    async save(runId: string, value: unknown): Promise<void> {
        await this.redis.set(this.keys.state(runId), serialize(value), 'EX', this.ttls.stateTtlSeconds);
    }

    async delete(runId: string): Promise<void> {
        await this.redis.del(this.keys.state(runId));
    }

    // Events go out as plain JSON so non-Node subscribers can read them.
    async publish(event: Record<string, unknown>): Promise<void> {
        await this.redis.publish(this.keys.progressChannel, JSON.stringify(event));
    }

    async isCancellationRequested(runId: string): Promise<boolean> {
        const count = await this.redis.exists(this.keys.cancel(runId));
        return count > 0;
    }

    async requestCancellation(runId: string): Promise<void> {
        await this.redis.set(this.keys.cancel(runId), '1', 'EX', this.ttls.cancelTtlSeconds);
    }

    async saveResult(runId: string, value: unknown): Promise<void> {
        await this.redis.set(this.keys.result(runId), serialize(value), 'EX', this.ttls.resultTtlSeconds);
    }

    async loadResult(runId: string): Promise<unknown> {
        const raw = await this.redis.get(this.keys.result(runId));
        return raw === null ? null : deserialize(raw);
    }

    async clearResult(runId: string): Promise<void> {
        await this.redis.del(this.keys.result(runId));
    }
}
