export interface RunKeys {
    state(runId: string): string;
    cancel(runId: string): string;
    result(runId: string): string;
    queue: string;
    /** Jobs a worker has claimed and not yet finished. */
    processing(workerId: string): string;
    heartbeat(workerId: string): string;
    workers: string;
    progressChannel: string;
}

export function runKeys(prefix: string): RunKeys {
    return {
        state: runId => `${prefix}:run:${runId}:state`,
        cancel: runId => `${prefix}:run:${runId}:cancel`,
        result: runId => `${prefix}:run:${runId}:result`,
        queue: `${prefix}:runs:queue`,
        processing: workerId => `${prefix}:runs:processing:${workerId}`,
        heartbeat: workerId => `${prefix}:worker:${workerId}:heartbeat`,
        workers: `${prefix}:workers`,
        progressChannel: `${prefix}:progress`,
    };
}
