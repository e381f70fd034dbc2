import { FanOutProgress, FanOutReport, ItemOutcome, ItemWorker } from '@conduit/sdk';
import { describeError } from '../utils/error-message';

const TAG = '[fan-out]';

export interface RunFanOutOptions<T> {
    concurrency: number;
    describe?: (item: T) => string;
    onProgress?: (progress: FanOutProgress) => Promise<void> | void;
}

// Only workers of one fan-out write here. Each update runs to completion on
// the event loop before another worker resumes.
class FanOutCounters {
    succeeded = 0;
    failed = 0;
    skipped = 0;

    constructor(readonly total: number) { }

    record(outcome: ItemOutcome): FanOutProgress {
        if (outcome.status === 'succeeded') this.succeeded += 1;
        else if (outcome.status === 'skipped') this.skipped += 1;
        else this.failed += 1;
        return { total: this.total, succeeded: this.succeeded, failed: this.failed, skipped: this.skipped };
    }
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Item failures, thrown or returned, are collected and never abort the pool.
 */
export async function runFanOut<T>(
    items: readonly T[],
    worker: ItemWorker<T>,
    options: RunFanOutOptions<T>,
): Promise<FanOutReport<T>> {
    const describe = options.describe ?? ((item: T) => String(item));
    const outcomes: Array<ItemOutcome | undefined> = new Array(items.length);
    const counters = new FanOutCounters(items.length);
    const poolSize = Math.min(Math.max(1, Math.floor(options.concurrency)), items.length);
    let next = 0;

    const runWorker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            const item = items[index];

            let outcome: ItemOutcome;
            try {
                outcome = await worker(item, index);
            } catch (err) {
                outcome = { status: 'failed', error: describeError(err) };
            }
            outcomes[index] = outcome;

            const progress = counters.record(outcome);
            if (options.onProgress) {
                try {
                    await options.onProgress(progress);
                } catch (err) {
                    console.warn(`${TAG} progress callback failed: ${describeError(err)}`);
                }
            }
        }
    };

    await Promise.all(Array.from({ length: poolSize }, () => runWorker()));

    const report: FanOutReport<T> = { total: items.length, succeeded: [], skipped: [], failed: [], errors: [] };
    items.forEach((item, index) => {
        const outcome = outcomes[index];
        if (!outcome) return;
        if (outcome.status === 'succeeded') {
            report.succeeded.push(item);
        } else if (outcome.status === 'skipped') {
            report.skipped.push(item);
        } else {
            report.failed.push({ item, error: outcome.error });
            report.errors.push({ item: describe(item), error: outcome.error });
        }
    });
    return report;
}
