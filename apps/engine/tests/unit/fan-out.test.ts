import { FanOutProgress, ItemOutcome, ToolFailure } from '@conduit/sdk';
import { runFanOut } from '../../src/services/fan-out';
import { sleep } from '../helpers/poll';

describe('runFanOut', () => {
    it('records a failing item and carries on', async () => {
        const report = await runFanOut(['a.pdf', 'b.pdf', 'c.pdf'], async (item) => {
            if (item === 'b.pdf') throw new ToolFailure('ingest_document', 'OCR failed');
            return { status: 'succeeded' };
        }, { concurrency: 1 });

        expect(report.total).toBe(3);
        expect(report.succeeded).toEqual(['a.pdf', 'c.pdf']);
        expect(report.failed).toEqual([{ item: 'b.pdf', error: 'OCR failed' }]);
        expect(report.errors).toEqual([{ item: 'b.pdf', error: 'OCR failed' }]);
    });

    it('never has more than `concurrency` calls in flight', async () => {
        let inFlight = 0;
        let peak = 0;
        const items = Array.from({ length: 10 }, (_, i) => i);

        await runFanOut(items, async () => {
            inFlight += 1;
            peak = Math.max(peak, inFlight);
            await sleep(5);
            inFlight -= 1;
            return { status: 'succeeded' };
        }, { concurrency: 3 });

        expect(peak).toBe(3);
    });

    it('runs every item exactly once', async () => {
        const seen: number[] = [];
        const items = Array.from({ length: 7 }, (_, i) => i);

        const report = await runFanOut(items, async (item) => {
            seen.push(item);
            await sleep(1);
            return { status: 'succeeded' };
        }, { concurrency: 4 });

        expect([...seen].sort((a, b) => a - b)).toEqual(items);
        expect(report.succeeded).toEqual(items);
    });

    it('separates skipped items from failures', async () => {
        const outcomes: Record<string, ItemOutcome> = {
            a: { status: 'succeeded' },
            b: { status: 'skipped', reason: 'already ingested elsewhere' },
            c: { status: 'failed', error: 'unsupported format' },
        };
        const report = await runFanOut(['a', 'b', 'c'], async item => outcomes[item], {
            concurrency: 2,
            describe: item => `doc-${item}`,
        });

        expect(report.succeeded).toEqual(['a']);
        expect(report.skipped).toEqual(['b']);
        expect(report.errors).toEqual([{ item: 'doc-c', error: 'unsupported format' }]);
    });

    it('reports cumulative counts after each item', async () => {
        const snapshots: FanOutProgress[] = [];
        await runFanOut([1, 2, 3], async item => (item === 2 ? { status: 'failed', error: 'x' } : { status: 'succeeded' }), {
            concurrency: 1,
            onProgress: p => { snapshots.push(p); },
        });

        expect(snapshots).toEqual([
            { total: 3, succeeded: 1, failed: 0, skipped: 0 },
            { total: 3, succeeded: 1, failed: 1, skipped: 0 },
            { total: 3, succeeded: 2, failed: 1, skipped: 0 },
        ]);
    });

    it('ignores a failing progress callback', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const report = await runFanOut(['a'], async () => ({ status: 'succeeded' }), {
            concurrency: 1,
            onProgress: async () => { throw new Error('publish failed'); },
        });
        expect(report.succeeded).toEqual(['a']);
        jest.restoreAllMocks();
    });

    it('handles an empty list', async () => {
        const worker = jest.fn();
        const report = await runFanOut([], worker, { concurrency: 4 });
        expect(report).toEqual({ total: 0, succeeded: [], skipped: [], failed: [], errors: [] });
        expect(worker).not.toHaveBeenCalled();
    });

    it('treats a concurrency below one as one', async () => {
        const report = await runFanOut(['a', 'b'], async () => ({ status: 'succeeded' }), { concurrency: 0 });
        expect(report.succeeded).toEqual(['a', 'b']);
    });
});
