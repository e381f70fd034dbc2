import { fanOutOutcome, fatalFailure, phaseSucceeded, recoverableFailure } from '../src/result';
import { FanOutReport } from '../src/types';

function report(succeeded: string[], failed: Array<{ item: string; error: string }>, skipped: string[] = []): FanOutReport<string> {
    return {
        total: succeeded.length + failed.length + skipped.length,
        succeeded,
        skipped,
        failed,
        errors: failed.map(f => ({ item: f.item, error: f.error })),
    };
}

describe('phase results', () => {
    test('tags recoverability explicitly', () => {
        expect(recoverableFailure('routing down')).toEqual({ ok: false, recoverable: true, error: 'routing down', itemErrors: undefined });
        expect(fatalFailure('no application')).toEqual({ ok: false, recoverable: false, error: 'no application', itemErrors: undefined });
        expect(phaseSucceeded()).toEqual({ ok: true });
    });

    test('an empty fan-out succeeds with zero counts', () => {
        expect(fanOutOutcome(report([], []), 'nothing worked')).toEqual({ ok: true, itemsProcessed: 0, itemsTotal: 0 });
    });

    test('partial success keeps one error per failed item', () => {
        const result = fanOutOutcome(
            report(['a.pdf', 'c.pdf'], [{ item: 'b.pdf', error: 'OCR failed' }]),
            'No documents could be ingested',
        );

        expect(result).toEqual({
            ok: true,
            itemsProcessed: 2,
            itemsTotal: 3,
            itemErrors: [{ item: 'b.pdf', error: 'OCR failed' }],
        });
    });

    test('zero successes is fatal', () => {
        const result = fanOutOutcome(
            report([], [{ item: 'a.pdf', error: 'timeout' }, { item: 'b.pdf', error: 'corrupt' }]),
            'No documents could be ingested',
        );

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.recoverable).toBe(false);
        expect(result.error).toBe('No documents could be ingested');
        expect(result.itemErrors).toHaveLength(2);
    });

    test('only skipped items is still fatal', () => {
        const result = fanOutOutcome(report([], [], ['a.pdf']), 'none');
        expect(result).toEqual({ ok: false, recoverable: false, error: 'none', itemErrors: [] });
    });
});
