import { FanOutReport, ItemError, PhaseResult } from './types';

export function phaseSucceeded(
    extra: { itemsProcessed?: number; itemsTotal?: number; itemErrors?: ItemError[] } = {},
): PhaseResult {
    return { ok: true, ...extra };
}

/** The run continues in degraded mode after this phase. */
export function recoverableFailure(error: string, itemErrors?: ItemError[]): PhaseResult {
    return { ok: false, recoverable: true, error, itemErrors };
}

/** Halts the run. */
export function fatalFailure(error: string, itemErrors?: ItemError[]): PhaseResult {
    return { ok: false, recoverable: false, error, itemErrors };
}

/**
 * Collapses a fan-out report into a phase result. The phase fails only when
 * there was work to do and none of it succeeded.
 */
export function fanOutOutcome<T>(report: FanOutReport<T>, noneSucceededMessage: string): PhaseResult {
    if (report.total === 0) {
        return phaseSucceeded({ itemsProcessed: 0, itemsTotal: 0 });
    }
    if (report.succeeded.length === 0) {
        return fatalFailure(noneSucceededMessage, report.errors);
    }
    return phaseSucceeded({
        itemsProcessed: report.succeeded.length,
        itemsTotal: report.total,
        itemErrors: report.errors,
    });
}
