// Compiled-in phase sequence for the review pipeline. Order is execution order.
export const REVIEW_PHASES = [
    'fetching_metadata',
    'filtering_documents',
    'downloading_documents',
    'ingesting_documents',
    'analysing_application',
    'assessing_routes',
    'generating_review',
    'verifying_review',
] as const;

export type ReviewPhase = (typeof REVIEW_PHASES)[number];

// Share of overall progress each phase accounts for. Must sum to 100.
export const PHASE_WEIGHTS: Readonly<Record<ReviewPhase, number>> = {
    fetching_metadata: 5,
    filtering_documents: 5,
    downloading_documents: 15,
    ingesting_documents: 22,
    analysing_application: 20,
    assessing_routes: 8,
    generating_review: 15,
    verifying_review: 10,
};

export const TOTAL_PHASES = REVIEW_PHASES.length;

const PHASE_SET: ReadonlySet<string> = new Set(REVIEW_PHASES);

export function isReviewPhase(value: unknown): value is ReviewPhase {
    return typeof value === 'string' && PHASE_SET.has(value);
}

/** 1-based position of a phase in the pipeline, as shown to progress observers. */
export function phaseNumber(phase: ReviewPhase): number {
    return REVIEW_PHASES.indexOf(phase) + 1;
}
