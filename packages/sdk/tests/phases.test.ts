import { PHASE_WEIGHTS, REVIEW_PHASES, TOTAL_PHASES, isReviewPhase, phaseNumber } from '../src/phases';

describe('review phases', () => {
    test('weights sum to 100', () => {
        const total = REVIEW_PHASES.reduce((sum, phase) => sum + PHASE_WEIGHTS[phase], 0);
        expect(total).toBe(100);
    });

    test('every weight is positive', () => {
        for (const phase of REVIEW_PHASES) {
            expect(PHASE_WEIGHTS[phase]).toBeGreaterThan(0);
        }
    });

    test('phase numbers run 1..8 in order', () => {
        expect(TOTAL_PHASES).toBe(8);
        expect(REVIEW_PHASES.map(phaseNumber)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
        expect(phaseNumber('fetching_metadata')).toBe(1);
        expect(phaseNumber('verifying_review')).toBe(8);
    });

    test('recognises only known phase names', () => {
        expect(isReviewPhase('ingesting_documents')).toBe(true);
        expect(isReviewPhase('ingesting')).toBe(false);
        expect(isReviewPhase(4)).toBe(false);
    });
});
