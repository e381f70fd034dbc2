import { calculateBackOff } from '../../src/utils/backoff';

const noJitter = () => 0.5;

describe('calculateBackOff', () => {
    it('starts at 1s and doubles per failed attempt', () => {
        expect(calculateBackOff(1, undefined, noJitter)).toBe(1000);
        expect(calculateBackOff(2, undefined, noJitter)).toBe(2000);
        expect(calculateBackOff(3, undefined, noJitter)).toBe(4000);
    });

    it('caps at 8s by default', () => {
        expect(calculateBackOff(4, undefined, noJitter)).toBe(8000);
        expect(calculateBackOff(10, undefined, noJitter)).toBe(8000);
    });

    it('keeps jitter within 10% either side', () => {
        expect(calculateBackOff(2, undefined, () => 0)).toBe(1800);
        expect(calculateBackOff(2, undefined, () => 0.999)).toBe(2199);
        const delay = calculateBackOff(1);
        expect(delay).toBeGreaterThanOrEqual(900);
        expect(delay).toBeLessThanOrEqual(1100);
    });

    it('honours a configured schedule', () => {
        const backoff = { initialIntervalMs: 250, multiplier: 4, maxIntervalMs: 5000 };
        expect(calculateBackOff(2, backoff, noJitter)).toBe(1000);
        expect(calculateBackOff(10, backoff, noJitter)).toBe(5000);
    });
});
