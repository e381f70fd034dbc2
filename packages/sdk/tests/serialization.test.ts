import { serialize, deserialize, SerializationError, MAX_STATE_BYTES } from '../src/utils/serialization';

describe('Serialization Utils', () => {
    test('should round-trip primitives', () => {
        expect(deserialize(serialize(123))).toBe(123);
        expect(deserialize(serialize('hello'))).toBe('hello');
        expect(deserialize(serialize(true))).toBe(true);
        expect(deserialize(serialize(null))).toBe(null);
    });

    test('should keep dates as dates', () => {
        const startedAt = new Date('2026-03-01T09:30:00.000Z');
        const output = deserialize(serialize({ runId: 'run-1', startedAt }));

        expect(output).toEqual({ runId: 'run-1', startedAt });
        expect(output).toHaveProperty('startedAt', expect.any(Date));
    });

    test('should enforce the 1MB size limit', () => {
        const largeString = 'a'.repeat(MAX_STATE_BYTES + 1);
        expect(() => serialize(largeString)).toThrow(SerializationError);
        expect(() => serialize(largeString)).toThrow(/over the 1024KB limit/);
    });

    test('should accept a custom limit', () => {
        expect(() => serialize({ text: 'x'.repeat(200) }, 100)).toThrow(SerializationError);
        expect(serialize({ text: 'x' }, 100)).toBe('{"json":{"text":"x"}}');
    });

    test('should treat missing input as undefined', () => {
        expect(deserialize('')).toBeUndefined();
        expect(deserialize(null)).toBeUndefined();
        expect(deserialize(undefined)).toBeUndefined();
    });

    test('should wrap parse errors', () => {
        expect(() => deserialize('{not json')).toThrow(SerializationError);
    });
});
