import superjson from 'superjson';

// Run state is rewritten on every phase transition; keep it small.
export const MAX_STATE_BYTES = 1024 * 1024;

export class SerializationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown, maxBytes: number = MAX_STATE_BYTES): string {
    let encoded: string;
    try {
        encoded = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(
            `Failed to serialize value: ${err instanceof Error ? err.message : String(err)}`,
            { cause: err },
        );
    }

    const size = Buffer.byteLength(encoded);
    if (size > maxBytes) {
        throw new SerializationError(
            `Serialized value is ${(size / 1024).toFixed(1)}KB, over the ${(maxBytes / 1024).toFixed(0)}KB limit`,
        );
    }
    return encoded;
}

// Returns the decoded value unvalidated; callers run it through a schema.
export function deserialize(encoded: string | null | undefined): unknown {
    if (encoded === null || encoded === undefined || encoded.trim() === '') {
        return undefined;
    }

    try {
        return superjson.parse<unknown>(encoded);
    } catch (err) {
        throw new SerializationError(
            `Failed to deserialize value: ${err instanceof Error ? err.message : String(err)}`,
            { cause: err },
        );
    }
}
