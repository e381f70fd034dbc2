export const UNKNOWN_ERROR = 'Unknown error';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
    return typeof value === 'string' && value.trim() !== '' ? value : null;
}

function isEmptyValue(value: unknown): boolean {
    if (value === null || value === undefined) return true;
    if (typeof value === 'string') return value.trim() === '';
    if (Array.isArray(value)) return value.length === 0;
    if (isRecord(value)) return Object.keys(value).length === 0;
    return false;
}

/**
 * Pulls a readable message out of a failure-shaped payload.
 * Order: `error` (string or `{ message }`), `message`, `text`, then whatever
 * else the payload carries. Only an empty payload maps to UNKNOWN_ERROR.
 */
export function extractErrorMessage(payload: unknown): string {
    const direct = nonEmptyString(payload);
    if (direct !== null) return direct;
    if (!isRecord(payload)) return UNKNOWN_ERROR;

    const { error } = payload;
    const errorText = nonEmptyString(error);
    if (errorText !== null) return errorText;
    if (isRecord(error)) {
        const nested = nonEmptyString(error.message);
        if (nested !== null) return nested;
    }

    const message = nonEmptyString(payload.message);
    if (message !== null) return message;

    const text = nonEmptyString(payload.text);
    if (text !== null) return text;

    const rest: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
        if (key === 'status' || isEmptyValue(value)) continue;
        rest[key] = value;
    }
    if (Object.keys(rest).length > 0) {
        return JSON.stringify(rest);
    }
    return UNKNOWN_ERROR;
}

export function describeError(err: unknown): string {
    if (err instanceof Error) {
        return err.message || err.name;
    }
    return extractErrorMessage(err);
}
