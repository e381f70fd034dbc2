import { ToolData } from '@conduit/sdk';

// Readers for loosely shaped tool payloads. Missing or mistyped fields read as absent.

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function str(data: ToolData, key: string): string | null {
    const value = data[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return null;
}

export function num(data: ToolData, key: string): number | null {
    const value = data[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

export function records(data: ToolData, key: string): ToolData[] {
    const value = data[key];
    return Array.isArray(value) ? value.filter(isRecord) : [];
}

export function list(data: ToolData, key: string): unknown[] {
    const value = data[key];
    return Array.isArray(value) ? value : [];
}

export function record(data: ToolData, key: string): ToolData | null {
    const value = data[key];
    return isRecord(value) ? value : null;
}
