import { z } from 'zod';
import { ToolData, ToolFailure, ToolPayload } from '@conduit/sdk';
import { extractErrorMessage } from '../utils/error-message';

const contentItemSchema = z.object({ type: z.string() }).passthrough();

const toolResultSchema = z.object({
    content: z.array(contentItemSchema).optional(),
    structuredContent: z.record(z.unknown()).optional(),
    isError: z.boolean().optional(),
}).passthrough();

type RawToolResult = z.infer<typeof toolResultSchema>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function textItems(result: RawToolResult): string[] {
    const texts: string[] = [];
    for (const item of result.content ?? []) {
        if (item.type === 'text' && typeof item.text === 'string') {
            texts.push(item.text);
        }
    }
    return texts;
}

function parseJsonObject(text: string): Record<string, unknown> | null {
    try {
        const parsed: unknown = JSON.parse(text);
        return isPlainObject(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

function errorPayloadMessage(result: RawToolResult): string {
    if (result.structuredContent) {
        return extractErrorMessage(result.structuredContent);
    }
    const [first] = textItems(result);
    if (first === undefined) {
        return extractErrorMessage({});
    }
    return extractErrorMessage(parseJsonObject(first) ?? first);
}

/** Converts a raw protocol result into a ToolPayload, or throws ToolFailure. */
export function normalizeToolResult(toolName: string, raw: unknown): ToolPayload {
    if (raw === null || raw === undefined) {
        return { kind: 'structured', data: {} };
    }

    const parsed = toolResultSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ToolFailure(toolName, 'Malformed tool result', { issues: parsed.error.issues.map(i => i.message) });
    }
    const result = parsed.data;

    if (result.isError === true) {
        throw new ToolFailure(toolName, errorPayloadMessage(result), { remote: true });
    }
    if (result.structuredContent) {
        return { kind: 'structured', data: result.structuredContent };
    }

    const [first] = textItems(result);
    if (first === undefined) {
        return { kind: 'structured', data: {} };
    }
    const data = parseJsonObject(first);
    return data ? { kind: 'structured', data } : { kind: 'raw', text: first };
}

export function coercePayload(payload: ToolPayload): ToolData {
    return payload.kind === 'structured' ? payload.data : { text: payload.text };
}
