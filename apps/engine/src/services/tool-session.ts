import { ServerConfig } from '../config';

/**
 * One RPC session against one tool server. Opened per call and always
 * closed; sessions are never pooled.
 */
export interface ToolSession {
    /** Connects the transport and completes the capability handshake. */
    open(timeoutMs: number): Promise<void>;
    listTools(timeoutMs: number): Promise<string[]>;
    /** Resolves with the raw protocol result. Normalization happens upstream. */
    callTool(name: string, args: Record<string, unknown>, timeoutMs: number): Promise<unknown>;
    close(): Promise<void>;
}

export type SessionFactory = (server: ServerConfig) => ToolSession;
