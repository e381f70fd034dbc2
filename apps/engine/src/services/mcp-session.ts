/**
 * Model Context Protocol sessions over Streamable HTTP or legacy SSE.
 * This is the only module that talks to the MCP client library.
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ToolFailure } from '@conduit/sdk';
import { ServerConfig } from '../config';
import { SessionFactory, ToolSession } from './tool-session';

const CLIENT_INFO = { name: 'conduit-engine', version: '0.1.0' };

export interface McpSessionOptions {
    apiKey: string | null;
}

function createTransport(server: ServerConfig, options: McpSessionOptions): Transport {
    const requestInit: RequestInit | undefined = options.apiKey
        ? { headers: { Authorization: `Bearer ${options.apiKey}` } }
        : undefined;
    const base = server.baseUrl.replace(/\/+$/, '');

    if (server.transport === 'sse') {
        return new SSEClientTransport(new URL(`${base}/sse`), { requestInit });
    }
    return new StreamableHTTPClientTransport(new URL(`${base}/mcp`), { requestInit });
}

export class McpToolSession implements ToolSession {
    private readonly client = new Client(CLIENT_INFO);

    constructor(
        private readonly server: ServerConfig,
        private readonly options: McpSessionOptions,
    ) { }

    async open(timeoutMs: number): Promise<void> {
        await this.client.connect(createTransport(this.server, this.options), { timeout: timeoutMs });
    }

    async listTools(timeoutMs: number): Promise<string[]> {
        const response = await this.client.listTools(undefined, { timeout: timeoutMs });
        return response.tools.map(tool => tool.name);
    }

    async callTool(name: string, args: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
        try {
            return await this.client.callTool({ name, arguments: args }, undefined, { timeout: timeoutMs });
        } catch (err) {
            if (!(err instanceof McpError)) throw err;
            if (err.code === ErrorCode.ConnectionClosed) throw err;
            if (err.code === ErrorCode.RequestTimeout) {
                throw new ToolFailure(name, `Timed out after ${timeoutMs}ms`, { timedOut: true, timeoutMs });
            }
            // protocol-level rejection of this call, e.g. invalid params
            throw new ToolFailure(name, err.message, { code: err.code });
        }
    }

    async close(): Promise<void> {
        await this.client.close();
    }
}

export function mcpSessionFactory(options: McpSessionOptions): SessionFactory {
    return server => new McpToolSession(server, options);
}
