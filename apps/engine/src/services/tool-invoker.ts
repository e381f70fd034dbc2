import {
    AllServersUnavailable,
    ConnectionFailure,
    ToolArgs,
    ToolClient,
    ToolData,
    ToolFailure,
    ToolPayload,
} from '@conduit/sdk';
import { BackoffConfig, ServerConfig } from '../config';
import { calculateBackOff } from '../utils/backoff';
import { describeError } from '../utils/error-message';
import { sleep, withTimeout } from '../utils/timeout';
import { ConnectionRegistry } from './connection-registry';
import { SessionFactory, ToolSession } from './tool-session';
import { coercePayload, normalizeToolResult } from './tool-result';

const TAG = '[invoker]';

export interface ToolInvokerOptions {
    defaultTimeoutMs: number;
    connectTimeoutMs: number;
    /** Attempts at opening a session before giving up. The tool call itself is never retried. */
    connectRetries: number;
    backoff: BackoffConfig;
    sleep?: (ms: number) => Promise<void>;
}

export class ToolInvoker implements ToolClient {
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        private readonly registry: ConnectionRegistry,
        private readonly createSession: SessionFactory,
        private readonly options: ToolInvokerOptions,
    ) {
        this.sleep = options.sleep ?? sleep;
    }

    async invoke(toolName: string, args: ToolArgs, timeoutMs?: number): Promise<ToolData> {
        return coercePayload(await this.call(toolName, args, timeoutMs));
    }

    async call(toolName: string, args: ToolArgs, timeoutMs: number = this.options.defaultTimeoutMs): Promise<ToolPayload> {
        const server = this.registry.serverFor(toolName);
        const session = await this.openSession(server, this.options.connectRetries);

        try {
            const raw = await withTimeout(
                session.callTool(toolName, args, timeoutMs),
                timeoutMs,
                () => new ToolFailure(toolName, `Timed out after ${timeoutMs}ms`, { timedOut: true, timeoutMs }),
            );
            const payload = normalizeToolResult(toolName, raw);
            this.registry.markSuccess(server.name);
            return payload;
        } catch (err) {
            if (err instanceof ToolFailure) {
                // the session answered; a slow or failing tool is not a broken server
                this.registry.markFailure(server.name, err.message, false);
                throw err;
            }
            const message = describeError(err);
            this.registry.markFailure(server.name, message, true);
            throw new ConnectionFailure(server.name, message, { cause: err });
        } finally {
            await this.closeQuietly(session, server.name);
        }
    }

    /** Handshake only. Never throws. */
    async checkHealth(serverName: string): Promise<boolean> {
        const server = this.registry.getServer(serverName);
        if (!server) {
            console.warn(`${TAG} health check for unknown server ${serverName}`);
            return false;
        }

        try {
            const session = await this.openSession(server, 1);
            await this.closeQuietly(session, server.name);
            this.registry.markSuccess(server.name);
            return true;
        } catch (err) {
            console.warn(`${TAG} ${serverName} unhealthy: ${describeError(err)}`);
            return false;
        }
    }

    /**
     * Probes every server concurrently and records its tool listing.
     * Fails only when no server answers.
     */
    async initializeAll(): Promise<void> {
        const names = this.registry.serverNames();
        const failures: Record<string, string> = {};

        const results = await Promise.all(names.map(async name => {
            try {
                const tools = await this.probe(name);
                console.log(`${TAG} ${name} ready (${tools.length} tools)`);
                return true;
            } catch (err) {
                failures[name] = describeError(err);
                console.error(`${TAG} ${name} unavailable: ${failures[name]}`);
                return false;
            }
        }));

        const connected = results.filter(Boolean).length;
        if (connected === 0) {
            throw new AllServersUnavailable(failures);
        }
        console.log(`${TAG} ${connected}/${names.length} servers connected`);
    }

    private async probe(serverName: string): Promise<string[]> {
        const server = this.registry.getServer(serverName);
        if (!server) {
            throw new Error(`Unknown server: ${serverName}`);
        }

        const session = await this.openSession(server, this.options.connectRetries);
        try {
            const tools = await session.listTools(this.options.connectTimeoutMs);
            this.registry.markSuccess(server.name, tools);
            return tools;
        } catch (err) {
            const message = describeError(err);
            this.registry.markFailure(server.name, message, true);
            throw new ConnectionFailure(server.name, message, { cause: err });
        } finally {
            await this.closeQuietly(session, server.name);
        }
    }

    private async openSession(server: ServerConfig, attempts: number): Promise<ToolSession> {
        let lastError: unknown = null;

        for (let attempt = 1; attempt <= attempts; attempt++) {
            const session = this.createSession(server);
            try {
                await session.open(this.options.connectTimeoutMs);
                return session;
            } catch (err) {
                lastError = err;
                await this.closeQuietly(session, server.name);

                if (attempt < attempts) {
                    const delay = calculateBackOff(attempt, this.options.backoff);
                    console.warn(`${TAG} ${server.name} connect attempt ${attempt}/${attempts} failed, retrying in ${delay}ms: ${describeError(err)}`);
                    await this.sleep(delay);
                }
            }
        }

        const message = `Failed to connect after ${attempts} attempt(s): ${describeError(lastError)}`;
        this.registry.markFailure(server.name, message, true);
        throw new ConnectionFailure(server.name, message, { cause: lastError });
    }

    private async closeQuietly(session: ToolSession, serverName: string): Promise<void> {
        try {
            await session.close();
        } catch (err) {
            console.warn(`${TAG} ${serverName} session close failed: ${describeError(err)}`);
        }
    }
}
