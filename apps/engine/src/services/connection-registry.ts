import { UnknownToolError } from '@conduit/sdk';
import { ServerConfig } from '../config';

export interface ServerConnectionState {
    serverName: string;
    connected: boolean;
    consecutiveFailures: number;
    lastError: string | null;
    availableTools: Set<string>;
}

export interface ToolLocation {
    name: string;
    server: string;
}

/**
 * Static routing table plus per-server health. Each field update is an
 * independent write, so concurrent runs may share one registry.
 */
export class ConnectionRegistry {
    private readonly servers = new Map<string, ServerConfig>();
    private readonly routes = new Map<string, string>();
    private readonly states = new Map<string, ServerConnectionState>();

    constructor(configs: readonly ServerConfig[]) {
        for (const config of configs) {
            if (this.servers.has(config.name)) {
                throw new Error(`Duplicate server name: ${config.name}`);
            }
            this.servers.set(config.name, config);
            this.states.set(config.name, {
                serverName: config.name,
                connected: false,
                consecutiveFailures: 0,
                lastError: null,
                availableTools: new Set(),
            });

            for (const tool of config.tools) {
                const owner = this.routes.get(tool);
                if (owner !== undefined) {
                    throw new Error(`Tool ${tool} is claimed by both ${owner} and ${config.name}`);
                }
                this.routes.set(tool, config.name);
            }
        }
    }

    serverFor(toolName: string): ServerConfig {
        const name = this.routes.get(toolName);
        const server = name === undefined ? undefined : this.servers.get(name);
        if (!server) {
            throw new UnknownToolError(toolName);
        }
        return server;
    }

    getServer(serverName: string): ServerConfig | undefined {
        return this.servers.get(serverName);
    }

    serverNames(): string[] {
        return [...this.servers.keys()];
    }

    getState(serverName: string): ServerConnectionState | undefined {
        return this.states.get(serverName);
    }

    snapshot(): ServerConnectionState[] {
        return [...this.states.values()].map(state => ({ ...state, availableTools: new Set(state.availableTools) }));
    }

    /**
     * Listed tools win over the configured list. Without a listing the
     * configured tools are assumed once the server has answered.
     */
    markSuccess(serverName: string, listedTools?: readonly string[]): void {
        const state = this.requireState(serverName);
        state.connected = true;
        state.consecutiveFailures = 0;
        state.lastError = null;

        if (listedTools) {
            state.availableTools = new Set(listedTools);
        } else if (state.availableTools.size === 0) {
            state.availableTools = new Set(this.servers.get(serverName)?.tools ?? []);
        }
    }

    /** `disconnected` is false for failures the server reported itself. */
    markFailure(serverName: string, error: string, disconnected: boolean): void {
        const state = this.requireState(serverName);
        state.consecutiveFailures += 1;
        state.lastError = error;
        if (disconnected) {
            state.connected = false;
        }
    }

    listAvailableTools(): ToolLocation[] {
        const tools: ToolLocation[] = [];
        for (const state of this.states.values()) {
            if (!state.connected) continue;
            for (const name of state.availableTools) {
                tools.push({ name, server: state.serverName });
            }
        }
        return tools;
    }

    private requireState(serverName: string): ServerConnectionState {
        const state = this.states.get(serverName);
        if (!state) {
            throw new Error(`Unknown server: ${serverName}`);
        }
        return state;
    }
}
