/**
 * Typed failures shared by the engine and phase handlers.
 * Handlers branch on these with `instanceof` to decide recoverability.
 */

/** Tool name missing from the routing table. A configuration bug, never retried. */
export class UnknownToolError extends Error {
    constructor(public readonly toolName: string) {
        super(`Unknown tool: ${toolName}`);
        this.name = 'UnknownToolError';
    }
}

/** Transport or session level failure talking to one tool server. */
export class ConnectionFailure extends Error {
    constructor(
        public readonly serverName: string,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(`${serverName}: ${message}`, options);
        this.name = 'ConnectionFailure';
    }
}

/**
 * The remote tool ran but reported an error, returned something unusable,
 * or did not answer within its timeout.
 */
export class ToolFailure extends Error {
    public readonly timedOut: boolean;

    constructor(
        public readonly toolName: string,
        message: string,
        public readonly details: Record<string, unknown> = {},
    ) {
        super(message);
        this.name = 'ToolFailure';
        this.timedOut = details.timedOut === true;
    }
}

/** Raised at start-up when not a single configured server answered. */
export class AllServersUnavailable extends Error {
    constructor(public readonly failures: Readonly<Record<string, string>>) {
        const servers = Object.keys(failures);
        super(`All tool servers are unavailable (${servers.length > 0 ? servers.join(', ') : 'none configured'})`);
        this.name = 'AllServersUnavailable';
    }
}

/** Persisted run state could not be read back. Callers start the run fresh. */
export class StateRecoveryError extends Error {
    constructor(
        public readonly runId: string,
        message: string,
        options?: { cause?: unknown },
    ) {
        super(`Failed to recover state for run ${runId}: ${message}`, options);
        this.name = 'StateRecoveryError';
    }
}
