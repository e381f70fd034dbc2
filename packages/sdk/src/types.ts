import { ReviewPhase } from './phases';

export type ToolArgs = Record<string, unknown>;
export type ToolData = Record<string, unknown>;

// A tool result after normalization at the RPC boundary. Raw text is kept
// apart so callers decide when to coerce it.
export type ToolPayload =
    | { kind: 'structured'; data: ToolData }
    | { kind: 'raw'; text: string };

export interface ToolClient {
    invoke(toolName: string, args: ToolArgs, timeoutMs?: number): Promise<ToolData>;
}

export interface ItemError {
    item: string;
    error: string;
}

export type PhaseResult =
    | {
        ok: true;
        itemsProcessed?: number;
        itemsTotal?: number;
        itemErrors?: ItemError[];
    }
    | {
        ok: false;
        recoverable: boolean;
        error: string;
        itemErrors?: ItemError[];
    };

export type ItemOutcome =
    | { status: 'succeeded' }
    | { status: 'skipped'; reason?: string }
    | { status: 'failed'; error: string };

export interface FanOutProgress {
    total: number;
    succeeded: number;
    failed: number;
    skipped: number;
}

export interface FanOutReport<T> {
    total: number;
    succeeded: T[];
    skipped: T[];
    failed: Array<{ item: T; error: string }>;
    /** One entry per failed item, labelled for the run's error log. */
    errors: ItemError[];
}

export interface FanOutOptions<T> {
    /** Label used for an item in error records. Defaults to String(item). */
    describe?: (item: T) => string;
    /** Sub-progress detail, e.g. "Ingesting documents". */
    label?: string;
}

export type ItemWorker<T> = (item: T, index: number) => Promise<ItemOutcome>;

export interface SubProgressReporter {
    report(detail: string, current?: number, total?: number): Promise<void>;
}

export interface PhaseContext<A> {
    runId: string;
    subjectId: string;
    phase: ReviewPhase;
    /** Working copy of the run artifacts. Committed to state when the handler returns. */
    artifacts: A;
    tools: ToolClient;
    progress: SubProgressReporter;
    fanOut<T>(items: readonly T[], worker: ItemWorker<T>, opts?: FanOutOptions<T>): Promise<FanOutReport<T>>;
}

export type PhaseHandler<A> = (ctx: PhaseContext<A>) => Promise<PhaseResult>;

export interface PhaseDescriptor<A> {
    phase: ReviewPhase;
    weight: number;
    handler: PhaseHandler<A>;
}
