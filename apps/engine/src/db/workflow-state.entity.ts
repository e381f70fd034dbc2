import { z } from 'zod';
import { ReviewPhase, REVIEW_PHASES } from '@conduit/sdk';

export interface PhaseInfo {
    startedAt: Date | null;
    completedAt: Date | null;
    durationSeconds: number | null;
    error: string | null;
}

export interface ErrorRecord {
    phase: string;
    error: string;
    item?: string;
    timestamp: Date;
}

/**
 * Durable snapshot of one run. Rewritten on every phase transition and every
 * recorded error, deleted when the run completes.
 *
 * `completedPhases` is kept as plain strings: a state written by an older
 * deployment may name phases this build no longer has.
 */
export interface WorkflowState<A> {
    runId: string;
    subjectId: string;
    currentPhase: ReviewPhase | null;
    completedPhases: string[];
    phaseInfo: Record<string, PhaseInfo>;
    itemsProcessed: number;
    itemsTotal: number;
    errorsEncountered: ErrorRecord[];
    startedAt: Date;
    cancelled: boolean;
    artifacts: A;
}

const phaseInfoSchema = z.object({
    startedAt: z.date().nullable(),
    completedAt: z.date().nullable(),
    durationSeconds: z.number().nullable(),
    error: z.string().nullable(),
});

const errorRecordSchema = z.object({
    phase: z.string(),
    error: z.string(),
    item: z.string().optional(),
    timestamp: z.date(),
});

// Artifacts are validated separately against the pipeline's own schema.
const stateEnvelopeSchema = z.object({
    runId: z.string().min(1),
    subjectId: z.string().min(1),
    currentPhase: z.enum(REVIEW_PHASES).nullable(),
    completedPhases: z.array(z.string()),
    phaseInfo: z.record(z.string(), phaseInfoSchema),
    itemsProcessed: z.number().int().nonnegative(),
    itemsTotal: z.number().int().nonnegative(),
    errorsEncountered: z.array(errorRecordSchema),
    startedAt: z.date(),
    cancelled: z.boolean(),
    artifacts: z.unknown(),
});

export type StateParseResult<A> =
    | { ok: true; state: WorkflowState<A> }
    | { ok: false; error: string };

export function parseWorkflowState<A>(
    raw: unknown,
    artifactsSchema: z.ZodType<A, z.ZodTypeDef, unknown>,
): StateParseResult<A> {
    const envelope = stateEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
        return { ok: false, error: envelope.error.issues.map(formatIssue).join('; ') };
    }
    const artifacts = artifactsSchema.safeParse(envelope.data.artifacts);
    if (!artifacts.success) {
        return { ok: false, error: `artifacts: ${artifacts.error.issues.map(formatIssue).join('; ')}` };
    }
    return { ok: true, state: { ...envelope.data, artifacts: artifacts.data } };
}

function formatIssue(issue: z.ZodIssue): string {
    return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export function createWorkflowState<A>(runId: string, subjectId: string, artifacts: A): WorkflowState<A> {
    return {
        runId,
        subjectId,
        currentPhase: null,
        completedPhases: [],
        phaseInfo: {},
        itemsProcessed: 0,
        itemsTotal: 0,
        errorsEncountered: [],
        startedAt: new Date(),
        cancelled: false,
        artifacts,
    };
}

export function emptyPhaseInfo(): PhaseInfo {
    return { startedAt: null, completedAt: null, durationSeconds: null, error: null };
}
