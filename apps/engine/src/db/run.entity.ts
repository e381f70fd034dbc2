import { z } from 'zod';
import { REVIEW_PHASES, ReviewPhase } from '@conduit/sdk';
import { ErrorRecord } from './workflow-state.entity';

export const runOptionsSchema = z.object({
    includeConsultationResponses: z.boolean().optional(),
    includePublicComments: z.boolean().optional(),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;

/** A queued request to review one planning application. */
export const runJobSchema = z.object({
    runId: z.string().min(1),
    subjectId: z.string().min(1),
    options: runOptionsSchema.optional(),
    submittedAt: z.string().optional(),
    /** Times the job was handed back after its worker died mid-run. */
    redeliveries: z.number().int().nonnegative().optional(),
});

export type RunJob = z.infer<typeof runJobSchema>;

export interface RunMetadata {
    phaseDurations: Record<string, number>;
    totalDurationSeconds: number;
    completedPhases: string[];
    errors: ErrorRecord[];
}

/**
 * Terminal outcome of a run. Cancellation is its own status so operators can
 * tell a deliberate stop from a fault.
 */
export type RunResult<A> =
    | { status: 'completed'; runId: string; subjectId: string; metadata: RunMetadata; artifacts: A }
    | { status: 'failed'; runId: string; subjectId: string; error: string; phase: ReviewPhase | null; metadata: RunMetadata }
    | { status: 'cancelled'; runId: string; subjectId: string; error: string; phase: ReviewPhase | null; metadata: RunMetadata };

const metadataSchema = z.object({
    phaseDurations: z.record(z.string(), z.number()),
    totalDurationSeconds: z.number(),
    completedPhases: z.array(z.string()),
    errors: z.array(z.object({
        phase: z.string(),
        error: z.string(),
        item: z.string().optional(),
        timestamp: z.date(),
    })),
});

const runBase = {
    runId: z.string(),
    subjectId: z.string(),
    metadata: metadataSchema,
};

/** Shape of a stored result as read back by operators; artifacts stay opaque. */
export const storedRunResultSchema = z.discriminatedUnion('status', [
    z.object({ status: z.literal('completed'), ...runBase, artifacts: z.unknown() }),
    z.object({ status: z.literal('failed'), ...runBase, error: z.string(), phase: z.enum(REVIEW_PHASES).nullable() }),
    z.object({ status: z.literal('cancelled'), ...runBase, error: z.string(), phase: z.enum(REVIEW_PHASES).nullable() }),
]);

export type StoredRunResult = z.infer<typeof storedRunResultSchema>;
