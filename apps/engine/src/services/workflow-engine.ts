import { z } from 'zod';
import {
    FanOutOptions,
    ItemWorker,
    PhaseContext,
    PhaseDescriptor,
    PhaseResult,
    ReviewPhase,
    StateRecoveryError,
    ToolClient,
    fatalFailure,
} from '@conduit/sdk';
import { WorkflowState, createWorkflowState } from '../db/workflow-state.entity';
import { RunMetadata, RunResult } from '../db/run.entity';
import { describeError } from '../utils/error-message';
import { ProgressStore } from './progress-store';
import { runFanOut } from './fan-out';

const TAG = '[engine]';

export const CANCELLED_MESSAGE = 'run cancelled';

/** A compiled phase sequence plus the shape of the artifacts it passes along. */
export interface Pipeline<A> {
    phases: readonly PhaseDescriptor<A>[];
    artifactsSchema: z.ZodType<A, z.ZodTypeDef, unknown>;
    initialArtifacts(): A;
}

export interface WorkflowEngineOptions {
    fanOutConcurrency: number;
}

/**
 * Drives one run through the pipeline's phases in order. Never throws:
 * every path ends in a RunResult.
 */
export class WorkflowEngine<A> {
    constructor(
        private readonly store: ProgressStore<A>,
        private readonly tools: ToolClient,
        private readonly pipeline: Pipeline<A>,
        private readonly options: WorkflowEngineOptions,
    ) { }

    async run(runId: string, subjectId: string): Promise<RunResult<A>> {
        let state: WorkflowState<A> | null = null;

        try {
            state = await this.restore(runId, subjectId);
            const resumeIndex = this.resumeIndex(state);
            const phases = this.pipeline.phases;

            if (resumeIndex > 0) {
                console.log(`${TAG} run ${runId} resuming at ${phases[resumeIndex]?.phase ?? 'end'} (${resumeIndex} phase(s) already done)`);
            }
            await this.store.startRun(state, {
                resumed: resumeIndex > 0,
                resumeFrom: phases[resumeIndex]?.phase ?? null,
            });

            for (const descriptor of phases.slice(resumeIndex)) {
                if (await this.store.checkCancellation(state)) {
                    return await this.cancelled(state);
                }

                const { phase } = descriptor;
                await this.store.startPhase(state, phase);
                const result = await this.runPhase(state, descriptor);

                if (result.itemErrors && result.itemErrors.length > 0) {
                    await this.store.recordItemErrors(state, phase, result.itemErrors);
                }

                if (result.ok) {
                    if (result.itemsTotal !== undefined) {
                        state.itemsTotal = result.itemsTotal;
                        state.itemsProcessed = result.itemsProcessed ?? 0;
                    }
                    await this.store.completePhase(state, phase);
                    continue;
                }

                await this.store.recordError(state, phase, result.error);
                if (result.recoverable) {
                    console.warn(`${TAG} run ${runId} phase ${phase} failed, continuing degraded: ${result.error}`);
                    await this.store.completePhase(state, phase, result.error);
                    continue;
                }

                console.error(`${TAG} run ${runId} phase ${phase} failed: ${result.error}`);
                await this.store.failPhase(state, phase, result.error);
                return await this.failed(state, result.error);
            }

            return await this.completed(state);
        } catch (err) {
            // store methods swallow their own I/O errors; this is a bug path
            const message = describeError(err);
            console.error(`${TAG} run ${runId} aborted:`, err);
            if (state) {
                return await this.failed(state, message);
            }
            return {
                status: 'failed',
                runId,
                subjectId,
                error: message,
                phase: null,
                metadata: { phaseDurations: {}, totalDurationSeconds: 0, completedPhases: [], errors: [] },
            };
        }
    }

    private async restore(runId: string, subjectId: string): Promise<WorkflowState<A>> {
        let state: WorkflowState<A> | null = null;
        try {
            state = await this.store.loadState(runId);
        } catch (err) {
            if (!(err instanceof StateRecoveryError)) throw err;
            console.warn(`${TAG} ${err.message}; starting fresh`);
        }

        if (state && state.subjectId !== subjectId) {
            console.warn(`${TAG} run ${runId} state belongs to ${state.subjectId}, not ${subjectId}; starting fresh`);
            state = null;
        }
        if (!state) {
            return createWorkflowState(runId, subjectId, this.pipeline.initialArtifacts());
        }

        // A latched cancellation belongs to the previous attempt; the flag is re-read before each phase.
        state.cancelled = false;
        return state;
    }

    /**
     * Index of the first phase not yet completed. Only a strict prefix is
     * skipped; entries past it are stale and dropped so they neither skip
     * a phase nor count towards progress.
     */
    private resumeIndex(state: WorkflowState<A>): number {
        const phases = this.pipeline.phases;
        let index = 0;
        while (index < phases.length && state.completedPhases.includes(phases[index].phase)) {
            index++;
        }

        const prefix: string[] = phases.slice(0, index).map(d => d.phase);
        const dropped = state.completedPhases.filter(phase => !prefix.includes(phase));
        if (dropped.length > 0) {
            console.warn(`${TAG} run ${state.runId} dropping stale completed phases: ${dropped.join(', ')}`);
        }
        state.completedPhases = prefix;
        return index;
    }

    private async runPhase(state: WorkflowState<A>, descriptor: PhaseDescriptor<A>): Promise<PhaseResult> {
        const ctx = this.createContext(state, descriptor.phase);
        try {
            const result = await descriptor.handler(ctx);
            state.artifacts = ctx.artifacts;
            return result;
        } catch (err) {
            console.error(`${TAG} run ${state.runId} handler for ${descriptor.phase} threw:`, err);
            return fatalFailure(describeError(err));
        }
    }

    private createContext(state: WorkflowState<A>, phase: ReviewPhase): PhaseContext<A> {
        const store = this.store;
        const concurrency = this.options.fanOutConcurrency;

        return {
            runId: state.runId,
            subjectId: state.subjectId,
            phase,
            artifacts: structuredClone(state.artifacts),
            tools: this.tools,
            progress: {
                report: (detail, current, total) => store.reportSubProgress(state, detail, current, total),
            },
            fanOut<T>(items: readonly T[], worker: ItemWorker<T>, opts: FanOutOptions<T> = {}) {
                const label = opts.label ?? `Processing ${phase}`;
                return runFanOut(items, worker, {
                    concurrency,
                    describe: opts.describe,
                    onProgress: p => store.reportSubProgress(
                        state,
                        `${label} (${p.succeeded + p.failed + p.skipped} of ${p.total})`,
                        p.succeeded + p.failed + p.skipped,
                        p.total,
                    ),
                });
            },
        };
    }

    private metadata(state: WorkflowState<A>): RunMetadata {
        const phaseDurations: Record<string, number> = {};
        for (const [phase, info] of Object.entries(state.phaseInfo)) {
            if (info.durationSeconds !== null) {
                phaseDurations[phase] = info.durationSeconds;
            }
        }
        return {
            phaseDurations,
            totalDurationSeconds: (Date.now() - state.startedAt.getTime()) / 1000,
            completedPhases: [...state.completedPhases],
            errors: [...state.errorsEncountered],
        };
    }

    private async completed(state: WorkflowState<A>): Promise<RunResult<A>> {
        await this.store.finishRun(state, { status: 'completed' });
        console.log(`${TAG} run ${state.runId} completed with ${state.errorsEncountered.length} recorded error(s)`);
        return {
            status: 'completed',
            runId: state.runId,
            subjectId: state.subjectId,
            metadata: this.metadata(state),
            artifacts: state.artifacts,
        };
    }

    private async failed(state: WorkflowState<A>, error: string): Promise<RunResult<A>> {
        await this.store.finishRun(state, { status: 'failed', error });
        return {
            status: 'failed',
            runId: state.runId,
            subjectId: state.subjectId,
            error,
            phase: state.currentPhase,
            metadata: this.metadata(state),
        };
    }

    private async cancelled(state: WorkflowState<A>): Promise<RunResult<A>> {
        console.log(`${TAG} run ${state.runId} cancelled before ${this.nextPhase(state) ?? 'completion'}`);
        await this.store.finishRun(state, { status: 'cancelled' });
        return {
            status: 'cancelled',
            runId: state.runId,
            subjectId: state.subjectId,
            error: CANCELLED_MESSAGE,
            phase: state.currentPhase,
            metadata: this.metadata(state),
        };
    }

    private nextPhase(state: WorkflowState<A>): ReviewPhase | undefined {
        return this.pipeline.phases.find(d => !state.completedPhases.includes(d.phase))?.phase;
    }
}
