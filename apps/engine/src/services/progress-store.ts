import { z } from 'zod';
import {
    ItemError,
    PHASE_WEIGHTS,
    ReviewPhase,
    StateRecoveryError,
    TOTAL_PHASES,
    isReviewPhase,
    phaseNumber,
} from '@conduit/sdk';
import { StateRepository } from '../repositories/state.repository';
import { WorkflowState, emptyPhaseInfo, parseWorkflowState } from '../db/workflow-state.entity';
import { describeError } from '../utils/error-message';

const TAG = '[progress]';

export type RunEventType = 'run.started' | 'run.progress' | 'run.completed' | 'run.failed' | 'run.cancelled';

export type RunOutcome =
    | { status: 'completed' }
    | { status: 'failed'; error: string }
    | { status: 'cancelled' };

interface SubProgress {
    detail: string;
    current: number | null;
    total: number | null;
}

/**
 * Durable run state and progress events. Writes are best-effort: a failed
 * save or publish is logged and the run carries on.
 */
export class ProgressStore<A> {
    // Sub-progress is per process and never persisted; fan-out workers only touch this map.
    private readonly subProgress = new Map<string, SubProgress>();
    // Highest percent published per run; events never report less.
    private readonly published = new Map<string, number>();

    constructor(
        private readonly repo: StateRepository,
        private readonly artifactsSchema: z.ZodType<A, z.ZodTypeDef, unknown>,
    ) { }

    async loadState(runId: string): Promise<WorkflowState<A> | null> {
        let raw: unknown;
        try {
            raw = await this.repo.load(runId);
        } catch (err) {
            throw new StateRecoveryError(runId, describeError(err), { cause: err });
        }
        if (raw === null || raw === undefined) {
            return null;
        }

        const parsed = parseWorkflowState(raw, this.artifactsSchema);
        if (!parsed.ok) {
            throw new StateRecoveryError(runId, parsed.error);
        }
        return parsed.state;
    }

    async saveState(state: WorkflowState<A>): Promise<void> {
        try {
            await this.repo.save(state.runId, state);
        } catch (err) {
            console.error(`${TAG} failed to save state for run ${state.runId}: ${describeError(err)}`);
        }
    }

    async deleteState(runId: string): Promise<void> {
        try {
            await this.repo.delete(runId);
        } catch (err) {
            console.error(`${TAG} failed to delete state for run ${runId}: ${describeError(err)}`);
        }
    }

    async publishEvent(type: RunEventType, state: WorkflowState<A>, fields: Record<string, unknown> = {}): Promise<void> {
        const sub = this.subProgress.get(state.runId);
        const percent = Math.max(this.published.get(state.runId) ?? 0, this.percentComplete(state));
        this.published.set(state.runId, percent);
        const event: Record<string, unknown> = {
            event: type,
            runId: state.runId,
            subjectId: state.subjectId,
            timestamp: new Date().toISOString(),
            phase: state.currentPhase,
            phaseNumber: state.currentPhase ? phaseNumber(state.currentPhase) : 0,
            totalPhases: TOTAL_PHASES,
            phaseDetail: sub?.detail ?? null,
            percentComplete: percent,
            itemsProcessed: state.itemsProcessed,
            itemsTotal: state.itemsTotal,
            ...fields,
        };

        try {
            await this.repo.publish(event);
        } catch (err) {
            console.warn(`${TAG} failed to publish ${type} for run ${state.runId}: ${describeError(err)}`);
        }
    }

    /**
     * Completed phase weights plus the in-flight share. Never 100: only the
     * completed event reports that.
     */
    percentComplete(state: WorkflowState<A>): number {
        const counted = new Set<ReviewPhase>();
        let percent = 0;
        for (const phase of state.completedPhases) {
            if (!isReviewPhase(phase) || counted.has(phase)) continue;
            counted.add(phase);
            percent += PHASE_WEIGHTS[phase];
        }

        const current = state.currentPhase;
        const sub = this.subProgress.get(state.runId);
        if (current && !counted.has(current) && sub && sub.current !== null && sub.total !== null && sub.total > 0) {
            const fraction = Math.min(sub.current, sub.total) / sub.total;
            percent += Math.floor(PHASE_WEIGHTS[current] * fraction);
        }

        return Math.max(0, Math.min(99, percent));
    }

    /** Latches `state.cancelled` on the first positive read. */
    async checkCancellation(state: WorkflowState<A>): Promise<boolean> {
        if (state.cancelled) {
            return true;
        }

        let requested: boolean;
        try {
            requested = await this.repo.isCancellationRequested(state.runId);
        } catch (err) {
            console.warn(`${TAG} cancellation check failed for run ${state.runId}: ${describeError(err)}`);
            return state.cancelled;
        }

        if (requested) {
            state.cancelled = true;
            await this.saveState(state);
        }
        return requested;
    }

    async requestCancellation(runId: string): Promise<void> {
        await this.repo.requestCancellation(runId);
    }

    async startRun(state: WorkflowState<A>, fields: Record<string, unknown> = {}): Promise<void> {
        await this.saveState(state);
        await this.publishEvent('run.started', state, fields);
    }

    async startPhase(state: WorkflowState<A>, phase: ReviewPhase): Promise<void> {
        state.currentPhase = phase;
        state.phaseInfo[phase] = { ...emptyPhaseInfo(), startedAt: new Date() };
        this.subProgress.set(state.runId, { detail: `Starting ${phase}`, current: null, total: null });

        await this.saveState(state);
        await this.publishEvent('run.progress', state);
    }

    /**
     * Publishes only; sub-progress ticks are never persisted. A report
     * without counts changes the detail and keeps the last known counts.
     */
    async reportSubProgress(
        state: WorkflowState<A>,
        detail: string,
        current?: number,
        total?: number,
    ): Promise<void> {
        const previous = this.subProgress.get(state.runId);
        this.subProgress.set(state.runId, {
            detail,
            current: current ?? previous?.current ?? null,
            total: total ?? previous?.total ?? null,
        });
        await this.publishEvent('run.progress', state);
    }

    /** Marks the phase attempted. `error` is set for a recoverable failure. */
    async completePhase(state: WorkflowState<A>, phase: ReviewPhase, error: string | null = null): Promise<void> {
        this.closePhaseInfo(state, phase, error);
        if (!state.completedPhases.includes(phase)) {
            state.completedPhases.push(phase);
        }
        this.subProgress.delete(state.runId);

        await this.saveState(state);
        await this.publishEvent('run.progress', state, error ? { phaseError: error } : {});
    }

    /** Closes the phase record without marking it completed. */
    async failPhase(state: WorkflowState<A>, phase: ReviewPhase, error: string): Promise<void> {
        this.closePhaseInfo(state, phase, error);
        this.subProgress.delete(state.runId);
        await this.saveState(state);
    }

    async recordError(state: WorkflowState<A>, phase: ReviewPhase, error: string, item?: string): Promise<void> {
        state.errorsEncountered.push({
            phase,
            error,
            ...(item !== undefined ? { item } : {}),
            timestamp: new Date(),
        });
        await this.saveState(state);
    }

    async recordItemErrors(state: WorkflowState<A>, phase: ReviewPhase, errors: readonly ItemError[]): Promise<void> {
        if (errors.length === 0) return;
        const timestamp = new Date();
        for (const { item, error } of errors) {
            state.errorsEncountered.push({ phase, error, item, timestamp });
        }
        await this.saveState(state);
    }

    /**
     * Completed runs publish 100% and drop their state. Failed and cancelled
     * runs keep it for inspection and resume.
     */
    async finishRun(state: WorkflowState<A>, outcome: RunOutcome): Promise<void> {
        this.subProgress.delete(state.runId);

        switch (outcome.status) {
            case 'completed':
                await this.publishEvent('run.completed', state, { percentComplete: 100 });
                await this.deleteState(state.runId);
                break;
            case 'failed':
                await this.saveState(state);
                await this.publishEvent('run.failed', state, { error: outcome.error });
                break;
            case 'cancelled':
                await this.saveState(state);
                await this.publishEvent('run.cancelled', state, { error: 'run cancelled' });
                break;
        }
        this.published.delete(state.runId);
    }

    private closePhaseInfo(state: WorkflowState<A>, phase: ReviewPhase, error: string | null): void {
        const info = state.phaseInfo[phase] ?? emptyPhaseInfo();
        const completedAt = new Date();
        info.completedAt = completedAt;
        info.durationSeconds = info.startedAt
            ? (completedAt.getTime() - info.startedAt.getTime()) / 1000
            : null;
        info.error = error;
        state.phaseInfo[phase] = info;
    }
}
