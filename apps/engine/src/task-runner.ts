import { ToolClient } from '@conduit/sdk';
import { EngineConfig } from './config';
import { RunJob, RunResult } from './db/run.entity';
import { StateRepository } from './repositories/state.repository';
import { ProgressStore } from './services/progress-store';
import { WorkflowEngine } from './services/workflow-engine';
import { ReviewArtifacts, buildReviewPipeline } from './pipeline';
import { describeError } from './utils/error-message';

const TAG = '[engine]';

export interface RunDependencies {
    tools: ToolClient;
    stateRepo: StateRepository;
    config: Pick<EngineConfig, 'reviewTopics' | 'destinations' | 'fanOutConcurrency'>;
}

export async function runJob(deps: RunDependencies, job: RunJob): Promise<RunResult<ReviewArtifacts>> {
    console.log(`${TAG} processing run ${job.runId} (${job.subjectId})`);

    const pipeline = buildReviewPipeline({
        reviewTopics: deps.config.reviewTopics,
        destinations: deps.config.destinations,
        options: job.options,
    });
    const store = new ProgressStore(deps.stateRepo, pipeline.artifactsSchema);
    const engine = new WorkflowEngine(store, deps.tools, pipeline, {
        fanOutConcurrency: deps.config.fanOutConcurrency,
    });

    // a resubmitted run must not report the previous attempt's outcome
    try {
        await deps.stateRepo.clearResult(job.runId);
    } catch (err) {
        console.error(`${TAG} failed to clear previous result for run ${job.runId}: ${describeError(err)}`);
    }

    const result = await engine.run(job.runId, job.subjectId);

    try {
        await deps.stateRepo.saveResult(job.runId, result);
    } catch (err) {
        console.error(`${TAG} failed to store result for run ${job.runId}: ${describeError(err)}`);
    }

    if (result.status === 'completed') {
        console.log(`${TAG} completed run ${job.runId}`);
    } else {
        console.error(`${TAG} run ${job.runId} ${result.status}: ${result.error}`);
    }
    return result;
}
