import { PhaseHandler, ToolData, fatalFailure, phaseSucceeded } from '@conduit/sdk';
import { describeError, extractErrorMessage } from '../../utils/error-message';
import { ReviewArtifacts } from '../artifacts';
import { record, str } from '../tool-data';

const GENERATE_TIMEOUT_MS = 300_000;

export const generateReview: PhaseHandler<ReviewArtifacts> = async (ctx) => {
    await ctx.progress.report('Generating review');

    let result: ToolData;
    try {
        result = await ctx.tools.invoke('generate_review', {
            application_ref: ctx.subjectId,
            application: ctx.artifacts.application,
            analysis: ctx.artifacts.analysis,
            route_assessments: ctx.artifacts.routeAssessments,
        }, GENERATE_TIMEOUT_MS);
    } catch (err) {
        return fatalFailure(`Review generation failed: ${describeError(err)}`);
    }
    if (str(result, 'status') === 'error') {
        return fatalFailure(`Review generation failed: ${extractErrorMessage(result)}`);
    }

    ctx.artifacts.review = record(result, 'review') ?? result;
    return phaseSucceeded();
};
