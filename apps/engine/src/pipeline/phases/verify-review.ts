import { PhaseHandler, ToolData, phaseSucceeded, recoverableFailure } from '@conduit/sdk';
import { describeError, extractErrorMessage } from '../../utils/error-message';
import { ReviewArtifacts } from '../artifacts';
import { str } from '../tool-data';

const VERIFY_TIMEOUT_MS = 120_000;

// An unverified review is still delivered.
export const verifyReview: PhaseHandler<ReviewArtifacts> = async (ctx) => {
    const review = ctx.artifacts.review;
    if (!review) {
        return recoverableFailure('No review to verify');
    }

    await ctx.progress.report('Verifying review');

    let result: ToolData;
    try {
        result = await ctx.tools.invoke('verify_review', { application_ref: ctx.subjectId, review }, VERIFY_TIMEOUT_MS);
    } catch (err) {
        return recoverableFailure(`Verification failed: ${describeError(err)}`);
    }
    if (str(result, 'status') === 'error') {
        return recoverableFailure(`Verification failed: ${extractErrorMessage(result)}`);
    }

    ctx.artifacts.verification = result;
    return phaseSucceeded();
};
