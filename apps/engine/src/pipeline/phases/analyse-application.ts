import { PhaseHandler, ToolData, fatalFailure, phaseSucceeded } from '@conduit/sdk';
import { describeError, extractErrorMessage } from '../../utils/error-message';
import { ReviewArtifacts, TopicEvidence } from '../artifacts';
import { list, record, str } from '../tool-data';

const SEARCH_TIMEOUT_MS = 60_000;
const ANALYSIS_TIMEOUT_MS = 300_000;
const RESULTS_PER_QUERY = 5;

/**
 * Gathers application and policy excerpts per review topic, then hands them
 * to the review agent. Missing evidence degrades the analysis; a failed
 * analysis stops the run.
 */
export function analyseApplication(topics: readonly string[]): PhaseHandler<ReviewArtifacts> {
    return async (ctx) => {
        const found = new Map<string, TopicEvidence>();

        // At most one call in flight per worker.
        const report = await ctx.fanOut(topics, async (topic) => {
            const applicationHits = await ctx.tools.invoke('search_application_docs', {
                query: topic,
                application_ref: ctx.subjectId,
                n_results: RESULTS_PER_QUERY,
            }, SEARCH_TIMEOUT_MS);
            const policyHits = await ctx.tools.invoke('search_policy', {
                query: topic,
                n_results: RESULTS_PER_QUERY,
            }, SEARCH_TIMEOUT_MS);
            found.set(topic, {
                topic,
                applicationExcerpts: list(applicationHits, 'results'),
                policyExcerpts: list(policyHits, 'results'),
            });
            return { status: 'succeeded' };
        }, { label: 'Gathering evidence' });

        ctx.artifacts.evidence = topics.flatMap(topic => {
            const evidence = found.get(topic);
            return evidence ? [evidence] : [];
        });

        await ctx.progress.report('Analysing application');

        let result: ToolData;
        try {
            result = await ctx.tools.invoke('analyse_application', {
                application_ref: ctx.subjectId,
                application: ctx.artifacts.application,
                ingested_documents: ctx.artifacts.ingestedDocuments.length,
                evidence: ctx.artifacts.evidence,
            }, ANALYSIS_TIMEOUT_MS);
        } catch (err) {
            return fatalFailure(`Analysis failed: ${describeError(err)}`, report.errors);
        }
        if (str(result, 'status') === 'error') {
            return fatalFailure(`Analysis failed: ${extractErrorMessage(result)}`, report.errors);
        }

        ctx.artifacts.analysis = record(result, 'analysis') ?? result;
        return phaseSucceeded({ itemErrors: report.errors });
    };
}
