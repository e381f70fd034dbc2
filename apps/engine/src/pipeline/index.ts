import { PHASE_WEIGHTS, PhaseHandler, REVIEW_PHASES, ReviewPhase } from '@conduit/sdk';
import { Destination } from '../config';
import { RunOptions } from '../db/run.entity';
import { Pipeline } from '../services/workflow-engine';
import { ReviewArtifacts, initialArtifacts, reviewArtifactsSchema } from './artifacts';
import { fetchMetadata } from './phases/fetch-metadata';
import { filterDocuments } from './phases/filter-documents';
import { downloadDocuments } from './phases/download-documents';
import { ingestDocuments } from './phases/ingest-documents';
import { analyseApplication } from './phases/analyse-application';
import { assessRoutes } from './phases/assess-routes';
import { generateReview } from './phases/generate-review';
import { verifyReview } from './phases/verify-review';

export interface ReviewPipelineSettings {
    reviewTopics: readonly string[];
    destinations: readonly Destination[];
    options?: RunOptions;
}

export function buildReviewPipeline(settings: ReviewPipelineSettings): Pipeline<ReviewArtifacts> {
    // Keyed by phase so a missing handler is a compile error.
    const handlers: Record<ReviewPhase, PhaseHandler<ReviewArtifacts>> = {
        fetching_metadata: fetchMetadata,
        filtering_documents: filterDocuments(settings.options ?? {}),
        downloading_documents: downloadDocuments,
        ingesting_documents: ingestDocuments,
        analysing_application: analyseApplication(settings.reviewTopics),
        assessing_routes: assessRoutes(settings.destinations),
        generating_review: generateReview,
        verifying_review: verifyReview,
    };

    return {
        phases: REVIEW_PHASES.map(phase => ({ phase, weight: PHASE_WEIGHTS[phase], handler: handlers[phase] })),
        artifactsSchema: reviewArtifactsSchema,
        initialArtifacts,
    };
}

export { ReviewArtifacts, reviewArtifactsSchema, initialArtifacts } from './artifacts';
