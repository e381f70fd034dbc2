import { PhaseHandler, fanOutOutcome } from '@conduit/sdk';
import { extractErrorMessage } from '../../utils/error-message';
import { ReviewArtifacts } from '../artifacts';
import { str } from '../tool-data';

const INGEST_TIMEOUT_MS = 120_000;
const INGESTED = new Set(['success', 'already_ingested']);

export const ingestDocuments: PhaseHandler<ReviewArtifacts> = async (ctx) => {
    const paths = ctx.artifacts.documentPaths;

    const report = await ctx.fanOut(paths, async (path) => {
        const result = await ctx.tools.invoke('ingest_document', {
            file_path: path,
            application_ref: ctx.subjectId,
        }, INGEST_TIMEOUT_MS);

        const status = str(result, 'status');
        if (status !== null && INGESTED.has(status)) {
            return { status: 'succeeded' };
        }
        if (status === 'skipped') {
            return { status: 'skipped', reason: str(result, 'reason') ?? undefined };
        }
        return { status: 'failed', error: extractErrorMessage(result) };
    }, { label: 'Ingesting documents' });

    ctx.artifacts.ingestedDocuments = report.succeeded;
    return fanOutOutcome(report, 'No documents could be ingested');
};
