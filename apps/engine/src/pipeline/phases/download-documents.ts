import { ItemError, PhaseHandler, ToolData, fatalFailure, phaseSucceeded } from '@conduit/sdk';
import { describeError, extractErrorMessage } from '../../utils/error-message';
import { ReviewArtifacts } from '../artifacts';
import { isRecord, list, records, str } from '../tool-data';

const TAG = '[download]';
const DOWNLOAD_TIMEOUT_MS = 300_000;

function failedDownload(entry: unknown): ItemError {
    if (!isRecord(entry)) {
        return { item: String(entry), error: 'Download failed' };
    }
    return {
        item: str(entry, 'document_id') ?? str(entry, 'url') ?? 'unknown',
        error: extractErrorMessage(entry),
    };
}

export const downloadDocuments: PhaseHandler<ReviewArtifacts> = async (ctx) => {
    const selected = ctx.artifacts.selectedDocuments;
    if (selected.length === 0) {
        console.warn(`${TAG} run ${ctx.runId}: nothing to download`);
        ctx.artifacts.documentPaths = [];
        return phaseSucceeded({ itemsProcessed: 0, itemsTotal: 0 });
    }

    await ctx.progress.report(`Downloading ${selected.length} documents`, 0, selected.length);

    let result: ToolData;
    try {
        result = await ctx.tools.invoke('download_all_documents', {
            reference: ctx.subjectId,
            document_list: selected.map(doc => ({
                document_id: doc.id,
                description: doc.description,
                document_type: doc.documentType,
                url: doc.url,
            })),
        }, DOWNLOAD_TIMEOUT_MS);
    } catch (err) {
        return fatalFailure(`Download error: ${describeError(err)}`);
    }

    const paths = records(result, 'downloaded')
        .map(entry => str(entry, 'path'))
        .filter((path): path is string => path !== null);
    const itemErrors = list(result, 'failed').map(failedDownload);

    ctx.artifacts.documentPaths = paths;
    await ctx.progress.report(`Downloaded ${paths.length} of ${selected.length} documents`, paths.length, selected.length);
    return phaseSucceeded({ itemsProcessed: paths.length, itemsTotal: selected.length, itemErrors });
};
