import { PhaseHandler, ToolData, fatalFailure, phaseSucceeded } from '@conduit/sdk';
import { describeError, extractErrorMessage } from '../../utils/error-message';
import { DocumentRef, ReviewArtifacts } from '../artifacts';
import { record, records, str } from '../tool-data';

const FETCH_TIMEOUT_MS = 60_000;

function toDocumentRef(doc: ToolData, index: number): DocumentRef {
    return {
        id: str(doc, 'document_id') ?? str(doc, 'id') ?? `doc-${index + 1}`,
        description: str(doc, 'description'),
        documentType: str(doc, 'document_type'),
        url: str(doc, 'url'),
        datePublished: str(doc, 'date_published'),
    };
}

// There is nothing to review without the application record, so every failure here is fatal.
export const fetchMetadata: PhaseHandler<ReviewArtifacts> = async (ctx) => {
    let result: ToolData;
    try {
        result = await ctx.tools.invoke('get_application_details', { reference: ctx.subjectId }, FETCH_TIMEOUT_MS);
    } catch (err) {
        return fatalFailure(`Scraper error: ${describeError(err)}`);
    }

    if (str(result, 'status') === 'error') {
        return fatalFailure(`Failed to fetch application: ${extractErrorMessage(result)}`);
    }

    const app = record(result, 'application') ?? result;
    const documents = records(app, 'documents').map(toDocumentRef);
    ctx.artifacts.application = {
        reference: ctx.subjectId,
        address: str(app, 'address'),
        proposal: str(app, 'proposal'),
        applicant: str(app, 'applicant'),
        status: str(app, 'status'),
        dateValidated: str(app, 'date_validated'),
        consultationEnd: str(app, 'consultation_end'),
        documents,
    };

    await ctx.progress.report(`Found ${documents.length} documents`);
    return phaseSucceeded();
};
