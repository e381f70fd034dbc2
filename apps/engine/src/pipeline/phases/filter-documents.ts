import { PhaseHandler, phaseSucceeded } from '@conduit/sdk';
import { RunOptions } from '../../db/run.entity';
import { DocumentRef, ReviewArtifacts } from '../artifacts';

const TAG = '[filter]';

export type DocumentCategory = 'public_comment' | 'consultation_response' | 'application';

export function categorize(doc: DocumentRef): DocumentCategory {
    const label = `${doc.documentType ?? ''} ${doc.description ?? ''}`.toLowerCase();
    if (label.includes('comment') || label.includes('representation') || label.includes('objection')) {
        return 'public_comment';
    }
    if (label.includes('consult')) {
        return 'consultation_response';
    }
    return 'application';
}

export function selectDocuments(documents: readonly DocumentRef[], options: RunOptions): DocumentRef[] {
    return documents.filter(doc => {
        switch (categorize(doc)) {
            case 'public_comment':
                return options.includePublicComments === true;
            case 'consultation_response':
                return options.includeConsultationResponses === true;
            case 'application':
                return true;
        }
    });
}

export function filterDocuments(options: RunOptions): PhaseHandler<ReviewArtifacts> {
    return async (ctx) => {
        const documents = ctx.artifacts.application?.documents ?? [];
        const selected = selectDocuments(documents, options);

        ctx.artifacts.selectedDocuments = selected;
        ctx.artifacts.excludedDocuments = documents.length - selected.length;

        if (selected.length === 0) {
            console.warn(`${TAG} run ${ctx.runId}: no documents selected out of ${documents.length}`);
        }
        await ctx.progress.report(`Selected ${selected.length} of ${documents.length} documents`, selected.length, documents.length);
        return phaseSucceeded({ itemsProcessed: selected.length, itemsTotal: documents.length });
    };
}
