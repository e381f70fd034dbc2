import { ConnectionFailure } from '@conduit/sdk';
import { fetchMetadata } from '../../../src/pipeline/phases/fetch-metadata';
import { categorize, filterDocuments, selectDocuments } from '../../../src/pipeline/phases/filter-documents';
import { DocumentRef, initialArtifacts } from '../../../src/pipeline/artifacts';
import { FakeToolClient, phaseContext } from '../../helpers/fakes';

const doc = (id: string, documentType: string | null, description: string | null = null): DocumentRef => ({
    id, documentType, description, url: `https://planning.example.org/docs/${id}.pdf`, datePublished: null,
});

describe('fetchMetadata', () => {
    it('stores the application record and its documents', async () => {
        const tools = new FakeToolClient({
            get_application_details: () => ({
                status: 'success',
                application: {
                    address: '1 Example Street',
                    proposal: 'Erection of 12 dwellings',
                    status: 'Pending',
                    documents: [
                        { document_id: 'd1', description: 'Transport Assessment', document_type: 'Supporting Documents', url: 'https://planning.example.org/d1.pdf' },
                        { description: 'Site plan' },
                    ],
                },
            }),
        });
        const ctx = phaseContext(tools, initialArtifacts(), 'fetching_metadata');

        const result = await fetchMetadata(ctx);

        expect(result).toEqual({ ok: true });
        expect(tools.calls[0]).toMatchObject({ toolName: 'get_application_details', args: { reference: '25/00123/F' } });
        expect(ctx.artifacts.application).toMatchObject({
            reference: '25/00123/F',
            address: '1 Example Street',
            proposal: 'Erection of 12 dwellings',
            applicant: null,
        });
        expect(ctx.artifacts.application?.documents).toEqual([
            { id: 'd1', description: 'Transport Assessment', documentType: 'Supporting Documents', url: 'https://planning.example.org/d1.pdf', datePublished: null },
            { id: 'doc-2', description: 'Site plan', documentType: null, url: null, datePublished: null },
        ]);
    });

    it('is fatal when the scraper reports an error', async () => {
        const tools = new FakeToolClient({
            get_application_details: () => ({ status: 'error', message: 'Application not found' }),
        });
        const result = await fetchMetadata(phaseContext(tools, initialArtifacts(), 'fetching_metadata'));
        expect(result).toEqual({
            ok: false,
            recoverable: false,
            error: 'Failed to fetch application: Application not found',
            itemErrors: undefined,
        });
    });

    it('is fatal when the scraper is unreachable', async () => {
        const tools = new FakeToolClient({
            get_application_details: () => { throw new ConnectionFailure('application-scraper', 'ECONNREFUSED'); },
        });
        const result = await fetchMetadata(phaseContext(tools, initialArtifacts(), 'fetching_metadata'));
        expect(result).toMatchObject({ ok: false, recoverable: false, error: 'Scraper error: application-scraper: ECONNREFUSED' });
    });
});

describe('filterDocuments', () => {
    const documents = [
        doc('d1', 'Supporting Documents', 'Transport Assessment'),
        doc('d2', 'Public Comments', 'Comment from resident'),
        doc('d3', 'Consultee Response', 'Highways consultation response'),
        doc('d4', null, 'Objection letter'),
    ];

    it('categorizes by document type and description', () => {
        expect(documents.map(categorize)).toEqual(['application', 'public_comment', 'consultation_response', 'public_comment']);
    });

    it('leaves out comments and consultation responses by default', () => {
        expect(selectDocuments(documents, {}).map(d => d.id)).toEqual(['d1']);
    });

    it('includes them when asked', () => {
        expect(selectDocuments(documents, { includePublicComments: true, includeConsultationResponses: true }).map(d => d.id))
            .toEqual(['d1', 'd2', 'd3', 'd4']);
    });

    it('records the selection on the artifacts', async () => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const artifacts = initialArtifacts();
        artifacts.application = {
            reference: '25/00123/F',
            address: null,
            proposal: null,
            applicant: null,
            status: null,
            dateValidated: null,
            consultationEnd: null,
            documents,
        };
        const ctx = phaseContext(new FakeToolClient(), artifacts, 'filtering_documents');

        const result = await filterDocuments({ includeConsultationResponses: true })(ctx);

        expect(result).toEqual({ ok: true, itemsProcessed: 2, itemsTotal: 4 });
        expect(ctx.artifacts.selectedDocuments.map(d => d.id)).toEqual(['d1', 'd3']);
        expect(ctx.artifacts.excludedDocuments).toBe(2);
        jest.restoreAllMocks();
    });
});
