import { ConnectionFailure, ToolFailure } from '@conduit/sdk';
import { Destination } from '../../../src/config';
import { analyseApplication } from '../../../src/pipeline/phases/analyse-application';
import { assessRoutes, centroidOf } from '../../../src/pipeline/phases/assess-routes';
import { generateReview } from '../../../src/pipeline/phases/generate-review';
import { verifyReview } from '../../../src/pipeline/phases/verify-review';
import { initialArtifacts } from '../../../src/pipeline/artifacts';
import { FakeToolClient, phaseContext } from '../../helpers/fakes';
import { sleep } from '../../helpers/poll';

const destinations: Destination[] = [
    { id: 'dest_001', name: 'Town Centre Station', lat: 51.9, lon: -1.15, category: 'rail' },
    { id: 'dest_002', name: 'Market Square Bus Stop', lat: 51.89, lon: -1.15, category: 'bus' },
];

describe('analyseApplication', () => {
    it('gathers evidence per topic before analysing', async () => {
        const tools = new FakeToolClient({
            search_application_docs: (args) => ({ results: [`app excerpt on ${String(args.query)}`] }),
            search_policy: (args) => ({ results: [`policy excerpt on ${String(args.query)}`] }),
            analyse_application: () => ({ analysis: { key_issues: ['cycle parking below standard'] } }),
        });
        const ctx = phaseContext(tools, initialArtifacts(), 'analysing_application');

        const result = await analyseApplication(['cycle parking', 'junction safety'])(ctx);

        expect(result).toEqual({ ok: true, itemErrors: [] });
        expect(ctx.artifacts.evidence).toEqual([
            { topic: 'cycle parking', applicationExcerpts: ['app excerpt on cycle parking'], policyExcerpts: ['policy excerpt on cycle parking'] },
            { topic: 'junction safety', applicationExcerpts: ['app excerpt on junction safety'], policyExcerpts: ['policy excerpt on junction safety'] },
        ]);
        expect(ctx.artifacts.analysis).toEqual({ key_issues: ['cycle parking below standard'] });
        expect(tools.callsTo('analyse_application')[0].timeoutMs).toBe(300_000);
    });

    it('has no more searches in flight than fan-out workers', async () => {
        let inFlight = 0;
        let peak = 0;
        const search = async () => {
            inFlight += 1;
            peak = Math.max(peak, inFlight);
            await sleep(5);
            inFlight -= 1;
            return { results: [] };
        };
        const tools = new FakeToolClient({
            search_application_docs: search,
            search_policy: search,
            analyse_application: () => ({ analysis: {} }),
        });

        // the test context fans out over two workers
        const result = await analyseApplication(['cycle parking', 'junction safety', 'permeability'])(
            phaseContext(tools, initialArtifacts(), 'analysing_application'),
        );

        expect(result.ok).toBe(true);
        expect(peak).toBe(2);
    });

    it('records missing evidence as item errors', async () => {
        const tools = new FakeToolClient({
            search_application_docs: () => ({ results: [] }),
            search_policy: (args) => {
                if (args.query === 'junction safety') throw new ToolFailure('search_policy', 'index not ready');
                return { results: [] };
            },
            analyse_application: () => ({ summary: 'ok' }),
        });
        const ctx = phaseContext(tools, initialArtifacts(), 'analysing_application');

        const result = await analyseApplication(['cycle parking', 'junction safety'])(ctx);

        expect(result).toEqual({ ok: true, itemErrors: [{ item: 'junction safety', error: 'index not ready' }] });
        expect(ctx.artifacts.evidence.map(e => e.topic)).toEqual(['cycle parking']);
        expect(ctx.artifacts.analysis).toEqual({ summary: 'ok' });
    });

    it('is fatal when the analysis fails', async () => {
        const tools = new FakeToolClient({
            search_application_docs: () => ({ results: [] }),
            search_policy: () => ({ results: [] }),
            analyse_application: () => { throw new ConnectionFailure('review-agent', 'socket hang up'); },
        });
        const result = await analyseApplication(['cycle parking'])(phaseContext(tools, initialArtifacts(), 'analysing_application'));
        expect(result).toMatchObject({ ok: false, recoverable: false, error: 'Analysis failed: review-agent: socket hang up' });
    });
});

describe('assessRoutes', () => {
    it('reads a centroid in either shape', () => {
        expect(centroidOf({ centroid: { lat: 51.9, lon: -1.15 } })).toEqual({ lat: 51.9, lon: -1.15 });
        expect(centroidOf({ latitude: '51.9', longitude: '-1.15' })).toEqual({ lat: 51.9, lon: -1.15 });
        expect(centroidOf({ geometry: null })).toBeNull();
    });

    it('assesses a route to every destination', async () => {
        const tools = new FakeToolClient({
            get_site_boundary: () => ({ centroid: { lat: 51.88, lon: -1.14 } }),
            assess_cycle_route: (args) => ({ score: args.destination_id === 'dest_001' ? 62 : 48 }),
        });
        const ctx = phaseContext(tools, initialArtifacts(), 'assessing_routes');

        const result = await assessRoutes(destinations)(ctx);

        expect(result).toEqual({ ok: true, itemsProcessed: 2, itemsTotal: 2, itemErrors: [] });
        expect(ctx.artifacts.siteCentroid).toEqual({ lat: 51.88, lon: -1.14 });
        expect(ctx.artifacts.routeAssessments).toEqual([
            { destinationId: 'dest_001', destination: 'Town Centre Station', assessment: { score: 62 } },
            { destinationId: 'dest_002', destination: 'Market Square Bus Stop', assessment: { score: 48 } },
        ]);
        expect(tools.callsTo('assess_cycle_route')[0].args).toMatchObject({ origin_lat: 51.88, origin_lon: -1.14, destination_lat: 51.9 });
    });

    it('degrades when the boundary is unavailable', async () => {
        const tools = new FakeToolClient({
            get_site_boundary: () => { throw new ConnectionFailure('cycle-route', 'ECONNREFUSED'); },
        });
        const result = await assessRoutes(destinations)(phaseContext(tools, initialArtifacts(), 'assessing_routes'));
        expect(result).toMatchObject({ ok: false, recoverable: true, error: 'Site boundary unavailable: cycle-route: ECONNREFUSED' });
    });

    it('degrades when the boundary has no centroid', async () => {
        const tools = new FakeToolClient({ get_site_boundary: () => ({ type: 'FeatureCollection' }) });
        const result = await assessRoutes(destinations)(phaseContext(tools, initialArtifacts(), 'assessing_routes'));
        expect(result).toMatchObject({ ok: false, recoverable: true, error: 'Site boundary has no centroid' });
    });

    it('degrades when every route fails', async () => {
        const tools = new FakeToolClient({
            get_site_boundary: () => ({ centroid: { lat: 51.88, lon: -1.14 } }),
            assess_cycle_route: () => { throw new ToolFailure('assess_cycle_route', 'no route found'); },
        });
        const result = await assessRoutes(destinations)(phaseContext(tools, initialArtifacts(), 'assessing_routes'));
        expect(result).toEqual({
            ok: false,
            recoverable: true,
            error: 'No cycle routes could be assessed',
            itemErrors: [
                { item: 'Town Centre Station', error: 'no route found' },
                { item: 'Market Square Bus Stop', error: 'no route found' },
            ],
        });
    });
});

describe('generateReview', () => {
    it('stores the generated review', async () => {
        const tools = new FakeToolClient({ generate_review: () => ({ review: { recommendation: 'object' } }) });
        const ctx = phaseContext(tools, initialArtifacts(), 'generating_review');

        await expect(generateReview(ctx)).resolves.toEqual({ ok: true });
        expect(ctx.artifacts.review).toEqual({ recommendation: 'object' });
    });

    it('is fatal on failure', async () => {
        const tools = new FakeToolClient({ generate_review: () => ({ status: 'error', error: { message: 'model overloaded' } }) });
        const result = await generateReview(phaseContext(tools, initialArtifacts(), 'generating_review'));
        expect(result).toMatchObject({ ok: false, recoverable: false, error: 'Review generation failed: model overloaded' });
    });
});

describe('verifyReview', () => {
    it('is recoverable without a review', async () => {
        const tools = new FakeToolClient();
        const result = await verifyReview(phaseContext(tools, initialArtifacts(), 'verifying_review'));
        expect(result).toMatchObject({ ok: false, recoverable: true, error: 'No review to verify' });
        expect(tools.calls).toHaveLength(0);
    });

    it('is recoverable when verification fails', async () => {
        const artifacts = initialArtifacts();
        artifacts.review = { recommendation: 'object' };
        const tools = new FakeToolClient({
            verify_review: () => { throw new ToolFailure('verify_review', 'Timed out after 120000ms', { timedOut: true }); },
        });
        const result = await verifyReview(phaseContext(tools, artifacts, 'verifying_review'));
        expect(result).toMatchObject({ ok: false, recoverable: true, error: 'Verification failed: Timed out after 120000ms' });
    });

    it('stores the verification', async () => {
        const artifacts = initialArtifacts();
        artifacts.review = { recommendation: 'object' };
        const tools = new FakeToolClient({ verify_review: () => ({ verified: true, issues: [] }) });
        const ctx = phaseContext(tools, artifacts, 'verifying_review');

        await expect(verifyReview(ctx)).resolves.toEqual({ ok: true });
        expect(ctx.artifacts.verification).toEqual({ verified: true, issues: [] });
    });
});
