import { PhaseHandler, ToolData, phaseSucceeded, recoverableFailure } from '@conduit/sdk';
import { Destination } from '../../config';
import { describeError } from '../../utils/error-message';
import { ReviewArtifacts, RouteAssessment } from '../artifacts';
import { num, record } from '../tool-data';

const BOUNDARY_TIMEOUT_MS = 60_000;
const ROUTE_TIMEOUT_MS = 120_000;

export function centroidOf(boundary: ToolData): { lat: number; lon: number } | null {
    const source = record(boundary, 'centroid') ?? boundary;
    const lat = num(source, 'lat') ?? num(source, 'latitude');
    const lon = num(source, 'lon') ?? num(source, 'longitude');
    return lat !== null && lon !== null ? { lat, lon } : null;
}

// Route assessment only enriches the review; every failure leaves the run degraded, never stopped.
export function assessRoutes(destinations: readonly Destination[]): PhaseHandler<ReviewArtifacts> {
    return async (ctx) => {
        let boundary: ToolData;
        try {
            boundary = await ctx.tools.invoke('get_site_boundary', { application_ref: ctx.subjectId }, BOUNDARY_TIMEOUT_MS);
        } catch (err) {
            return recoverableFailure(`Site boundary unavailable: ${describeError(err)}`);
        }

        const centroid = centroidOf(boundary);
        if (!centroid) {
            return recoverableFailure('Site boundary has no centroid');
        }
        ctx.artifacts.siteCentroid = centroid;

        const assessed = new Map<string, RouteAssessment>();
        const report = await ctx.fanOut(destinations, async (destination) => {
            const assessment = await ctx.tools.invoke('assess_cycle_route', {
                origin_lat: centroid.lat,
                origin_lon: centroid.lon,
                destination_id: destination.id,
                destination_name: destination.name,
                destination_lat: destination.lat,
                destination_lon: destination.lon,
            }, ROUTE_TIMEOUT_MS);
            assessed.set(destination.id, { destinationId: destination.id, destination: destination.name, assessment });
            return { status: 'succeeded' };
        }, { label: 'Assessing routes', describe: destination => destination.name });

        ctx.artifacts.routeAssessments = destinations.flatMap(destination => {
            const assessment = assessed.get(destination.id);
            return assessment ? [assessment] : [];
        });

        if (report.total > 0 && report.succeeded.length === 0) {
            return recoverableFailure('No cycle routes could be assessed', report.errors);
        }
        return phaseSucceeded({
            itemsProcessed: report.succeeded.length,
            itemsTotal: report.total,
            itemErrors: report.errors,
        });
    };
}
