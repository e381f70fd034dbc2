import { z } from 'zod';

const toolDataSchema = z.record(z.unknown());

export const documentRefSchema = z.object({
    id: z.string(),
    description: z.string().nullable(),
    documentType: z.string().nullable(),
    url: z.string().nullable(),
    datePublished: z.string().nullable(),
});

export type DocumentRef = z.infer<typeof documentRefSchema>;

export const applicationMetadataSchema = z.object({
    reference: z.string(),
    address: z.string().nullable(),
    proposal: z.string().nullable(),
    applicant: z.string().nullable(),
    status: z.string().nullable(),
    dateValidated: z.string().nullable(),
    consultationEnd: z.string().nullable(),
    documents: z.array(documentRefSchema),
});

export type ApplicationMetadata = z.infer<typeof applicationMetadataSchema>;

const evidenceSchema = z.object({
    topic: z.string(),
    applicationExcerpts: z.array(z.unknown()),
    policyExcerpts: z.array(z.unknown()),
});

export type TopicEvidence = z.infer<typeof evidenceSchema>;

const routeAssessmentSchema = z.object({
    destinationId: z.string(),
    destination: z.string(),
    assessment: toolDataSchema,
});

export type RouteAssessment = z.infer<typeof routeAssessmentSchema>;

/**
 * Phase outputs later phases read. Persisted with the run state so a resumed
 * run has the inputs for whatever phases remain.
 */
export const reviewArtifactsSchema = z.object({
    application: applicationMetadataSchema.nullable(),
    selectedDocuments: z.array(documentRefSchema),
    excludedDocuments: z.number().int().nonnegative(),
    documentPaths: z.array(z.string()),
    ingestedDocuments: z.array(z.string()),
    evidence: z.array(evidenceSchema),
    analysis: toolDataSchema.nullable(),
    siteCentroid: z.object({ lat: z.number(), lon: z.number() }).nullable(),
    routeAssessments: z.array(routeAssessmentSchema),
    review: toolDataSchema.nullable(),
    verification: toolDataSchema.nullable(),
});

export type ReviewArtifacts = z.infer<typeof reviewArtifactsSchema>;

export function initialArtifacts(): ReviewArtifacts {
    return {
        application: null,
        selectedDocuments: [],
        excludedDocuments: 0,
        documentPaths: [],
        ingestedDocuments: [],
        evidence: [],
        analysis: null,
        siteCentroid: null,
        routeAssessments: [],
        review: null,
        verification: null,
    };
}
