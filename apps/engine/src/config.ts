import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { v7 as uuid } from 'uuid';

export type TransportKind = 'streamableHttp' | 'sse';

export interface ServerConfig {
    name: string;
    baseUrl: string;
    transport: TransportKind;
    tools: readonly string[];
}

export interface BackoffConfig {
    initialIntervalMs: number;
    multiplier: number;
    maxIntervalMs: number;
}

export interface Destination {
    id: string;
    name: string;
    lat: number;
    lon: number;
    category: string;
}

export interface EngineConfig {
    redisUrl: string;
    keyPrefix: string;
    servers: ServerConfig[];
    apiKey: string | null;
    defaultToolTimeoutMs: number;
    connectTimeoutMs: number;
    connectRetries: number;
    backoff: BackoffConfig;
    stateTtlSeconds: number;
    cancelTtlSeconds: number;
    resultTtlSeconds: number;
    fanOutConcurrency: number;
    pollBatchSize: number;
    maxConcurrentRuns: number;
    workerId: string;
    heartbeatIntervalMs: number;
    workerTtlSeconds: number;
    reapIntervalMs: number;
    maxRedeliveries: number;
    reviewTopics: string[];
    destinations: Destination[];
}


// Tool ownership is compiled in; only addresses come from the environment.
const SERVER_TOOLS = {
    'application-scraper': ['get_application_details', 'download_all_documents'],
    'document-store': ['ingest_document', 'search_application_docs', 'get_document_text', 'list_ingested_documents'],
    'policy-kb': ['search_policy', 'get_policy_section', 'list_policy_documents', 'list_policy_revisions'],
    'cycle-route': ['get_site_boundary', 'assess_cycle_route'],
    'review-agent': ['analyse_application', 'generate_review', 'verify_review'],
} as const satisfies Record<string, readonly string[]>;

// src/ and dist/apps/engine/src/ both need to reach apps/engine/config.
const DATA_DIR = [
    path.resolve(__dirname, '../config'),
    path.resolve(__dirname, '../../../../apps/engine/config'),
].find(dir => fs.existsSync(dir)) ?? path.resolve(__dirname, '../config');

const destinationsSchema = z.array(
    z.object({
        id: z.string(),
        name: z.string(),
        lat: z.number(),
        lon: z.number(),
        category: z.string(),
    }),
);
const topicsSchema = z.array(z.string().min(1));

function int(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value || '', 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

function transportOf(value: string | undefined): TransportKind {
    return value === 'sse' ? 'sse' : 'streamableHttp';
}

export function readDataFile<T>(file: string, schema: z.ZodType<T>, dir: string = DATA_DIR): T {
    const raw = fs.readFileSync(path.join(dir, file), 'utf-8');
    return schema.parse(JSON.parse(raw));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const dataDir = env.CONDUIT_CONFIG_DIR || DATA_DIR;
    const transport = transportOf(env.MCP_TRANSPORT);

    const servers: ServerConfig[] = [
        { name: 'application-scraper', baseUrl: env.SCRAPER_URL || 'http://application-scraper:3001', transport, tools: SERVER_TOOLS['application-scraper'] },
        { name: 'document-store', baseUrl: env.DOCUMENT_STORE_URL || 'http://document-store:3002', transport, tools: SERVER_TOOLS['document-store'] },
        { name: 'policy-kb', baseUrl: env.POLICY_KB_URL || 'http://policy-kb:3003', transport, tools: SERVER_TOOLS['policy-kb'] },
        { name: 'cycle-route', baseUrl: env.CYCLE_ROUTE_URL || 'http://cycle-route:3004', transport, tools: SERVER_TOOLS['cycle-route'] },
        { name: 'review-agent', baseUrl: env.REVIEW_AGENT_URL || 'http://review-agent:3005', transport, tools: SERVER_TOOLS['review-agent'] },
    ];

    return {
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        keyPrefix: env.KEY_PREFIX || 'conduit',
        servers,
        apiKey: env.MCP_API_KEY ? env.MCP_API_KEY : null,
        defaultToolTimeoutMs: int(env.TOOL_TIMEOUT_MS, 30_000),
        connectTimeoutMs: int(env.CONNECT_TIMEOUT_MS, 10_000),
        connectRetries: Math.max(1, int(env.CONNECT_RETRIES, 3)),
        backoff: {
            initialIntervalMs: int(env.BACKOFF_INITIAL_MS, 1000),
            multiplier: 2,
            maxIntervalMs: int(env.BACKOFF_MAX_MS, 8000),
        },
        stateTtlSeconds: int(env.STATE_TTL_SECONDS, 86_400),
        cancelTtlSeconds: int(env.CANCEL_TTL_SECONDS, 3600),
        resultTtlSeconds: int(env.RESULT_TTL_SECONDS, 7 * 86_400),
        fanOutConcurrency: Math.max(1, int(env.FANOUT_CONCURRENCY, 4)),
        pollBatchSize: int(env.POLL_BATCH_SIZE, 5),
        maxConcurrentRuns: Math.max(1, int(env.MAX_CONCURRENT_RUNS, 2)),
        workerId: env.WORKER_ID || `worker-${uuid()}`,
        heartbeatIntervalMs: int(env.HEARTBEAT_INTERVAL_MS, 5000),
        workerTtlSeconds: Math.max(1, int(env.WORKER_TTL_SECONDS, 30)),
        reapIntervalMs: int(env.REAP_INTERVAL_MS, 15_000),
        maxRedeliveries: int(env.MAX_REDELIVERIES, 3),
        reviewTopics: readDataFile('review-topics.json', topicsSchema, dataDir),
        destinations: readDataFile('destinations.json', destinationsSchema, dataDir),
    };
}
