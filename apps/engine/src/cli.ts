import { Command } from 'commander';
import { v7 as uuid } from 'uuid';
import { EngineConfig, loadConfig } from './config';
import { createRedis } from './db';
import { storedRunResultSchema } from './db/run.entity';
import { runKeys } from './repositories/keys';
import { RedisStateRepository } from './repositories/state.repository';
import { RunQueueRepository } from './repositories/run-queue.repository';
import { ConnectionRegistry, ProgressStore, ToolInvoker, mcpSessionFactory } from './services';
import { reviewArtifactsSchema } from './pipeline';

const TAG = '[cli]';

type Redis = ReturnType<typeof createRedis>;

async function withRedis<T>(config: EngineConfig, fn: (redis: Redis) => Promise<T>): Promise<T> {
    const redis = createRedis(config.redisUrl);
    await redis.connect();
    try {
        return await fn(redis);
    } finally {
        await redis.quit();
    }
}

export function createCli(config: EngineConfig = loadConfig()): Command {
    const keys = runKeys(config.keyPrefix);
    const program = new Command();

    program
        .name('conduit')
        .description('Submit, cancel and inspect planning application review runs')
        .version('0.1.0');

    program
        .command('submit')
        .description('queue a review run for an application')
        .argument('<reference>', 'planning application reference')
        .option('--run-id <id>', 'reuse a run id to resume a failed or cancelled run')
        .option('--include-consultations', 'include consultation responses', false)
        .option('--include-comments', 'include public comments', false)
        .action(async (reference: string, opts: { runId?: string; includeConsultations: boolean; includeComments: boolean }) => {
            const runId = opts.runId ?? uuid();
            await withRedis(config, async (redis) => {
                const queue = new RunQueueRepository(redis, keys, config.workerId);
                await queue.enqueue({
                    runId,
                    subjectId: reference,
                    options: {
                        includeConsultationResponses: opts.includeConsultations,
                        includePublicComments: opts.includeComments,
                    },
                });
            });
            console.log(runId);
        });

    program
        .command('cancel')
        .description('request cancellation; takes effect before the next phase starts')
        .argument('<runId>')
        .action(async (runId: string) => {
            await withRedis(config, async (redis) => {
                const repo = new RedisStateRepository(redis, keys, config);
                await repo.requestCancellation(runId);
            });
            console.log(`${TAG} cancellation requested for ${runId}`);
        });

    program
        .command('status')
        .description('show the stored result, or live state, of a run')
        .argument('<runId>')
        .action(async (runId: string) => {
            await withRedis(config, async (redis) => {
                const repo = new RedisStateRepository(redis, keys, config);

                const stored = storedRunResultSchema.safeParse(await repo.loadResult(runId));
                if (stored.success) {
                    const result = stored.data;
                    console.log(JSON.stringify({
                        runId,
                        status: result.status,
                        error: result.status === 'completed' ? null : result.error,
                        completedPhases: result.metadata.completedPhases,
                        errors: result.metadata.errors.length,
                        totalDurationSeconds: result.metadata.totalDurationSeconds,
                    }, null, 2));
                    return;
                }

                const store = new ProgressStore(repo, reviewArtifactsSchema);
                const state = await store.loadState(runId);
                if (!state) {
                    console.log(`${TAG} no run found for ${runId}`);
                    process.exitCode = 1;
                    return;
                }
                console.log(JSON.stringify({
                    runId,
                    status: state.cancelled ? 'cancelled' : 'in_progress',
                    subjectId: state.subjectId,
                    currentPhase: state.currentPhase,
                    completedPhases: state.completedPhases,
                    percentComplete: store.percentComplete(state),
                    errors: state.errorsEncountered.length,
                }, null, 2));
            });
        });

    program
        .command('health')
        .description('handshake with every configured tool server')
        .action(async () => {
            const registry = new ConnectionRegistry(config.servers);
            const invoker = new ToolInvoker(registry, mcpSessionFactory({ apiKey: config.apiKey }), {
                defaultTimeoutMs: config.defaultToolTimeoutMs,
                connectTimeoutMs: config.connectTimeoutMs,
                connectRetries: 1,
                backoff: config.backoff,
            });

            const names = registry.serverNames();
            const results = await Promise.all(names.map(name => invoker.checkHealth(name)));
            names.forEach((name, i) => {
                const server = registry.getServer(name);
                console.log(`${results[i] ? 'ok  ' : 'DOWN'} ${name} ${server?.baseUrl ?? ''}`);
            });
            if (!results.some(Boolean)) {
                process.exitCode = 1;
            }
        });

    return program;
}

if (require.main === module) {
    createCli()
        .parseAsync(process.argv)
        .catch((err) => {
            console.error(`${TAG} error:`, err instanceof Error ? err.message : err);
            process.exit(1);
        });
}
