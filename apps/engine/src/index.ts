import { loadConfig } from "./config";
import { createRedis } from "./db";
import { RunJob } from "./db/run.entity";
import { runKeys } from "./repositories/keys";
import { RedisStateRepository } from "./repositories/state.repository";
import { RunQueueRepository } from "./repositories/run-queue.repository";
import { WorkerRepository } from "./repositories/worker.repository";
import {
  ConnectionRegistry,
  ToolInvoker,
  Poller,
  QueueReaper,
  WorkerHeartbeat,
  mcpSessionFactory,
} from "./services";
import { describeError } from "./utils/error-message";
import { runJob } from "./task-runner";

const TAG = "[conduit]";

// Central Configuration
const config = loadConfig();

// Wiring
const redis = createRedis(config.redisUrl);
const keys = runKeys(config.keyPrefix);

const stateRepo = new RedisStateRepository(redis, keys, config);
const queue = new RunQueueRepository(redis, keys, config.workerId);
const workers = new WorkerRepository(redis, keys);
const registry = new ConnectionRegistry(config.servers);
const invoker = new ToolInvoker(registry, mcpSessionFactory({ apiKey: config.apiKey }), {
  defaultTimeoutMs: config.defaultToolTimeoutMs,
  connectTimeoutMs: config.connectTimeoutMs,
  connectRetries: config.connectRetries,
  backoff: config.backoff,
});

// Components
const heartbeat = new WorkerHeartbeat(workers, config.workerId, {
  intervalMs: config.heartbeatIntervalMs,
  ttlSeconds: config.workerTtlSeconds,
});
const reaper = new QueueReaper(queue, workers, {
  workerId: config.workerId,
  intervalMs: config.reapIntervalMs,
  maxRedeliveries: config.maxRedeliveries,
});
let poller: Poller | null = null;
const activeRuns = new Map<string, Promise<void>>();

async function release(job: RunJob): Promise<void> {
  try {
    await queue.acknowledge(job);
  } catch (err) {
    console.error(`${TAG} failed to release run ${job.runId}: ${describeError(err)}`);
  }
}

async function processJob(job: RunJob): Promise<void> {
  if (activeRuns.has(job.runId)) {
    console.warn(`${TAG} run ${job.runId} is already active here, ignoring duplicate job`);
    await release(job);
    return;
  }

  const run = runJob({ tools: invoker, stateRepo, config }, job)
    .then(() => release(job))
    .finally(() => activeRuns.delete(job.runId));
  activeRuns.set(job.runId, run);
  await run;
}

async function main() {
  console.log(`${TAG} starting engine... (worker: ${config.workerId})`);

  // Health checks
  await redis.connect();
  await redis.ping();
  console.log(`${TAG} redis connected`);

  await invoker.initializeAll();

  // Recovery: register before claiming anything, then reclaim dead workers' runs
  await heartbeat.start();
  await reaper.start();

  // Backpressure
  const checkBackpressure = () => {
    if (activeRuns.size >= config.maxConcurrentRuns) {
      console.warn(
        `${TAG} [backpressure] ${activeRuns.size} active runs >= ${config.maxConcurrentRuns}`,
      );
      return true;
    }
    return false;
  };

  // Poller
  poller = new Poller(queue, {
    workerId: config.workerId,
    batchSize: Math.min(config.pollBatchSize, config.maxConcurrentRuns),
    checkBackpressure,
    onJobReceived: processJob,
  });
  poller.start();

  console.log(`${TAG} engine ready`);
}

async function shutdown(signal: string) {
  console.log(`${TAG} ${signal} received, shutting down...`);

  if (poller) await poller.stop();
  if (activeRuns.size > 0) {
    // claimed runs are released as they finish; after a crash the reaper requeues them
    console.log(`${TAG} waiting for ${activeRuns.size} active run(s)`);
    await Promise.allSettled(activeRuns.values());
  }
  reaper.stop();
  await heartbeat.stop();

  await redis.quit();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
