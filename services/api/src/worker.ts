import { Worker } from 'bullmq';
import { assertConfigUsable, buildPipelineSettings, config } from './config.js';
import { createConsoleLogger } from './core/logger.js';
import { processNarrationRunById, startArtifactCleanupLoop } from './core/runProcessor.js';
import { PgRunStore } from './core/runStore.js';
import { db } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { createLlmProvider } from './providers/llm/index.js';
import { createArtifactStorage } from './providers/storage/index.js';
import { createTtsProvider } from './providers/tts/index.js';
import { createRedisConnectionOptions } from './queue/connection.js';
import { NARRATION_QUEUE_NAME, type NarrationQueuePayload } from './queue/constants.js';

const LOG_PREFIX = 'papercast-worker';

async function main() {
  assertConfigUsable(config);
  await initializeSchema();

  const llm = createLlmProvider();
  const tts = createTtsProvider();
  const storage = createArtifactStorage();
  const runs = new PgRunStore();
  const settings = buildPipelineSettings(config);
  const cleanup = startArtifactCleanupLoop(storage, {
    retentionHours: config.audioRetentionHours,
    intervalMs: config.artifactCleanupIntervalMs,
    logger: createConsoleLogger(LOG_PREFIX),
  });

  const worker = new Worker<NarrationQueuePayload>(
    NARRATION_QUEUE_NAME,
    async (job) => {
      await processNarrationRunById(job.data.runId, {
        runs,
        llm,
        tts,
        storage,
        settings,
        logger: createConsoleLogger(LOG_PREFIX, `run=${job.data.runId}`),
      });
    },
    {
      connection: createRedisConnectionOptions('worker'),
      concurrency: config.maxConcurrentRuns,
    },
  );

  worker.on('ready', () => {
    console.log(
      `[${LOG_PREFIX}] ready queue=${NARRATION_QUEUE_NAME} llm=${llm.name} tts=${tts.name} concurrency=${config.maxConcurrentRuns}`,
    );
  });
  worker.on('failed', (job, error) => {
    console.error(`[${LOG_PREFIX}] failed run_id=${job?.data.runId ?? 'unknown'} error=${error.message}`);
  });

  const shutdown = async () => {
    cleanup.stop();
    await worker.close();
    await db.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
}

main().catch((error) => {
  console.error(`[${LOG_PREFIX}] fatal startup error`, error);
  process.exit(1);
});
