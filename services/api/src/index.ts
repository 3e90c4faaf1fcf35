import { mkdir } from 'fs/promises';
import { assertConfigUsable, buildPipelineSettings, config, maxPdfBytes } from './config.js';
import { createApp } from './app.js';
import { PgRunStore } from './core/runStore.js';
import { db } from './db/client.js';
import { initializeSchema } from './db/schema.js';
import { createLlmProvider } from './providers/llm/index.js';
import { createArtifactStorage } from './providers/storage/index.js';
import { createTtsProvider } from './providers/tts/index.js';
import { NarrationQueue } from './queue/narrationQueue.js';

async function main() {
  assertConfigUsable(config);

  if (config.storageBackend === 'local') {
    await mkdir(config.artifactsDir, { recursive: true });
  }
  await initializeSchema();

  const llm = createLlmProvider();
  const tts = createTtsProvider();
  const storage = createArtifactStorage();
  const queue = new NarrationQueue();
  const settings = buildPipelineSettings(config);

  const app = createApp({
    llm,
    tts,
    runs: new PgRunStore(),
    queue,
    storage,
    settings,
    maxPdfBytes: maxPdfBytes(config),
    masterApiKey: config.masterApiKey,
    artifactsDir: config.storageBackend === 'local' ? config.artifactsDir : undefined,
  });

  const server = app.listen(config.port, () => {
    console.log(`[papercast] listening on ${config.publicBaseUrl}`);
    console.log(`[papercast] llm=${llm.name} model=${settings.llm.model} tts=${tts.name} queue=redis persistence=postgres`);
    console.log(`[papercast] max_pdf_mb=${config.maxPdfSizeMb} target_duration_seconds=${settings.targetDurationSeconds}`);
    console.log('[papercast] worker_mode=external');
    if (config.storageBackend === 'local') {
      console.log(`[papercast] artifacts_dir=${config.artifactsDir}`);
    } else {
      console.log(`[papercast] artifacts_bucket=${config.s3Bucket} endpoint=${config.s3Endpoint}`);
    }
  });

  const shutdown = () => {
    server.close(async () => {
      await queue.close();
      await db.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[papercast] fatal startup error', error);
  process.exit(1);
});
