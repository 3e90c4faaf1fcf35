import { mergeSettings } from '@papercast/pipeline';
import { fakePdfBytes, fixedStrategy, ScriptedLlm, ScriptedTts } from '@papercast/pipeline/testing';
import { describe, expect, it } from 'vitest';
import type { PipelineProgress } from '@papercast/pipeline';
import type { ArtifactStorage, UploadArtifactRequest, UploadArtifactResult } from '../providers/storage/types.js';
import { MemoryRunStore } from './memoryRunStore.js';
import { processNarrationRunById, TOTAL_STAGES, type RunProcessorDeps } from './runProcessor.js';

const paperText = 'Sentence about results. '.repeat(20);

class RecordingStorage implements ArtifactStorage {
  readonly name = 'recording';
  readonly uploads: UploadArtifactRequest[] = [];

  constructor(private readonly failure?: Error) {}

  async uploadAudio(request: UploadArtifactRequest): Promise<UploadArtifactResult> {
    if (this.failure) throw this.failure;
    this.uploads.push(request);
    return { storageKey: `${request.runId}.mp3`, sizeBytes: request.audio.byteLength, sha256: 'abc123' };
  }

  async getDownloadUrl(storageKey: string): Promise<string> {
    return `https://files.test/${storageKey}`;
  }

  async cleanupExpired(): Promise<number> {
    return 0;
  }
}

/** Fails the progress write for one stage, as a dropped database connection would. */
class FlakyProgressStore extends MemoryRunStore {
  constructor(private readonly failOn: PipelineProgress['stage']) {
    super();
  }

  override async recordProgress(id: string, progress: PipelineProgress): Promise<void> {
    if (progress.stage === this.failOn) throw new Error('db down');
    await super.recordProgress(id, progress);
  }
}

function setup(overrides: Partial<RunProcessorDeps> = {}) {
  const runs = new MemoryRunStore();
  const llm = new ScriptedLlm();
  const tts = new ScriptedTts();
  const storage = new RecordingStorage();
  const deps: RunProcessorDeps = {
    runs,
    llm,
    tts,
    storage,
    settings: mergeSettings({ minUsableChars: 20, retry: { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1 } }),
    strategies: [fixedStrategy('primary', { text: paperText, pageCount: 2 })],
    ...overrides,
  };
  return { runs, llm, tts, storage, deps };
}

async function createRun(runs: MemoryRunStore) {
  return runs.create({
    fileName: 'My Paper.pdf',
    pdf: Buffer.from(fakePdfBytes()),
    voiceId: 'voice-1',
    targetDurationSeconds: 60,
    totalStages: TOTAL_STAGES,
  });
}

describe('processNarrationRunById', () => {
  it('completes a run and stores the artifact under the summary file name', async () => {
    const { runs, tts, storage, deps } = setup();
    const created = await createRun(runs);

    const run = await processNarrationRunById(created.id, deps);
    const record = await runs.get(created.id);

    expect(run?.stage).toBe('Complete');
    expect(record).toMatchObject({
      stage: 'Complete',
      completed_stages: 4,
      progress: 1,
      result: {
        storage_key: `${created.id}.mp3`,
        download_name: 'My_Paper_summary.mp3',
        mime_type: 'audio/mpeg',
        sha256: 'abc123',
        chunk_count: 1,
      },
      document: { page_count: 2, extraction_method: 'primary', truncated: false },
      summary: { word_count: 7, attempts: 1 },
    });
    expect(record?.transitions.map((transition) => transition.stage)).toEqual([
      'Uploaded',
      'Extracted',
      'Prepared',
      'Summarized',
      'Synthesized',
      'Complete',
    ]);
    expect(storage.uploads[0]).toMatchObject({ downloadName: 'My_Paper_summary.mp3', metadata: { voice_id: 'voice-1' } });
    expect(tts.requests[0]?.voiceId).toBe('voice-1');
    expect(runs.hasPdf(created.id)).toBe(false);
  });

  it('records a summarization failure with its stage and category', async () => {
    const { runs, storage, deps } = setup({ llm: new ScriptedLlm(['auth']) });
    const created = await createRun(runs);

    await processNarrationRunById(created.id, deps);
    const record = await runs.get(created.id);

    expect(record?.stage).toBe('Failed');
    expect(record?.error).toMatchObject({ code: 'SUMMARIZATION_FAILED', stage: 'Summarized', retryable: false });
    expect(record?.document?.page_count).toBe(2);
    expect(record?.summary).toBeUndefined();
    expect(record?.completed_stages).toBe(2);
    expect(storage.uploads).toHaveLength(0);
    expect(runs.hasPdf(created.id)).toBe(false);
  });

  it('records the failing chunk when synthesis fails', async () => {
    const { runs, deps } = setup({ tts: new ScriptedTts(['content_policy']) });
    const created = await createRun(runs);

    await processNarrationRunById(created.id, deps);

    expect((await runs.get(created.id))?.error).toMatchObject({
      code: 'SYNTHESIS_FAILED',
      stage: 'Synthesized',
      chunk_index: 0,
    });
  });

  it('honours a cancellation requested before the worker starts', async () => {
    const { runs, llm, deps } = setup();
    const created = await createRun(runs);

    expect(await runs.requestCancel(created.id)).toBe('requested');
    await processNarrationRunById(created.id, deps);
    const record = await runs.get(created.id);

    expect(record?.error).toMatchObject({ code: 'RUN_CANCELLED', stage: 'Extracted' });
    expect(llm.requests).toHaveLength(0);
    expect(await runs.requestCancel(created.id)).toBe('terminal');
  });

  it('stores the stage whose progress write failed', async () => {
    const runs = new FlakyProgressStore('Extracted');
    const { llm, deps } = setup({ runs });
    const created = await createRun(runs);

    const run = await processNarrationRunById(created.id, deps);
    const record = await runs.get(created.id);

    expect(run?.stage).toBe('Failed');
    expect(record?.stage).toBe('Failed');
    expect(record?.error).toMatchObject({ code: 'INTERNAL_ERROR', message: 'db down', stage: 'Extracted' });
    expect(record?.document?.page_count).toBe(2);
    expect(llm.requests).toHaveLength(0);
    expect(runs.hasPdf(created.id)).toBe(false);
  });

  it('marks the run failed when the artifact cannot be stored', async () => {
    const { runs, deps } = setup({ storage: new RecordingStorage(new Error('disk full')) });
    const created = await createRun(runs);

    const result = await processNarrationRunById(created.id, deps);

    expect(result).toBeNull();
    expect((await runs.get(created.id))?.error).toMatchObject({ code: 'PROCESSING_ERROR', message: 'disk full' });
  });

  it('does nothing for unknown or already processed runs', async () => {
    const { runs, llm, deps } = setup();
    const created = await createRun(runs);

    expect(await processNarrationRunById('missing', deps)).toBeNull();
    await processNarrationRunById(created.id, deps);
    expect(await processNarrationRunById(created.id, deps)).toBeNull();
    expect(llm.requests).toHaveLength(1);
  });
});
