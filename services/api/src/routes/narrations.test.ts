import type { Server } from 'http';
import { mergeSettings } from '@papercast/pipeline';
import { fakePdfBytes, fixedStrategy, ScriptedLlm, ScriptedTts } from '@papercast/pipeline/testing';
import { afterEach, describe, expect, it } from 'vitest';
import { createApp } from '../app.js';
import { MemoryRunStore } from '../core/memoryRunStore.js';
import { processNarrationRunById } from '../core/runProcessor.js';
import type { ArtifactStorage, UploadArtifactRequest, UploadArtifactResult } from '../providers/storage/types.js';
import type { AppContext } from '../types/appContext.js';
import type { RunQueue } from '../types/narration.js';

const API_KEY = 'test-secret';
const settings = mergeSettings({ minUsableChars: 20, retry: { maxAttempts: 1, baseDelayMs: 1, maxDelayMs: 1 } });

class RecordingQueue implements RunQueue {
  readonly enqueued: string[] = [];

  constructor(private readonly failure?: Error) {}

  async enqueue(runId: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.enqueued.push(runId);
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  async close(): Promise<void> {}
}

class FakeStorage implements ArtifactStorage {
  readonly name = 'fake';

  async uploadAudio(request: UploadArtifactRequest): Promise<UploadArtifactResult> {
    return { storageKey: `${request.runId}.mp3`, sizeBytes: request.audio.byteLength, sha256: 'abc123' };
  }

  async getDownloadUrl(storageKey: string, downloadName: string): Promise<string> {
    return `https://files.test/${storageKey}?name=${downloadName}`;
  }

  async cleanupExpired(): Promise<number> {
    return 0;
  }
}

type TestRequestInit = Omit<RequestInit, 'headers'> & { headers?: Record<string, string> };

async function readBody(response: Response): Promise<Record<string, unknown>> {
  const body: unknown = await response.json();
  if (typeof body !== 'object' || body === null || Array.isArray(body)) throw new Error('expected a JSON object');
  return Object.fromEntries(Object.entries(body));
}

function stringField(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string') throw new Error(`expected ${key} to be a string`);
  return value;
}

let server: Server | undefined;

afterEach(async () => {
  const current = server;
  server = undefined;
  if (current) {
    await new Promise<void>((resolve, reject) => current.close((error) => (error ? reject(error) : resolve())));
  }
});

async function start(overrides: Partial<AppContext> = {}) {
  const runs = new MemoryRunStore();
  const queue = new RecordingQueue();
  const ctx: AppContext = {
    llm: new ScriptedLlm(),
    tts: new ScriptedTts(),
    runs,
    queue,
    storage: new FakeStorage(),
    settings,
    maxPdfBytes: 1024,
    masterApiKey: API_KEY,
    ...overrides,
  };

  const listening = createApp(ctx).listen(0);
  server = listening;
  await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
  const address = listening.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');

  const baseUrl = `http://127.0.0.1:${address.port}`;
  const request = (path: string, init: TestRequestInit = {}) =>
    fetch(`${baseUrl}${path}`, {
      redirect: 'manual',
      ...init,
      headers: { 'x-api-key': API_KEY, ...init.headers },
    });

  return { ctx, runs, queue, request };
}

function uploadPdf(body: Uint8Array = fakePdfBytes()): TestRequestInit {
  return {
    method: 'POST',
    body,
    headers: { 'content-type': 'application/pdf', 'x-file-name': encodeURIComponent('My Paper.pdf') },
  };
}

describe('narrations API', () => {
  it('serves help without a key', async () => {
    const { request } = await start();

    const response = await request('/help', { headers: { 'x-api-key': '' } });

    expect(response.status).toBe(200);
    expect(await readBody(response)).toMatchObject({ service: 'papercast' });
  });

  it('requires the API key on /v1 and accepts it as a bearer token', async () => {
    const { request } = await start();

    const denied = await request('/v1/voices', { headers: { 'x-api-key': 'wrong' } });
    const bearer = await request('/v1/voices', { headers: { 'x-api-key': '', authorization: `Bearer ${API_KEY}` } });

    expect(denied.status).toBe(401);
    expect(await readBody(denied)).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Missing or invalid x-api-key' } });
    expect(bearer.status).toBe(200);
    expect(await readBody(bearer)).toMatchObject({ provider: 'scripted-tts', count: 1 });
  });

  it('accepts a PDF upload and queues the run', async () => {
    const { runs, queue, request } = await start();

    const response = await request('/v1/narrations?target_duration_seconds=120', uploadPdf());
    const body = await readBody(response);
    const runId = stringField(body, 'run_id');

    expect(response.status).toBe(202);
    expect(body).toMatchObject({ stage: 'Uploaded', target_duration_seconds: 120, voice_id: settings.voiceId });
    expect(body.poll_url).toBe(`/v1/narrations/${runId}`);
    expect(queue.enqueued).toEqual([runId]);
    expect(await runs.get(runId)).toMatchObject({ file_name: 'My Paper.pdf', stage: 'Uploaded', total_stages: 4 });
  });

  it('rejects bodies that are not PDFs', async () => {
    const { request } = await start();

    const response = await request('/v1/narrations', uploadPdf(new Uint8Array(Buffer.from('plain text'))));

    expect(response.status).toBe(400);
    expect(await readBody(response)).toMatchObject({ error: { code: 'NOT_A_PDF' } });
  });

  it('rejects uploads with the wrong content type', async () => {
    const { request } = await start();

    const response = await request('/v1/narrations', {
      method: 'POST',
      body: JSON.stringify({ pdf: 'nope' }),
      headers: { 'content-type': 'application/json' },
    });

    expect(response.status).toBe(415);
  });

  it('rejects oversized uploads with 413', async () => {
    const { request } = await start({ maxPdfBytes: 64 });

    const response = await request('/v1/narrations', uploadPdf(fakePdfBytes('x'.repeat(200))));

    expect(response.status).toBe(413);
    expect(await readBody(response)).toMatchObject({
      error: { code: 'PAYLOAD_TOO_LARGE', details: { max_bytes: 64 } },
    });
  });

  it('validates the target duration', async () => {
    const { request } = await start();

    const response = await request('/v1/narrations?target_duration_seconds=5', uploadPdf());

    expect(response.status).toBe(400);
    expect(await readBody(response)).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
  });

  it('marks the run failed when it cannot be queued', async () => {
    const { runs, request } = await start({ queue: new RecordingQueue(new Error('redis down')) });

    const response = await request('/v1/narrations', uploadPdf());

    expect(response.status).toBe(500);
    expect(await readBody(response)).toMatchObject({ error: { code: 'QUEUE_FAILED', message: 'redis down' } });
    expect(await runs.stats()).toEqual({ total: 1, active: 0, complete: 0, failed: 1 });
  });

  it('reports progress and redirects to the audio once complete', async () => {
    const { ctx, runs, request } = await start();
    const runId = stringField(await readBody(await request('/v1/narrations', uploadPdf())), 'run_id');

    const early = await request(`/v1/narrations/${runId}/audio`);
    expect(early.status).toBe(409);
    expect(await readBody(early)).toMatchObject({ error: { code: 'RUN_NOT_COMPLETE', details: { stage: 'Uploaded' } } });

    await processNarrationRunById(runId, {
      runs,
      llm: ctx.llm,
      tts: ctx.tts,
      storage: ctx.storage,
      settings,
      strategies: [fixedStrategy('primary', { text: 'Sentence about results. '.repeat(20), pageCount: 1 })],
    });

    const status = await readBody(await request(`/v1/narrations/${runId}`));
    expect(status).toMatchObject({
      stage: 'Complete',
      progress: 1,
      audio_url: `/v1/narrations/${runId}/audio`,
      result: { download_name: 'My_Paper_summary.mp3' },
    });

    const audio = await request(`/v1/narrations/${runId}/audio`);
    expect(audio.status).toBe(302);
    expect(audio.headers.get('location')).toBe(`https://files.test/${runId}.mp3?name=My_Paper_summary.mp3`);
  });

  it('cancels active runs and refuses finished ones', async () => {
    const { runs, request } = await start();
    const runId = stringField(await readBody(await request('/v1/narrations', uploadPdf())), 'run_id');

    const cancelled = await request(`/v1/narrations/${runId}/cancel`, { method: 'POST' });
    expect(cancelled.status).toBe(202);
    expect(await runs.isCancelRequested(runId)).toBe(true);

    await runs.setFailed(runId, {
      code: 'RUN_CANCELLED',
      message: 'cancelled',
      stage: 'Extracted',
      retryable: false,
      chunkIndex: null,
    });
    const again = await request(`/v1/narrations/${runId}/cancel`, { method: 'POST' });
    expect(again.status).toBe(409);
  });

  it('returns 404 for unknown runs and routes', async () => {
    const { request } = await start();

    expect((await request('/v1/narrations/nope')).status).toBe(404);
    expect((await request('/v1/nothing-here')).status).toBe(404);
  });
});
