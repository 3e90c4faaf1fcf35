import { describe, expect, it } from 'vitest';
import { SynthesisError } from './errors.js';
import { estimateDurationSeconds, splitIntoChunks, splitSentences, synthesize, type SynthesizeOptions } from './synthesize.js';
import { noSleep, ScriptedTts } from './testing.js';

const summary = 'Alpha beta. Gamma delta. Epsilon.';

function options(provider: ScriptedTts, overrides: Partial<SynthesizeOptions> = {}): SynthesizeOptions {
  return {
    provider,
    modelId: 'test-model',
    outputFormat: 'mp3_44100_128',
    chunkCharLimit: 12,
    timeoutMs: 1000,
    retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100 },
    sourceDocumentId: 'doc-1',
    hooks: { sleep: noSleep, random: () => 0 },
    ...overrides,
  };
}

describe('splitSentences', () => {
  it('keeps trailing whitespace with each sentence', () => {
    expect(splitSentences('One. Two! Three')).toEqual(['One. ', 'Two! ', 'Three']);
  });
});

describe('splitIntoChunks', () => {
  it('returns short text as a single chunk', () => {
    expect(splitIntoChunks('  Hello there.  ', 5000)).toEqual(['Hello there.']);
  });

  it('never splits inside a sentence when sentences fit', () => {
    expect(splitIntoChunks(summary, 12)).toEqual(['Alpha beta.', 'Gamma delta.', 'Epsilon.']);
  });

  it('packs as many sentences as fit into each chunk', () => {
    expect(splitIntoChunks(summary, 25)).toEqual(['Alpha beta. Gamma delta.', 'Epsilon.']);
  });

  it('splits an over-long word by characters', () => {
    expect(splitIntoChunks('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('returns nothing for blank text', () => {
    expect(splitIntoChunks('   ', 10)).toEqual([]);
  });

  it('rejects a non-positive limit', () => {
    expect(() => splitIntoChunks('text', 0)).toThrow(RangeError);
  });
});

describe('synthesize', () => {
  it('synthesizes chunks in order and concatenates the audio', async () => {
    const tts = new ScriptedTts();

    const artifact = await synthesize(summary, 'voice-1', options(tts));

    expect(tts.requests.map((request) => request.text)).toEqual(['Alpha beta.', 'Gamma delta.', 'Epsilon.']);
    expect(tts.requests[0]).toMatchObject({ voiceId: 'voice-1', modelId: 'test-model', outputFormat: 'mp3_44100_128' });
    expect(artifact.audio.toString()).toBe('audio:0;audio:1;audio:2;');
    expect(artifact.segments).toHaveLength(3);
    expect(artifact).toMatchObject({
      mimeType: 'audio/mpeg',
      outputFormat: 'mp3_44100_128',
      voiceId: 'voice-1',
      modelId: 'test-model',
      sourceDocumentId: 'doc-1',
    });
    expect(artifact.estimatedDurationSeconds).toBeCloseTo(2, 10);
  });

  it('retries a transient chunk failure without repeating earlier chunks', async () => {
    const tts = new ScriptedTts(['server']);

    const artifact = await synthesize(summary, 'voice-1', options(tts));

    expect(tts.requests.map((request) => request.text)).toEqual(['Alpha beta.', 'Alpha beta.', 'Gamma delta.', 'Epsilon.']);
    expect(artifact.audio.toString()).toBe('audio:1;audio:2;audio:3;');
  });

  it('fails the whole artifact when a chunk cannot be synthesized', async () => {
    const first = { audio: Buffer.from('a'), mimeType: 'audio/mpeg', outputFormat: 'mp3_44100_128' };
    const tts = new ScriptedTts([first, 'auth']);

    const error = await synthesize(summary, 'voice-1', options(tts)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SynthesisError);
    expect(error).toMatchObject({ chunkIndex: 1, category: 'auth', isRetryable: false, attempts: 1 });
    expect(tts.requests).toHaveLength(2);
  });

  it('treats empty audio as a transient failure', async () => {
    const empty = { audio: Buffer.alloc(0), mimeType: 'audio/mpeg', outputFormat: 'mp3_44100_128' };
    const tts = new ScriptedTts([empty, empty, empty]);

    await expect(synthesize(summary, 'voice-1', options(tts))).rejects.toMatchObject({
      chunkIndex: 0,
      category: 'empty_response',
      isRetryable: true,
      attempts: 3,
    });
  });

  it('rejects an empty summary without calling the provider', async () => {
    const tts = new ScriptedTts();

    await expect(synthesize('  ', 'voice-1', options(tts))).rejects.toMatchObject({ chunkIndex: null });
    expect(tts.requests).toHaveLength(0);
  });
});

describe('estimateDurationSeconds', () => {
  it('assumes 150 words per minute', () => {
    expect(estimateDurationSeconds('word '.repeat(150))).toBe(60);
  });
});
