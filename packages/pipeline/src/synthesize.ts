import { SynthesisError } from './errors.js';
import { ProviderFailure } from './failures.js';
import { withRetry, type RetryHooks } from './retry.js';
import { countWords, WORDS_PER_MINUTE } from './summarize.js';
import type { AudioArtifact, PipelineLogger, RetryPolicy, TtsProvider } from './types.js';

export const DEFAULT_CHUNK_CHAR_LIMIT = 5000;

export interface SynthesizeOptions {
  provider: TtsProvider;
  modelId: string;
  outputFormat: string;
  chunkCharLimit?: number;
  timeoutMs: number;
  retry: RetryPolicy;
  sourceDocumentId?: string;
  hooks?: RetryHooks;
  logger?: PipelineLogger;
}

/** Splits text into sentences; concatenating the result reproduces the input exactly. */
export function splitSentences(text: string): string[] {
  const segments: string[] = [];
  let start = 0;
  for (const match of text.matchAll(/[.!?]+["'”’)\]]*\s+/g)) {
    const end = (match.index ?? 0) + match[0].length;
    segments.push(text.slice(start, end));
    start = end;
  }
  if (start < text.length) segments.push(text.slice(start));
  return segments;
}

function splitOversized(segment: string, limit: number): string[] {
  const pieces: string[] = [];
  for (const word of segment.match(/\S+\s*/g) ?? []) {
    if (word.trimEnd().length <= limit) {
      pieces.push(word);
      continue;
    }
    for (let i = 0; i < word.length; i += limit) {
      pieces.push(word.slice(i, i + limit));
    }
  }
  return pieces;
}

/**
 * Packs sentences greedily into the fewest chunks whose trimmed length stays
 * within `limit`. Sentences longer than the limit are split between words.
 */
export function splitIntoChunks(text: string, limit: number = DEFAULT_CHUNK_CHAR_LIMIT): string[] {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`chunk limit must be a positive integer (got ${limit})`);
  }

  const source = text.trim();
  if (!source) return [];
  if (source.length <= limit) return [source];

  const pieces = splitSentences(source).flatMap((sentence) =>
    sentence.trimEnd().length > limit ? splitOversized(sentence, limit) : [sentence],
  );

  const chunks: string[] = [];
  let current = '';
  for (const piece of pieces) {
    if (current && (current + piece).trimEnd().length > limit) {
      chunks.push(current.trimEnd());
      current = piece;
    } else {
      current += piece;
    }
  }
  if (current.trim()) chunks.push(current.trimEnd());

  return chunks;
}

export function estimateDurationSeconds(text: string): number {
  return (countWords(text) / WORDS_PER_MINUTE) * 60;
}

/**
 * Synthesizes each chunk in order, one request at a time, and concatenates
 * the audio. Any chunk that cannot be synthesized fails the whole artifact.
 */
export async function synthesize(
  summaryText: string,
  voiceId: string,
  options: SynthesizeOptions,
): Promise<AudioArtifact> {
  const { provider, logger } = options;
  const chunks = splitIntoChunks(summaryText, options.chunkCharLimit ?? DEFAULT_CHUNK_CHAR_LIMIT);
  if (chunks.length === 0) {
    throw new SynthesisError('Summary text is empty', null, 'invalid_request', false, 0);
  }

  const segments: Buffer[] = [];
  let mimeType = 'application/octet-stream';
  let outputFormat = options.outputFormat;

  for (const [chunkIndex, chunk] of chunks.entries()) {
    const result = await withRetry(
      async () => {
        const converted = await provider.convert({
          text: chunk,
          voiceId,
          modelId: options.modelId,
          outputFormat: options.outputFormat,
          timeoutMs: options.timeoutMs,
        });
        if (converted.audio.byteLength === 0) {
          throw new ProviderFailure('empty_response', `${provider.name} returned empty audio`);
        }
        return converted;
      },
      options.retry,
      {
        ...options.hooks,
        onRetry: (info) => {
          logger?.warn(
            `synthesize chunk=${chunkIndex} attempt=${info.attempt} category=${info.failure.category} retry_in_ms=${info.delayMs}`,
          );
          options.hooks?.onRetry?.(info);
        },
      },
    );

    if (!result.ok) {
      const { failure, attempts, exhausted } = result;
      throw new SynthesisError(
        `Synthesis of chunk ${chunkIndex + 1}/${chunks.length} failed${exhausted ? ` after ${attempts} attempts` : ''}: ${failure.message}`,
        chunkIndex,
        failure.category,
        exhausted,
        attempts,
        failure,
      );
    }

    segments.push(result.value.audio);
    mimeType = result.value.mimeType;
    outputFormat = result.value.outputFormat;
    logger?.info(`synthesized chunk=${chunkIndex + 1}/${chunks.length} bytes=${result.value.audio.byteLength}`);
  }

  return {
    segments,
    chunks,
    audio: Buffer.concat(segments),
    mimeType,
    outputFormat,
    estimatedDurationSeconds: estimateDurationSeconds(summaryText),
    voiceId,
    modelId: options.modelId,
    sourceDocumentId: options.sourceDocumentId ?? '',
  };
}
