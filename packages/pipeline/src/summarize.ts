import { SummarizationError } from './errors.js';
import { ProviderFailure } from './failures.js';
import { estimateCostUsd, estimateTokens } from './prepare.js';
import { withRetry, type RetryHooks } from './retry.js';
import type { LlmProvider, PipelineLogger, Pricing, RetryPolicy, SummaryResult } from './types.js';

export const WORDS_PER_MINUTE = 150;

export interface SummarizeOptions {
  provider: LlmProvider;
  model: string;
  maxOutputTokens: number;
  temperature: number;
  timeoutMs: number;
  retry: RetryPolicy;
  pricing?: Pricing;
  hooks?: RetryHooks;
  logger?: PipelineLogger;
}

export function targetWordCount(targetDurationSeconds: number): number {
  return Math.round((targetDurationSeconds / 60) * WORDS_PER_MINUTE);
}

function formatMinutes(seconds: number): string {
  const minutes = seconds / 60;
  return Number.isInteger(minutes) ? `${minutes}` : minutes.toFixed(1);
}

export function buildSummaryPrompt(paperText: string, targetDurationSeconds: number): string {
  const minutes = formatMinutes(targetDurationSeconds);
  const words = targetWordCount(targetDurationSeconds);

  return `You are a science communicator who turns research papers into short narrated briefings.

TASK: Write a ${minutes}-minute spoken summary (about ${words} words) of the paper below.

REQUIREMENTS:
1. Write for the ear: plain conversational sentences, spoken transitions between parts, jargon explained the first time it appears.
2. Open with why the research matters, then cover the question, the method, the key results with their important numbers, and close with implications and open questions.
3. Stay faithful to the paper. Do not invent findings, numbers or citations.
4. Length: ${words} words, give or take 50.

PAPER:
${paperText}

OUTPUT: Only the narration text, ready for text-to-speech. No headings, lists, markdown or stage directions.`;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Asks the LLM for an audio-ready summary. Transient failures are retried with
 * backoff; a blank response counts as a transient failure, never a result.
 */
export async function summarize(
  preparedText: string,
  targetDurationSeconds: number,
  options: SummarizeOptions,
): Promise<SummaryResult> {
  if (!preparedText.trim()) {
    throw new SummarizationError('Prepared content is empty', 'invalid_request', false, 0);
  }
  if (!(targetDurationSeconds > 0)) {
    throw new SummarizationError(
      `targetDurationSeconds must be positive (got ${targetDurationSeconds})`,
      'invalid_request',
      false,
      0,
    );
  }

  const { provider, logger } = options;
  const prompt = buildSummaryPrompt(preparedText, targetDurationSeconds);

  const result = await withRetry(
    async () => {
      const completion = await provider.complete({
        prompt,
        model: options.model,
        maxOutputTokens: options.maxOutputTokens,
        temperature: options.temperature,
        timeoutMs: options.timeoutMs,
      });
      const text = completion.text.trim();
      if (!text) {
        throw new ProviderFailure('empty_response', `${provider.name} returned an empty summary`);
      }
      return { ...completion, text };
    },
    options.retry,
    {
      ...options.hooks,
      onRetry: (info) => {
        logger?.warn(
          `summarize attempt=${info.attempt} category=${info.failure.category} retry_in_ms=${info.delayMs}: ${info.failure.message}`,
        );
        options.hooks?.onRetry?.(info);
      },
    },
  );

  if (!result.ok) {
    const { failure, attempts, exhausted } = result;
    throw new SummarizationError(
      exhausted
        ? `Summarization failed after ${attempts} attempts: ${failure.message}`
        : `Summarization failed: ${failure.message}`,
      failure.category,
      exhausted,
      attempts,
      failure,
    );
  }

  const { value: completion, attempts } = result;
  const wordCount = countWords(completion.text);
  const targetWords = targetWordCount(targetDurationSeconds);

  if (wordCount < targetWords * 0.7) {
    logger?.warn(`summary is short: words=${wordCount} target=${targetWords}`);
  } else if (wordCount > targetWords * 1.3) {
    logger?.warn(`summary is long: words=${wordCount} target=${targetWords}`);
  } else {
    logger?.info(`summary words=${wordCount} target=${targetWords} attempts=${attempts}`);
  }

  const usage = completion.usage;
  const estimatedCostUsd = usage
    ? estimateCostUsd(usage.inputTokens, usage.outputTokens, options.pricing)
    : estimateCostUsd(estimateTokens(prompt), estimateTokens(completion.text), options.pricing);

  return {
    text: completion.text,
    wordCount,
    sourceLength: preparedText.length,
    estimatedCostUsd,
    model: completion.model ?? options.model,
    attempts,
    generatedAt: new Date().toISOString(),
  };
}
