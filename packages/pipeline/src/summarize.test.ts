import { describe, expect, it } from 'vitest';
import { SummarizationError } from './errors.js';
import { buildSummaryPrompt, countWords, summarize, targetWordCount, type SummarizeOptions } from './summarize.js';
import { noSleep, recordingLogger, ScriptedLlm } from './testing.js';

function options(provider: ScriptedLlm, overrides: Partial<SummarizeOptions> = {}): SummarizeOptions {
  return {
    provider,
    model: 'test-model',
    maxOutputTokens: 2000,
    temperature: 0.1,
    timeoutMs: 1000,
    retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100 },
    hooks: { sleep: noSleep, random: () => 0 },
    ...overrides,
  };
}

describe('summary prompt', () => {
  it('derives the word target from 150 words per minute', () => {
    expect(targetWordCount(180)).toBe(450);
    expect(targetWordCount(90)).toBe(225);
  });

  it('states the duration and word target and embeds the paper', () => {
    const prompt = buildSummaryPrompt('THE PAPER BODY', 180);

    expect(prompt).toContain('Write a 3-minute spoken summary (about 450 words)');
    expect(prompt).toContain('PAPER:\nTHE PAPER BODY\n');
  });

  it('formats fractional minutes', () => {
    expect(buildSummaryPrompt('x', 90)).toContain('Write a 1.5-minute spoken summary (about 225 words)');
  });

  it('counts words on whitespace', () => {
    expect(countWords('  one two\nthree  ')).toBe(3);
    expect(countWords('   ')).toBe(0);
  });
});

describe('summarize', () => {
  it('retries a rate limit and returns the trimmed summary', async () => {
    const llm = new ScriptedLlm(['rate_limit', { text: '  hello world  ' }]);
    const logger = recordingLogger();

    const summary = await summarize('paper text', 180, options(llm, { logger }));

    expect(summary).toMatchObject({
      text: 'hello world',
      wordCount: 2,
      sourceLength: 10,
      model: 'test-model',
      attempts: 2,
    });
    expect(llm.requests).toHaveLength(2);
    expect(llm.requests[0]).toMatchObject({ model: 'test-model', maxOutputTokens: 2000, temperature: 0.1, timeoutMs: 1000 });
    expect(llm.requests[0]?.prompt).toContain('paper text');
    expect(logger.lines[0]).toBe(
      'warn summarize attempt=1 category=rate_limit retry_in_ms=5: scripted-llm: scripted rate_limit',
    );
    expect(logger.lines[1]).toBe('warn summary is short: words=2 target=450');
  });

  it('treats blank responses as transient and gives up after the attempt limit', async () => {
    const llm = new ScriptedLlm([{ text: '  ' }, { text: '' }, { text: '\n' }]);

    const error = await summarize('paper text', 180, options(llm)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SummarizationError);
    expect(error).toMatchObject({ category: 'empty_response', isRetryable: true, attempts: 3 });
  });

  it('does not retry authentication failures', async () => {
    const llm = new ScriptedLlm(['auth']);

    await expect(summarize('paper text', 180, options(llm))).rejects.toMatchObject({
      code: 'SUMMARIZATION_FAILED',
      category: 'auth',
      isRetryable: false,
      attempts: 1,
    });
    expect(llm.requests).toHaveLength(1);
  });

  it('rejects empty content without calling the provider', async () => {
    const llm = new ScriptedLlm();

    await expect(summarize('  \n ', 180, options(llm))).rejects.toMatchObject({ category: 'invalid_request' });
    await expect(summarize('text', 0, options(llm))).rejects.toMatchObject({ category: 'invalid_request' });
    expect(llm.requests).toHaveLength(0);
  });

  it('prices reported token usage', async () => {
    const llm = new ScriptedLlm([{ text: 'ok', model: 'served-model', usage: { inputTokens: 1000, outputTokens: 100 } }]);

    const summary = await summarize('paper text', 180, options(llm));

    expect(summary.model).toBe('served-model');
    expect(summary.estimatedCostUsd).toBeCloseTo(0.0045, 10);
  });
});
