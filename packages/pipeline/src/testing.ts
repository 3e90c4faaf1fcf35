import { ProviderFailure, type FailureCategory } from './failures.js';
import type { ExtractionStrategy, StrategyOutput } from './extract/strategy.js';
import type {
  LlmCompletionRequest,
  LlmCompletionResult,
  LlmProvider,
  PipelineLogger,
  TtsConvertRequest,
  TtsConvertResult,
  TtsProvider,
  TtsVoice,
} from './types.js';

// In-process fakes shared by this package's tests and the service's tests.

/** A scripted step: a value to return, a failure category to throw as a ProviderFailure, or an error to throw. */
export type Scripted<T> = T | FailureCategory | Error;

function failWith(step: FailureCategory | Error, label: string): never {
  if (step instanceof Error) throw step;
  throw new ProviderFailure(step, `${label}: scripted ${step}`);
}

export class ScriptedLlm implements LlmProvider {
  readonly name = 'scripted-llm';
  readonly requests: LlmCompletionRequest[] = [];

  constructor(
    private readonly script: Scripted<LlmCompletionResult>[] = [],
    private readonly fallbackText = 'A short narrated summary of the paper.',
  ) {}

  async complete(request: LlmCompletionRequest): Promise<LlmCompletionResult> {
    const step = this.script[this.requests.length];
    this.requests.push(request);
    if (step === undefined) return { text: this.fallbackText };
    if (typeof step === 'string' || step instanceof Error) return failWith(step, this.name);
    return step;
  }
}

export class ScriptedTts implements TtsProvider {
  readonly name = 'scripted-tts';
  readonly requests: TtsConvertRequest[] = [];

  constructor(private readonly script: Scripted<TtsConvertResult>[] = []) {}

  async convert(request: TtsConvertRequest): Promise<TtsConvertResult> {
    const step = this.script[this.requests.length];
    this.requests.push(request);
    if (typeof step === 'string' || step instanceof Error) return failWith(step, this.name);
    return (
      step ?? {
        audio: Buffer.from(`audio:${this.requests.length - 1};`),
        mimeType: 'audio/mpeg',
        outputFormat: request.outputFormat,
      }
    );
  }

  async listVoices(): Promise<TtsVoice[]> {
    return [{ voice_id: 'voice-test', name: 'Test Voice', category: 'premade' }];
  }
}

export function fixedStrategy(name: string, output: StrategyOutput | Error): ExtractionStrategy & { calls: number } {
  const strategy = {
    name,
    calls: 0,
    async extract(): Promise<StrategyOutput> {
      strategy.calls += 1;
      if (output instanceof Error) throw output;
      return output;
    },
  };
  return strategy;
}

export function recordingLogger(): PipelineLogger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
  };
}

/** Bytes that pass the signature check; the content itself is never parsed by fixed strategies. */
export function fakePdfBytes(body = 'fake body'): Uint8Array {
  return new Uint8Array(Buffer.from(`%PDF-1.7\n${body}\n%%EOF`, 'latin1'));
}

export const noSleep = async (): Promise<void> => {};
