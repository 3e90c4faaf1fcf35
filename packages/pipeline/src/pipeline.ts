import { randomUUID } from 'crypto';
import { RunCancelledError } from './errors.js';
import { DEFAULT_MIN_USABLE_CHARS, extractDocument, type ExtractionStrategy } from './extract/index.js';
import { DEFAULT_MAX_INPUT_CHARS, DEFAULT_OUTPUT_TOKEN_BUDGET, DEFAULT_PRICING, prepareContent } from './prepare.js';
import { DEFAULT_RETRY_POLICY, type RetryHooks } from './retry.js';
import { summarize } from './summarize.js';
import { DEFAULT_CHUNK_CHAR_LIMIT, synthesize } from './synthesize.js';
import type {
  AudioArtifact,
  Document,
  LlmProvider,
  PipelineLogger,
  PipelineProgress,
  PipelineRun,
  PipelineSettings,
  PipelineStage,
  PreparedContent,
  RunFailure,
  StageTransition,
  SummaryResult,
  TtsProvider,
  WorkStage,
} from './types.js';

export const WORK_STAGES: readonly WorkStage[] = ['Extracted', 'Prepared', 'Summarized', 'Synthesized'];

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  maxInputChars: DEFAULT_MAX_INPUT_CHARS,
  minUsableChars: DEFAULT_MIN_USABLE_CHARS,
  targetDurationSeconds: 180,
  voiceId: '21m00Tcm4TlvDq8ikWAM',
  retry: DEFAULT_RETRY_POLICY,
  pricing: DEFAULT_PRICING,
  llm: {
    model: 'claude-sonnet-4-0',
    maxOutputTokens: DEFAULT_OUTPUT_TOKEN_BUDGET,
    temperature: 0.1,
    timeoutMs: 120_000,
  },
  tts: {
    modelId: 'eleven_multilingual_v2',
    outputFormat: 'mp3_44100_128',
    chunkCharLimit: DEFAULT_CHUNK_CHAR_LIMIT,
    timeoutMs: 60_000,
  },
};

export interface PipelineInput {
  pdfBytes: Uint8Array;
  runId?: string;
  documentId?: string;
  voiceId?: string;
  targetDurationSeconds?: number;
}

export interface PipelineDependencies {
  llm: LlmProvider;
  tts: TtsProvider;
  strategies?: readonly ExtractionStrategy[];
}

export interface RunPipelineOptions {
  /** Checked before each stage; an in-flight call is never interrupted. */
  signal?: AbortSignal;
  onProgress?: (progress: PipelineProgress) => void | Promise<void>;
  logger?: PipelineLogger;
  retryHooks?: RetryHooks;
}

interface RunState {
  id: string;
  stage: PipelineStage;
  completedStages: number;
  failure: RunFailure | null;
  stageErrors: Partial<Record<WorkStage, Error>>;
  transitions: StageTransition[];
  document: Document;
  prepared: PreparedContent | null;
  summary: SummaryResult | null;
  audio: AudioArtifact | null;
}

type Attempt<T> = { ok: true; value: T } | { ok: false };

/** Sole owner of a run record; every mutation goes through here. */
class RunRecorder {
  readonly state: RunState;

  constructor(
    id: string,
    document: Document,
    private readonly options: RunPipelineOptions,
  ) {
    this.state = {
      id,
      stage: 'Uploaded',
      completedStages: 0,
      failure: null,
      stageErrors: {},
      transitions: [{ stage: 'Uploaded', at: new Date().toISOString() }],
      document,
      prepared: null,
      summary: null,
      audio: null,
    };
  }

  /** Resolves to the callback's error instead of rejecting. */
  private async announce(): Promise<Error | null> {
    const { onProgress } = this.options;
    if (!onProgress) return null;
    const last = this.state.transitions[this.state.transitions.length - 1];
    try {
      await onProgress({
        runId: this.state.id,
        stage: this.state.stage,
        completedStages: this.state.completedStages,
        totalStages: WORK_STAGES.length,
        at: last?.at ?? new Date().toISOString(),
      });
      return null;
    } catch (error) {
      return error instanceof Error ? error : new Error(String(error));
    }
  }

  /** Reports `Uploaded`; a rejected callback fails the run before extraction. */
  async start(): Promise<boolean> {
    const error = await this.announce();
    if (!error) return true;
    await this.fail('Extracted', error);
    return false;
  }

  async attempt<T>(stage: WorkStage, work: () => Promise<T> | T): Promise<Attempt<T>> {
    if (this.options.signal?.aborted) {
      await this.fail(stage, new RunCancelledError(stage));
      return { ok: false };
    }

    try {
      return { ok: true, value: await work() };
    } catch (error) {
      await this.fail(stage, error instanceof Error ? error : new Error(String(error)));
      return { ok: false };
    }
  }

  /**
   * Moves to `stage` and reports it. A rejected progress callback fails the
   * run at that stage; returns false when the run has stopped.
   */
  async advance(stage: WorkStage, patch: Partial<Pick<RunState, 'document' | 'prepared' | 'summary' | 'audio'>> = {}): Promise<boolean> {
    const from = this.state.stage;
    Object.assign(this.state, patch);
    this.state.stage = stage;
    this.state.completedStages += 1;
    this.state.transitions.push({ stage, at: new Date().toISOString() });

    const error = await this.announce();
    if (!error) return true;
    await this.fail(stage, error, from);
    return false;
  }

  async complete(): Promise<void> {
    this.state.stage = 'Complete';
    this.state.transitions.push({ stage: 'Complete', at: new Date().toISOString() });
    const error = await this.announce();
    if (error) this.options.logger?.error(`progress callback failed on Complete: ${error.message}`);
  }

  private async fail(stage: WorkStage, error: Error, from: PipelineStage = this.state.stage): Promise<void> {
    this.options.logger?.error(`failed stage=${stage} from=${from}: ${error.message}`);
    this.state.failure = { stage, from, error };
    this.state.stageErrors[stage] = error;
    if (stage === 'Extracted' && this.state.document.status !== 'extracted') {
      this.state.document = { ...this.state.document, status: 'failed' };
    }
    this.state.stage = 'Failed';
    this.state.transitions.push({ stage: 'Failed', at: new Date().toISOString() });

    const announceError = await this.announce();
    if (announceError) this.options.logger?.error(`progress callback failed on Failed: ${announceError.message}`);
  }

  finish(): PipelineRun {
    this.state.document = { ...this.state.document, bytes: null };
    return this.state;
  }
}

/**
 * Drives one document through Extract → Prepare → Summarize → Synthesize.
 *
 * Never throws for a stage failure: the returned run is either `Complete` with
 * an audio artifact, or `Failed` with the stage and the component's error. A
 * progress callback that rejects fails the run at the stage it was reporting.
 */
export async function runPipeline(
  input: PipelineInput,
  dependencies: PipelineDependencies,
  settings: PipelineSettings = DEFAULT_PIPELINE_SETTINGS,
  options: RunPipelineOptions = {},
): Promise<PipelineRun> {
  const { logger } = options;
  const documentId = input.documentId ?? randomUUID();
  const voiceId = input.voiceId ?? settings.voiceId;
  const targetDurationSeconds = input.targetDurationSeconds ?? settings.targetDurationSeconds;

  const recorder = new RunRecorder(
    input.runId ?? randomUUID(),
    {
      id: documentId,
      bytes: input.pdfBytes,
      byteLength: input.pdfBytes.byteLength,
      pageCount: 0,
      text: null,
      extractionMethod: null,
      strategy: null,
      status: 'pending',
    },
    options,
  );
  if (!(await recorder.start())) return recorder.finish();

  const extracted = await recorder.attempt('Extracted', () =>
    extractDocument(input.pdfBytes, {
      strategies: dependencies.strategies,
      minUsableChars: settings.minUsableChars,
      documentId,
      logger,
    }),
  );
  if (!extracted.ok) return recorder.finish();
  if (!(await recorder.advance('Extracted', { document: extracted.value }))) return recorder.finish();

  const text = extracted.value.text ?? '';
  const prepared = await recorder.attempt('Prepared', () =>
    prepareContent(text, settings.maxInputChars, {
      pricing: settings.pricing,
      outputTokenBudget: settings.llm.maxOutputTokens,
    }),
  );
  if (!prepared.ok) return recorder.finish();
  if (prepared.value.truncated) {
    logger?.warn(`content truncated from ${prepared.value.originalLength} to ${prepared.value.truncatedLength} chars`);
  }
  if (!(await recorder.advance('Prepared', { prepared: prepared.value }))) return recorder.finish();

  const summary = await recorder.attempt('Summarized', () =>
    summarize(prepared.value.text, targetDurationSeconds, {
      provider: dependencies.llm,
      ...settings.llm,
      retry: settings.retry,
      pricing: settings.pricing,
      hooks: options.retryHooks,
      logger,
    }),
  );
  if (!summary.ok) return recorder.finish();
  if (!(await recorder.advance('Summarized', { summary: summary.value }))) return recorder.finish();

  const audio = await recorder.attempt('Synthesized', () =>
    synthesize(summary.value.text, voiceId, {
      provider: dependencies.tts,
      ...settings.tts,
      retry: settings.retry,
      sourceDocumentId: documentId,
      hooks: options.retryHooks,
      logger,
    }),
  );
  if (!audio.ok) return recorder.finish();
  if (!(await recorder.advance('Synthesized', { audio: audio.value }))) return recorder.finish();

  await recorder.complete();
  return recorder.finish();
}
