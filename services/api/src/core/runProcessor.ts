import {
  isRetryableError,
  PipelineError,
  runPipeline,
  SynthesisError,
  WORK_STAGES,
  type ExtractionStrategy,
  type LlmProvider,
  type PipelineLogger,
  type PipelineRun,
  type PipelineSettings,
  type SummaryResult,
  type TtsProvider,
} from '@papercast/pipeline';
import type { ArtifactStorage } from '../providers/storage/types.js';
import {
  isTerminalStage,
  type NarrationDocumentInfo,
  type NarrationSummaryInfo,
  type RunFailureRecord,
  type RunStore,
} from '../types/narration.js';
import { downloadFileName } from './artifacts.js';

export interface RunProcessorDeps {
  runs: RunStore;
  llm: LlmProvider;
  tts: TtsProvider;
  storage: ArtifactStorage;
  settings: PipelineSettings;
  strategies?: readonly ExtractionStrategy[];
  logger?: PipelineLogger;
}

export const TOTAL_STAGES = WORK_STAGES.length;

function documentInfo(run: PipelineRun): NarrationDocumentInfo {
  return {
    page_count: run.document.pageCount,
    extraction_method: run.document.extractionMethod,
    strategy: run.document.strategy,
    title: run.document.title,
    text_length: run.document.text?.length ?? 0,
    truncated: run.prepared?.truncated ?? false,
  };
}

function summaryInfo(summary: SummaryResult): NarrationSummaryInfo {
  return {
    word_count: summary.wordCount,
    model: summary.model,
    attempts: summary.attempts,
    estimated_cost_usd: summary.estimatedCostUsd,
  };
}

export function describeFailure(run: PipelineRun): RunFailureRecord {
  const failure = run.failure;
  if (!failure) {
    return { code: 'INTERNAL_ERROR', message: 'Run ended without a result', stage: run.stage, retryable: false, chunkIndex: null };
  }

  const { error } = failure;
  return {
    code: error instanceof PipelineError ? error.code : 'INTERNAL_ERROR',
    message: error.message,
    stage: failure.stage,
    retryable: isRetryableError(error),
    chunkIndex: error instanceof SynthesisError ? error.chunkIndex : null,
    document: run.document.status === 'extracted' ? documentInfo(run) : undefined,
    summary: run.summary ? summaryInfo(run.summary) : undefined,
  };
}

/**
 * Runs one queued narration end to end and persists every transition.
 * Returns null when the run does not exist or another worker already claimed it.
 */
export async function processNarrationRunById(
  runId: string,
  deps: RunProcessorDeps,
): Promise<PipelineRun | null> {
  const input = await deps.runs.getExecutionInput(runId);
  if (!input) return null;

  const acquired = await deps.runs.setRunning(runId);
  if (!acquired) return null;

  const { logger } = deps;
  const cancellation = new AbortController();

  try {
    const run = await runPipeline(
      {
        pdfBytes: input.pdf,
        runId,
        documentId: runId,
        voiceId: input.voiceId,
        targetDurationSeconds: input.targetDurationSeconds,
      },
      { llm: deps.llm, tts: deps.tts, strategies: deps.strategies },
      deps.settings,
      {
        signal: cancellation.signal,
        logger,
        onProgress: async (progress) => {
          // Uploaded is stored at creation; terminal states are written below with their result
          if (isTerminalStage(progress.stage)) return;
          if (progress.stage !== 'Uploaded') {
            await deps.runs.recordProgress(runId, progress);
          }
          if (await deps.runs.isCancelRequested(runId)) {
            cancellation.abort();
          }
        },
      },
    );

    if (run.stage !== 'Complete' || !run.audio || !run.summary) {
      await deps.runs.setFailed(runId, describeFailure(run));
      return run;
    }

    const { audio } = run;
    const downloadName = downloadFileName(input.fileName, audio.outputFormat);
    const artifact = await deps.storage.uploadAudio({
      runId,
      outputFormat: audio.outputFormat,
      audio: audio.audio,
      mimeType: audio.mimeType,
      downloadName,
      metadata: {
        voice_id: audio.voiceId,
        model_id: audio.modelId,
        estimated_duration_seconds: audio.estimatedDurationSeconds.toFixed(1),
      },
    });

    await deps.runs.setComplete(runId, {
      document: documentInfo(run),
      summary: summaryInfo(run.summary),
      storageKey: artifact.storageKey,
      downloadName,
      mimeType: audio.mimeType,
      sizeBytes: artifact.sizeBytes,
      sha256: artifact.sha256,
      estimatedDurationSeconds: audio.estimatedDurationSeconds,
      chunkCount: audio.chunks.length,
    });
    logger?.info(`complete bytes=${artifact.sizeBytes} chunks=${audio.chunks.length}`);
    return run;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown processing error';
    logger?.error(`processing error: ${message}`);
    await deps.runs.setFailed(runId, {
      code: 'PROCESSING_ERROR',
      message,
      stage: 'Complete',
      retryable: false,
      chunkIndex: null,
    });
    return null;
  }
}

export function startArtifactCleanupLoop(
  storage: ArtifactStorage,
  options: { retentionHours: number; intervalMs: number; logger?: PipelineLogger },
): { stop: () => void } {
  const timer = setInterval(() => {
    storage
      .cleanupExpired(options.retentionHours)
      .then((deleted) => {
        if (deleted > 0) options.logger?.info(`cleaned ${deleted} expired artifacts`);
      })
      .catch((error: unknown) => {
        options.logger?.error(`artifact cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
      });
  }, options.intervalMs);

  return {
    stop: () => clearInterval(timer),
  };
}
