import { randomUUID } from 'crypto';
import type { PipelineProgress } from '@papercast/pipeline';
import {
  isTerminalStage,
  type CancelOutcome,
  type CreateRunInput,
  type NarrationRunRecord,
  type RunCompletion,
  type RunExecutionInput,
  type RunFailureRecord,
  type RunStats,
  type RunStore,
} from '../types/narration.js';

interface StoredRun {
  record: NarrationRunRecord;
  pdf: Buffer | null;
}

/** In-process RunStore with the same transition rules as the Postgres one. */
export class MemoryRunStore implements RunStore {
  private readonly runs = new Map<string, StoredRun>();

  async create(input: CreateRunInput): Promise<NarrationRunRecord> {
    const now = new Date().toISOString();
    const record: NarrationRunRecord = {
      id: randomUUID(),
      stage: 'Uploaded',
      completed_stages: 0,
      total_stages: input.totalStages,
      progress: 0,
      file_name: input.fileName,
      pdf_size_bytes: input.pdf.byteLength,
      voice_id: input.voiceId,
      target_duration_seconds: input.targetDurationSeconds,
      cancel_requested: false,
      transitions: [{ stage: 'Uploaded', at: now }],
      created_at: now,
    };
    this.runs.set(record.id, { record, pdf: input.pdf });
    return structuredClone(record);
  }

  async get(id: string): Promise<NarrationRunRecord | undefined> {
    const stored = this.runs.get(id);
    return stored ? structuredClone(stored.record) : undefined;
  }

  /** Whether the PDF payload is still held; false once the run is terminal. */
  hasPdf(id: string): boolean {
    return Boolean(this.runs.get(id)?.pdf);
  }

  async getExecutionInput(id: string): Promise<RunExecutionInput | null> {
    const stored = this.runs.get(id);
    if (!stored?.pdf) return null;
    return {
      id,
      fileName: stored.record.file_name,
      pdf: stored.pdf,
      voiceId: stored.record.voice_id,
      targetDurationSeconds: stored.record.target_duration_seconds,
    };
  }

  async setRunning(id: string): Promise<boolean> {
    const stored = this.runs.get(id);
    if (!stored || stored.record.stage !== 'Uploaded' || stored.record.started_at) return false;
    stored.record.started_at = new Date().toISOString();
    return true;
  }

  async recordProgress(id: string, progress: PipelineProgress): Promise<void> {
    const stored = this.active(id);
    if (!stored) return;
    stored.record.stage = progress.stage;
    stored.record.completed_stages = progress.completedStages;
    stored.record.progress = progress.completedStages / stored.record.total_stages;
    stored.record.transitions.push({ stage: progress.stage, at: progress.at });
  }

  async isCancelRequested(id: string): Promise<boolean> {
    return this.runs.get(id)?.record.cancel_requested ?? false;
  }

  async requestCancel(id: string): Promise<CancelOutcome> {
    const stored = this.runs.get(id);
    if (!stored) return 'not_found';
    if (isTerminalStage(stored.record.stage)) return 'terminal';
    stored.record.cancel_requested = true;
    return 'requested';
  }

  async setComplete(id: string, completion: RunCompletion): Promise<void> {
    const stored = this.active(id);
    if (!stored) return;
    const now = new Date().toISOString();
    const { record } = stored;
    record.stage = 'Complete';
    record.completed_at = now;
    record.transitions.push({ stage: 'Complete', at: now });
    record.document = completion.document;
    record.summary = completion.summary;
    record.result = {
      storage_key: completion.storageKey,
      download_name: completion.downloadName,
      mime_type: completion.mimeType,
      size_bytes: completion.sizeBytes,
      sha256: completion.sha256,
      estimated_duration_seconds: completion.estimatedDurationSeconds,
      chunk_count: completion.chunkCount,
    };
    stored.pdf = null;
  }

  async setFailed(id: string, failure: RunFailureRecord): Promise<void> {
    const stored = this.active(id);
    if (!stored) return;
    const now = new Date().toISOString();
    const { record } = stored;
    record.stage = 'Failed';
    record.completed_at = now;
    record.transitions.push({ stage: 'Failed', at: now });
    record.document = failure.document ?? record.document;
    record.summary = failure.summary ?? record.summary;
    record.error = {
      code: failure.code,
      message: failure.message,
      stage: failure.stage,
      retryable: failure.retryable,
      chunk_index: failure.chunkIndex ?? undefined,
    };
    stored.pdf = null;
  }

  async stats(): Promise<RunStats> {
    const records = [...this.runs.values()].map((stored) => stored.record);
    return {
      total: records.length,
      active: records.filter((record) => !isTerminalStage(record.stage)).length,
      complete: records.filter((record) => record.stage === 'Complete').length,
      failed: records.filter((record) => record.stage === 'Failed').length,
    };
  }

  private active(id: string): StoredRun | undefined {
    const stored = this.runs.get(id);
    return stored && !isTerminalStage(stored.record.stage) ? stored : undefined;
  }
}
