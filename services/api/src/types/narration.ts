import type { PipelineProgress, PipelineStage, StageTransition } from '@papercast/pipeline';

export const TERMINAL_STAGES: readonly PipelineStage[] = ['Complete', 'Failed'];

export function isTerminalStage(stage: PipelineStage): boolean {
  return TERMINAL_STAGES.includes(stage);
}

export interface NarrationDocumentInfo {
  page_count: number;
  extraction_method: string | null;
  strategy: string | null;
  title?: string;
  text_length: number;
  truncated: boolean;
}

export interface NarrationSummaryInfo {
  word_count: number;
  model: string;
  attempts: number;
  estimated_cost_usd: number;
}

export interface NarrationRunRecord {
  id: string;
  stage: PipelineStage;
  completed_stages: number;
  total_stages: number;
  progress: number;
  file_name: string;
  pdf_size_bytes: number;
  voice_id: string;
  target_duration_seconds: number;
  cancel_requested: boolean;
  transitions: StageTransition[];
  created_at: string;
  started_at?: string;
  completed_at?: string;
  document?: NarrationDocumentInfo;
  summary?: NarrationSummaryInfo;
  result?: {
    storage_key: string;
    download_name: string;
    mime_type: string;
    size_bytes: number;
    sha256: string;
    estimated_duration_seconds: number;
    chunk_count: number;
  };
  error?: {
    code: string;
    message: string;
    stage: string;
    retryable: boolean;
    chunk_index?: number;
  };
}

export interface CreateRunInput {
  fileName: string;
  pdf: Buffer;
  voiceId: string;
  targetDurationSeconds: number;
  totalStages: number;
}

export interface RunExecutionInput {
  id: string;
  fileName: string;
  pdf: Buffer;
  voiceId: string;
  targetDurationSeconds: number;
}

export interface RunCompletion {
  document: NarrationDocumentInfo;
  summary: NarrationSummaryInfo;
  storageKey: string;
  downloadName: string;
  mimeType: string;
  sizeBytes: number;
  sha256: string;
  estimatedDurationSeconds: number;
  chunkCount: number;
}

export interface RunFailureRecord {
  code: string;
  message: string;
  stage: string;
  retryable: boolean;
  chunkIndex: number | null;
  document?: NarrationDocumentInfo;
  summary?: NarrationSummaryInfo;
}

export type CancelOutcome = 'requested' | 'terminal' | 'not_found';

export interface RunStats {
  total: number;
  active: number;
  complete: number;
  failed: number;
}

/** Persistence for narration runs; terminal writes also drop the stored PDF. */
export interface RunStore {
  create(input: CreateRunInput): Promise<NarrationRunRecord>;
  get(id: string): Promise<NarrationRunRecord | undefined>;
  getExecutionInput(id: string): Promise<RunExecutionInput | null>;
  /** Claims an uploaded run for a worker; false when it was already claimed or finished. */
  setRunning(id: string): Promise<boolean>;
  recordProgress(id: string, progress: PipelineProgress): Promise<void>;
  isCancelRequested(id: string): Promise<boolean>;
  requestCancel(id: string): Promise<CancelOutcome>;
  setComplete(id: string, completion: RunCompletion): Promise<void>;
  setFailed(id: string, failure: RunFailureRecord): Promise<void>;
  stats(): Promise<RunStats>;
}

export interface RunQueue {
  enqueue(runId: string): Promise<void>;
  ping(): Promise<string>;
  close(): Promise<void>;
}
