export type PipelineStage =
  | 'Uploaded'
  | 'Extracted'
  | 'Prepared'
  | 'Summarized'
  | 'Synthesized'
  | 'Failed'
  | 'Complete';

export type WorkStage = 'Extracted' | 'Prepared' | 'Summarized' | 'Synthesized';

export type ExtractionMethod = 'primary' | 'fallback';
export type ExtractionStatus = 'pending' | 'extracted' | 'failed';

export interface Document {
  id: string;
  /** Raw PDF payload; null once the owning run is terminal. */
  bytes: Uint8Array | null;
  byteLength: number;
  pageCount: number;
  text: string | null;
  extractionMethod: ExtractionMethod | null;
  strategy: string | null;
  status: ExtractionStatus;
  title?: string;
}

export interface PreparedContent {
  text: string;
  originalLength: number;
  truncatedLength: number;
  truncated: boolean;
  estimatedTokens: number;
  estimatedCostUsd: number;
}

export interface SummaryResult {
  text: string;
  wordCount: number;
  sourceLength: number;
  estimatedCostUsd: number;
  model: string;
  attempts: number;
  generatedAt: string;
}

export interface AudioArtifact {
  segments: readonly Buffer[];
  chunks: readonly string[];
  audio: Buffer;
  mimeType: string;
  outputFormat: string;
  estimatedDurationSeconds: number;
  voiceId: string;
  modelId: string;
  sourceDocumentId: string;
}

export interface StageTransition {
  stage: PipelineStage;
  at: string;
}

export interface RunFailure {
  /** The stage the run was trying to reach. */
  stage: WorkStage;
  /** The last stage the run completed. */
  from: PipelineStage;
  error: Error;
}

export interface PipelineRun {
  readonly id: string;
  readonly stage: PipelineStage;
  readonly completedStages: number;
  readonly failure: RunFailure | null;
  readonly stageErrors: Readonly<Partial<Record<WorkStage, Error>>>;
  readonly transitions: readonly StageTransition[];
  readonly document: Document;
  readonly prepared: PreparedContent | null;
  readonly summary: SummaryResult | null;
  readonly audio: AudioArtifact | null;
}

export interface PipelineProgress {
  runId: string;
  stage: PipelineStage;
  completedStages: number;
  totalStages: number;
  at: string;
}

export interface PipelineLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// Service boundaries

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LlmCompletionRequest {
  prompt: string;
  model: string;
  maxOutputTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface LlmCompletionResult {
  text: string;
  model?: string;
  usage?: TokenUsage;
}

/** Narrow capability over an LLM service: prompt in, text out. */
export interface LlmProvider {
  readonly name: string;
  complete(request: LlmCompletionRequest): Promise<LlmCompletionResult>;
}

export interface TtsConvertRequest {
  text: string;
  voiceId: string;
  modelId: string;
  outputFormat: string;
  timeoutMs: number;
}

export interface TtsConvertResult {
  audio: Buffer;
  mimeType: string;
  outputFormat: string;
}

export interface TtsVoice {
  voice_id: string;
  name: string;
  category?: string;
}

/** Narrow capability over a TTS service: text chunk in, audio bytes out. */
export interface TtsProvider {
  readonly name: string;
  convert(request: TtsConvertRequest): Promise<TtsConvertResult>;
  listVoices(): Promise<TtsVoice[]>;
}

// Settings

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface Pricing {
  inputUsdPerMillionTokens: number;
  outputUsdPerMillionTokens: number;
}

export interface PipelineSettings {
  maxInputChars: number;
  minUsableChars: number;
  targetDurationSeconds: number;
  voiceId: string;
  retry: RetryPolicy;
  pricing: Pricing;
  llm: {
    model: string;
    maxOutputTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  tts: {
    modelId: string;
    outputFormat: string;
    chunkCharLimit: number;
    timeoutMs: number;
  };
}
