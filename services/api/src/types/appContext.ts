import type { LlmProvider, PipelineSettings, TtsProvider } from '@papercast/pipeline';
import type { ArtifactStorage } from '../providers/storage/types.js';
import type { RunQueue, RunStore } from './narration.js';

export interface AppContext {
  llm: LlmProvider;
  tts: TtsProvider;
  runs: RunStore;
  queue: RunQueue;
  storage: ArtifactStorage;
  settings: PipelineSettings;
  maxPdfBytes: number;
  masterApiKey: string;
  /** Served at /artifacts when artifacts live on local disk. */
  artifactsDir?: string;
}
