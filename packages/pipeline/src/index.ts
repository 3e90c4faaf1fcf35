import {
  DEFAULT_PIPELINE_SETTINGS,
  runPipeline,
  type PipelineDependencies,
  type PipelineInput,
  type RunPipelineOptions,
} from './pipeline.js';
import type { PipelineRun, PipelineSettings } from './types.js';

export interface NarrationPipelineConfig extends PipelineDependencies {
  settings?: Partial<PipelineSettings>;
}

/** Binds providers and settings once, then runs any number of documents through them. */
export class NarrationPipeline {
  public readonly settings: PipelineSettings;
  private readonly dependencies: PipelineDependencies;

  constructor(config: NarrationPipelineConfig) {
    const { settings, ...dependencies } = config;
    this.dependencies = dependencies;
    this.settings = mergeSettings(settings);
  }

  run(input: PipelineInput, options: RunPipelineOptions = {}): Promise<PipelineRun> {
    return runPipeline(input, this.dependencies, this.settings, options);
  }
}

export function mergeSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    ...DEFAULT_PIPELINE_SETTINGS,
    ...overrides,
    retry: { ...DEFAULT_PIPELINE_SETTINGS.retry, ...overrides.retry },
    pricing: { ...DEFAULT_PIPELINE_SETTINGS.pricing, ...overrides.pricing },
    llm: { ...DEFAULT_PIPELINE_SETTINGS.llm, ...overrides.llm },
    tts: { ...DEFAULT_PIPELINE_SETTINGS.tts, ...overrides.tts },
  };
}

export * from './types.js';
export * from './errors.js';
export * from './failures.js';
export * from './retry.js';
export * from './extract/index.js';
export * from './prepare.js';
export * from './summarize.js';
export * from './synthesize.js';
export * from './pipeline.js';
