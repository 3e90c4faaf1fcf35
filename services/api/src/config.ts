import 'dotenv/config';
import { resolve } from 'path';
import { mergeSettings, type PipelineSettings } from '@papercast/pipeline';

const DEFAULT_PORT = 3020;

export type LlmProviderName = 'mock' | 'anthropic';
export type TtsProviderName = 'mock' | 'elevenlabs';
export type StorageBackend = 'local' | 's3';

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function boolFromEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  const value = raw.toLowerCase().trim();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return fallback;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = env[name]?.trim().toLowerCase();
  return allowed.find((value) => value === raw) ?? fallback;
}

export interface ServiceConfig {
  port: number;
  publicBaseUrl: string;
  masterApiKey: string;
  databaseUrl: string;
  dbHost: string;
  dbPort: number;
  dbUser: string;
  dbPassword: string;
  dbName: string;
  dbSsl: boolean;
  redisUrl: string;
  llmProvider: LlmProviderName;
  anthropicApiKey: string;
  anthropicModel: string;
  llmMaxOutputTokens: number;
  llmTimeoutMs: number;
  ttsProvider: TtsProviderName;
  elevenlabsApiKey: string;
  elevenlabsDefaultVoiceId: string;
  elevenlabsDefaultModelId: string;
  elevenlabsDefaultOutputFormat: string;
  ttsChunkCharLimit: number;
  ttsTimeoutMs: number;
  maxPdfSizeMb: number;
  maxInputChars: number;
  minUsableChars: number;
  targetDurationSeconds: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxConcurrentRuns: number;
  audioRetentionHours: number;
  artifactCleanupIntervalMs: number;
  storageBackend: StorageBackend;
  artifactsDir: string;
  s3Endpoint: string;
  s3Bucket: string;
  s3Region: string;
  s3AccessKeyId: string;
  s3SecretAccessKey: string;
  s3ForcePathStyle: boolean;
  s3SignedUrlTtlSeconds: number;
  s3KeyPrefix: string;
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  const port = intFromEnv(env, 'PORT', DEFAULT_PORT);

  return {
    port,
    publicBaseUrl: env.PUBLIC_BASE_URL || `http://localhost:${port}`,
    masterApiKey: env.MASTER_API_KEY || '',
    databaseUrl: env.DATABASE_URL || '',
    dbHost: env.PGHOST || '',
    dbPort: intFromEnv(env, 'PGPORT', 5432),
    dbUser: env.PGUSER || '',
    dbPassword: env.PGPASSWORD || '',
    dbName: env.PGDATABASE || '',
    dbSsl: boolFromEnv(env, 'DB_SSL', true),
    redisUrl: env.REDIS_URL || '',
    llmProvider: oneOf(env, 'LLM_PROVIDER', ['mock', 'anthropic'], 'mock'),
    anthropicApiKey: env.ANTHROPIC_API_KEY || '',
    anthropicModel: env.ANTHROPIC_MODEL || 'claude-sonnet-4-0',
    llmMaxOutputTokens: intFromEnv(env, 'LLM_MAX_OUTPUT_TOKENS', 2000),
    llmTimeoutMs: intFromEnv(env, 'LLM_TIMEOUT_MS', 120_000),
    ttsProvider: oneOf(env, 'TTS_PROVIDER', ['mock', 'elevenlabs'], 'mock'),
    elevenlabsApiKey: env.ELEVENLABS_API_KEY || '',
    elevenlabsDefaultVoiceId: env.ELEVENLABS_DEFAULT_VOICE_ID || '21m00Tcm4TlvDq8ikWAM',
    elevenlabsDefaultModelId: env.ELEVENLABS_DEFAULT_MODEL_ID || 'eleven_multilingual_v2',
    elevenlabsDefaultOutputFormat: env.ELEVENLABS_DEFAULT_OUTPUT_FORMAT || 'mp3_44100_128',
    ttsChunkCharLimit: intFromEnv(env, 'TTS_CHUNK_CHAR_LIMIT', 5000),
    ttsTimeoutMs: intFromEnv(env, 'TTS_TIMEOUT_MS', 60_000),
    maxPdfSizeMb: intFromEnv(env, 'MAX_PDF_SIZE_MB', 10),
    maxInputChars: intFromEnv(env, 'MAX_INPUT_CHARS', 396_000),
    minUsableChars: intFromEnv(env, 'MIN_USABLE_CHARS', 200),
    targetDurationSeconds: intFromEnv(env, 'TARGET_DURATION_SECONDS', 180),
    retryMaxAttempts: intFromEnv(env, 'RETRY_MAX_ATTEMPTS', 3),
    retryBaseDelayMs: intFromEnv(env, 'RETRY_BASE_DELAY_MS', 1000),
    retryMaxDelayMs: intFromEnv(env, 'RETRY_MAX_DELAY_MS', 30_000),
    maxConcurrentRuns: intFromEnv(env, 'MAX_CONCURRENT_RUNS', 2),
    audioRetentionHours: intFromEnv(env, 'AUDIO_RETENTION_HOURS', 168),
    artifactCleanupIntervalMs: intFromEnv(env, 'ARTIFACT_CLEANUP_INTERVAL_MS', 30 * 60 * 1000),
    storageBackend: oneOf(env, 'STORAGE_BACKEND', ['local', 's3'], 'local'),
    artifactsDir: resolve(process.cwd(), env.ARTIFACTS_DIR || 'data/audio'),
    s3Endpoint: env.S3_ENDPOINT || '',
    s3Bucket: env.S3_BUCKET || '',
    s3Region: env.S3_REGION || 'auto',
    s3AccessKeyId: env.S3_ACCESS_KEY_ID || '',
    s3SecretAccessKey: env.S3_SECRET_ACCESS_KEY || '',
    s3ForcePathStyle: boolFromEnv(env, 'S3_FORCE_PATH_STYLE', true),
    s3SignedUrlTtlSeconds: intFromEnv(env, 'S3_SIGNED_URL_TTL_SECONDS', 3600),
    s3KeyPrefix: env.S3_KEY_PREFIX || 'artifacts',
  };
}

export const config = loadConfig();

/** Settings an entry point cannot start without; empty when the config is usable. */
export function collectConfigErrors(cfg: ServiceConfig): string[] {
  const errors: string[] = [];

  if (cfg.llmProvider === 'anthropic' && !cfg.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic');
  }
  if (cfg.ttsProvider === 'elevenlabs' && !cfg.elevenlabsApiKey) {
    errors.push('ELEVENLABS_API_KEY is required when TTS_PROVIDER=elevenlabs');
  }
  if (!cfg.databaseUrl && !(cfg.dbHost && cfg.dbUser && cfg.dbName)) {
    errors.push('DATABASE_URL or PGHOST/PGUSER/PGDATABASE is required');
  }
  if (!cfg.redisUrl) {
    errors.push('REDIS_URL is required');
  }
  if (cfg.retryBaseDelayMs > cfg.retryMaxDelayMs) {
    errors.push('RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS');
  }
  if (cfg.storageBackend === 's3') {
    if (!cfg.s3Endpoint) errors.push('S3_ENDPOINT is required when STORAGE_BACKEND=s3');
    if (!cfg.s3Bucket) errors.push('S3_BUCKET is required when STORAGE_BACKEND=s3');
    if (!cfg.s3AccessKeyId || !cfg.s3SecretAccessKey) {
      errors.push('S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY are required when STORAGE_BACKEND=s3');
    }
  }

  return errors;
}

export function assertConfigUsable(cfg: ServiceConfig): void {
  const errors = collectConfigErrors(cfg);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }
}

export function buildPipelineSettings(cfg: ServiceConfig): PipelineSettings {
  return mergeSettings({
    maxInputChars: cfg.maxInputChars,
    minUsableChars: cfg.minUsableChars,
    targetDurationSeconds: cfg.targetDurationSeconds,
    voiceId: cfg.elevenlabsDefaultVoiceId,
    retry: {
      maxAttempts: cfg.retryMaxAttempts,
      baseDelayMs: cfg.retryBaseDelayMs,
      maxDelayMs: cfg.retryMaxDelayMs,
    },
    llm: {
      model: cfg.anthropicModel,
      maxOutputTokens: cfg.llmMaxOutputTokens,
      temperature: 0.1,
      timeoutMs: cfg.llmTimeoutMs,
    },
    tts: {
      modelId: cfg.elevenlabsDefaultModelId,
      outputFormat: cfg.elevenlabsDefaultOutputFormat,
      chunkCharLimit: cfg.ttsChunkCharLimit,
      timeoutMs: cfg.ttsTimeoutMs,
    },
  });
}

export function maxPdfBytes(cfg: ServiceConfig): number {
  return cfg.maxPdfSizeMb * 1024 * 1024;
}
