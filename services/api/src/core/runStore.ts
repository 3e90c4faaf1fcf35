import { randomUUID } from 'crypto';
import type { PipelineProgress, PipelineStage, StageTransition } from '@papercast/pipeline';
import { db } from '../db/client.js';
import type {
  CancelOutcome,
  CreateRunInput,
  NarrationDocumentInfo,
  NarrationRunRecord,
  NarrationSummaryInfo,
  RunCompletion,
  RunExecutionInput,
  RunFailureRecord,
  RunStats,
  RunStore,
} from '../types/narration.js';

const STAGES: readonly PipelineStage[] = [
  'Uploaded',
  'Extracted',
  'Prepared',
  'Summarized',
  'Synthesized',
  'Failed',
  'Complete',
];

export function toStage(value: string): PipelineStage {
  const stage = STAGES.find((candidate) => candidate === value);
  if (!stage) throw new Error(`Unknown run stage in database: ${value}`);
  return stage;
}

type Timestamp = Date | string;

interface RunRow {
  id: string;
  stage: string;
  completed_stages: number;
  total_stages: number;
  file_name: string;
  pdf_size_bytes: number;
  voice_id: string;
  target_duration_seconds: number;
  cancel_requested: boolean;
  transitions: StageTransition[];
  document: NarrationDocumentInfo | null;
  summary: NarrationSummaryInfo | null;
  storage_key: string | null;
  download_name: string | null;
  mime_type: string | null;
  size_bytes: number | null;
  sha256: string | null;
  estimated_duration_seconds: number | null;
  chunk_count: number | null;
  error_code: string | null;
  error_message: string | null;
  error_stage: string | null;
  error_retryable: boolean | null;
  error_chunk_index: number | null;
  created_at: Timestamp;
  started_at: Timestamp | null;
  completed_at: Timestamp | null;
}

// Every column except the PDF payload.
const RECORD_COLUMNS = `
  id, stage, completed_stages, total_stages, file_name, pdf_size_bytes, voice_id,
  target_duration_seconds, cancel_requested, transitions, document, summary,
  storage_key, download_name, mime_type, size_bytes, sha256, estimated_duration_seconds,
  chunk_count, error_code, error_message, error_stage, error_retryable, error_chunk_index,
  created_at, started_at, completed_at
`;

function toIso(value: Timestamp): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function toRecord(row: RunRow): NarrationRunRecord {
  return {
    id: row.id,
    stage: toStage(row.stage),
    completed_stages: row.completed_stages,
    total_stages: row.total_stages,
    progress: row.total_stages > 0 ? row.completed_stages / row.total_stages : 0,
    file_name: row.file_name,
    pdf_size_bytes: row.pdf_size_bytes,
    voice_id: row.voice_id,
    target_duration_seconds: row.target_duration_seconds,
    cancel_requested: row.cancel_requested,
    transitions: row.transitions,
    created_at: toIso(row.created_at),
    started_at: row.started_at ? toIso(row.started_at) : undefined,
    completed_at: row.completed_at ? toIso(row.completed_at) : undefined,
    document: row.document ?? undefined,
    summary: row.summary ?? undefined,
    result:
      row.storage_key && row.download_name && row.mime_type && row.size_bytes !== null && row.sha256
        ? {
            storage_key: row.storage_key,
            download_name: row.download_name,
            mime_type: row.mime_type,
            size_bytes: row.size_bytes,
            sha256: row.sha256,
            estimated_duration_seconds: row.estimated_duration_seconds ?? 0,
            chunk_count: row.chunk_count ?? 0,
          }
        : undefined,
    error:
      row.error_code && row.error_message
        ? {
            code: row.error_code,
            message: row.error_message,
            stage: row.error_stage ?? 'unknown',
            retryable: row.error_retryable ?? false,
            chunk_index: row.error_chunk_index ?? undefined,
          }
        : undefined,
  };
}

export class PgRunStore implements RunStore {
  async create(input: CreateRunInput): Promise<NarrationRunRecord> {
    const id = randomUUID();
    const now = new Date().toISOString();
    const transitions: StageTransition[] = [{ stage: 'Uploaded', at: now }];

    const rows = await db.query<RunRow>(
      `
        insert into narration_runs (
          id, stage, completed_stages, total_stages,
          file_name, pdf_size_bytes, pdf_bytes, voice_id, target_duration_seconds,
          cancel_requested, transitions, created_at
        )
        values ($1, 'Uploaded', 0, $2, $3, $4, $5, $6, $7, false, $8::jsonb, $9)
        returning ${RECORD_COLUMNS}
      `,
      [
        id,
        input.totalStages,
        input.fileName,
        input.pdf.byteLength,
        input.pdf,
        input.voiceId,
        input.targetDurationSeconds,
        JSON.stringify(transitions),
        now,
      ],
    );

    const row = rows[0];
    if (!row) throw new Error('Insert into narration_runs returned no row');
    return toRecord(row);
  }

  async get(id: string): Promise<NarrationRunRecord | undefined> {
    const rows = await db.query<RunRow>(
      `select ${RECORD_COLUMNS} from narration_runs where id = $1 limit 1`,
      [id],
    );
    return rows[0] ? toRecord(rows[0]) : undefined;
  }

  async getExecutionInput(id: string): Promise<RunExecutionInput | null> {
    const rows = await db.query<{
      id: string;
      file_name: string;
      pdf_bytes: Buffer | null;
      voice_id: string;
      target_duration_seconds: number;
    }>(
      `
        select id, file_name, pdf_bytes, voice_id, target_duration_seconds
        from narration_runs
        where id = $1
        limit 1
      `,
      [id],
    );
    const row = rows[0];
    if (!row || !row.pdf_bytes) return null;

    return {
      id: row.id,
      fileName: row.file_name,
      pdf: row.pdf_bytes,
      voiceId: row.voice_id,
      targetDurationSeconds: row.target_duration_seconds,
    };
  }

  async setRunning(id: string): Promise<boolean> {
    const rows = await db.query<{ id: string }>(
      `
        update narration_runs
        set started_at = $2
        where id = $1 and stage = 'Uploaded' and started_at is null
        returning id
      `,
      [id, new Date().toISOString()],
    );
    return Boolean(rows[0]);
  }

  async recordProgress(id: string, progress: PipelineProgress): Promise<void> {
    await db.query(
      `
        update narration_runs
        set
          stage = $2,
          completed_stages = $3,
          transitions = transitions || $4::jsonb
        where id = $1
          and stage not in ('Complete', 'Failed')
      `,
      [id, progress.stage, progress.completedStages, JSON.stringify([{ stage: progress.stage, at: progress.at }])],
    );
  }

  async isCancelRequested(id: string): Promise<boolean> {
    const rows = await db.query<{ cancel_requested: boolean }>(
      'select cancel_requested from narration_runs where id = $1',
      [id],
    );
    return rows[0]?.cancel_requested ?? false;
  }

  async requestCancel(id: string): Promise<CancelOutcome> {
    const rows = await db.query<{ id: string }>(
      `
        update narration_runs
        set cancel_requested = true
        where id = $1 and stage not in ('Complete', 'Failed')
        returning id
      `,
      [id],
    );
    if (rows[0]) return 'requested';

    const existing = await db.query<{ id: string }>('select id from narration_runs where id = $1', [id]);
    return existing[0] ? 'terminal' : 'not_found';
  }

  async setComplete(id: string, completion: RunCompletion): Promise<void> {
    const now = new Date().toISOString();
    await db.query(
      `
        update narration_runs
        set
          stage = 'Complete',
          completed_at = $2,
          transitions = transitions || $3::jsonb,
          pdf_bytes = null,
          document = $4::jsonb,
          summary = $5::jsonb,
          storage_key = $6,
          download_name = $7,
          mime_type = $8,
          size_bytes = $9,
          sha256 = $10,
          estimated_duration_seconds = $11,
          chunk_count = $12
        where id = $1
          and stage not in ('Complete', 'Failed')
      `,
      [
        id,
        now,
        JSON.stringify([{ stage: 'Complete', at: now }]),
        JSON.stringify(completion.document),
        JSON.stringify(completion.summary),
        completion.storageKey,
        completion.downloadName,
        completion.mimeType,
        completion.sizeBytes,
        completion.sha256,
        completion.estimatedDurationSeconds,
        completion.chunkCount,
      ],
    );
  }

  async setFailed(id: string, failure: RunFailureRecord): Promise<void> {
    const now = new Date().toISOString();
    await db.query(
      `
        update narration_runs
        set
          stage = 'Failed',
          completed_at = $2,
          transitions = transitions || $3::jsonb,
          pdf_bytes = null,
          document = coalesce($4::jsonb, document),
          summary = coalesce($5::jsonb, summary),
          error_code = $6,
          error_message = $7,
          error_stage = $8,
          error_retryable = $9,
          error_chunk_index = $10
        where id = $1
          and stage not in ('Complete', 'Failed')
      `,
      [
        id,
        now,
        JSON.stringify([{ stage: 'Failed', at: now }]),
        failure.document ? JSON.stringify(failure.document) : null,
        failure.summary ? JSON.stringify(failure.summary) : null,
        failure.code,
        failure.message,
        failure.stage,
        failure.retryable,
        failure.chunkIndex,
      ],
    );
  }

  async stats(): Promise<RunStats> {
    const [row] = await db.query<{
      total: string;
      active: string;
      complete: string;
      failed: string;
    }>(`
      select
        count(*)::text as total,
        count(*) filter (where stage not in ('Complete', 'Failed'))::text as active,
        count(*) filter (where stage = 'Complete')::text as complete,
        count(*) filter (where stage = 'Failed')::text as failed
      from narration_runs
    `);

    return {
      total: Number.parseInt(row?.total || '0', 10),
      active: Number.parseInt(row?.active || '0', 10),
      complete: Number.parseInt(row?.complete || '0', 10),
      failed: Number.parseInt(row?.failed || '0', 10),
    };
  }
}
