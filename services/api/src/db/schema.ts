import { db } from './client.js';

/**
 * Creates the narration tables if they do not already exist.
 *
 * One startup command provisions the schema; move these statements into
 * versioned migrations once the table has production data.
 */
export async function initializeSchema(): Promise<{ initialized: boolean }> {
  await db.query(`
    create table if not exists narration_runs (
      id text primary key,
      stage text not null,
      completed_stages integer not null default 0,
      total_stages integer not null,
      file_name text not null,
      pdf_size_bytes integer not null,
      pdf_bytes bytea null,
      voice_id text not null,
      target_duration_seconds integer not null,
      cancel_requested boolean not null default false,
      transitions jsonb not null default '[]'::jsonb,
      document jsonb null,
      summary jsonb null,
      storage_key text null,
      download_name text null,
      mime_type text null,
      size_bytes integer null,
      sha256 text null,
      estimated_duration_seconds double precision null,
      chunk_count integer null,
      error_code text null,
      error_message text null,
      error_stage text null,
      error_retryable boolean null,
      error_chunk_index integer null,
      created_at timestamptz not null,
      started_at timestamptz null,
      completed_at timestamptz null
    );
  `);
  await db.query(`
    create index if not exists idx_narration_runs_stage_created
      on narration_runs (stage, created_at);
  `);

  return { initialized: true };
}
