import express, { Router, type Request } from 'express';
import { hasPdfSignature } from '@papercast/pipeline';
import { TOTAL_STAGES } from '../core/runProcessor.js';
import { sendError } from '../middleware/errors.js';
import type { AppContext } from '../types/appContext.js';
import type { NarrationRunRecord } from '../types/narration.js';

export const MIN_TARGET_DURATION_SECONDS = 30;
export const MAX_TARGET_DURATION_SECONDS = 1200;

const PDF_CONTENT_TYPES = ['application/pdf', 'application/octet-stream'];

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function parseTargetDuration(raw: string | undefined, fallback: number): { ok: true; value: number } | { ok: false; message: string } {
  if (raw === undefined) return { ok: true, value: fallback };
  const value = Number(raw);
  if (!Number.isInteger(value) || value < MIN_TARGET_DURATION_SECONDS || value > MAX_TARGET_DURATION_SECONDS) {
    return {
      ok: false,
      message: `target_duration_seconds must be an integer between ${MIN_TARGET_DURATION_SECONDS} and ${MAX_TARGET_DURATION_SECONDS}`,
    };
  }
  return { ok: true, value };
}

function fileNameFrom(req: Request): string {
  const header = req.header('x-file-name');
  if (!header) return 'paper.pdf';
  try {
    return decodeURIComponent(header).trim() || 'paper.pdf';
  } catch {
    return header.trim() || 'paper.pdf';
  }
}

function present(record: NarrationRunRecord) {
  return {
    ...record,
    audio_url: record.stage === 'Complete' ? `/v1/narrations/${record.id}/audio` : null,
  };
}

export function createNarrationsRouter(ctx: AppContext): Router {
  const router = Router();
  const rawPdf = express.raw({ type: PDF_CONTENT_TYPES, limit: ctx.maxPdfBytes });

  router.post('/v1/narrations', rawPdf, async (req, res) => {
    const body: unknown = req.body;
    if (!Buffer.isBuffer(body)) {
      sendError(res, 415, 'UNSUPPORTED_MEDIA_TYPE', 'Send the PDF as the raw request body with Content-Type: application/pdf');
      return;
    }
    if (body.byteLength === 0) {
      sendError(res, 400, 'EMPTY_BODY', 'PDF body is empty');
      return;
    }
    if (!hasPdfSignature(body)) {
      sendError(res, 400, 'NOT_A_PDF', 'Body does not look like a PDF (missing %PDF- signature)');
      return;
    }

    const duration = parseTargetDuration(queryString(req, 'target_duration_seconds'), ctx.settings.targetDurationSeconds);
    if (!duration.ok) {
      sendError(res, 400, 'VALIDATION_ERROR', duration.message);
      return;
    }

    const record = await ctx.runs.create({
      fileName: fileNameFrom(req),
      pdf: body,
      voiceId: queryString(req, 'voice_id') ?? ctx.settings.voiceId,
      targetDurationSeconds: duration.value,
      totalStages: TOTAL_STAGES,
    });

    try {
      await ctx.queue.enqueue(record.id);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Failed to queue narration run';
      await ctx.runs.setFailed(record.id, {
        code: 'QUEUE_FAILED',
        message,
        stage: 'Extracted',
        retryable: true,
        chunkIndex: null,
      });
      sendError(res, 500, 'QUEUE_FAILED', message, { run_id: record.id });
      return;
    }

    res.status(202).json({
      run_id: record.id,
      stage: record.stage,
      voice_id: record.voice_id,
      target_duration_seconds: record.target_duration_seconds,
      poll_url: `/v1/narrations/${record.id}`,
    });
  });

  router.get('/v1/narrations/:id', async (req, res) => {
    const record = await ctx.runs.get(req.params.id);
    if (!record) {
      sendError(res, 404, 'RUN_NOT_FOUND', 'No narration run found for that id');
      return;
    }
    res.json(present(record));
  });

  router.get('/v1/narrations/:id/audio', async (req, res) => {
    const record = await ctx.runs.get(req.params.id);
    if (!record) {
      sendError(res, 404, 'RUN_NOT_FOUND', 'No narration run found for that id');
      return;
    }
    if (record.stage !== 'Complete' || !record.result) {
      sendError(res, 409, 'RUN_NOT_COMPLETE', `Run is ${record.stage}; audio is available once it is Complete`, {
        stage: record.stage,
      });
      return;
    }

    const url = await ctx.storage.getDownloadUrl(record.result.storage_key, record.result.download_name);
    res.redirect(302, url);
  });

  router.post('/v1/narrations/:id/cancel', async (req, res) => {
    const outcome = await ctx.runs.requestCancel(req.params.id);
    if (outcome === 'not_found') {
      sendError(res, 404, 'RUN_NOT_FOUND', 'No narration run found for that id');
      return;
    }
    if (outcome === 'terminal') {
      sendError(res, 409, 'RUN_ALREADY_FINISHED', 'Run has already finished');
      return;
    }
    res.status(202).json({ run_id: req.params.id, cancel_requested: true });
  });

  return router;
}
