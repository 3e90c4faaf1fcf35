import { Router } from 'express';
import { config } from '../config.js';
import type { AppContext } from '../types/appContext.js';
import { MAX_TARGET_DURATION_SECONDS, MIN_TARGET_DURATION_SECONDS } from './narrations.js';

export function createHelpRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/help', (_req, res) => {
    res.json({
      service: 'papercast',
      version: '0.1.0',
      summary: 'Upload a research paper PDF and get back a narrated audio summary.',
      base_url: config.publicBaseUrl,
      quickstart: [
        '1) POST /v1/narrations with the PDF as the raw body (Content-Type: application/pdf)',
        '2) Poll GET /v1/narrations/{run_id} until stage is Complete or Failed',
        '3) GET /v1/narrations/{run_id}/audio to download the MP3',
      ],
      auth: ctx.masterApiKey
        ? { header: 'x-api-key: <MASTER_API_KEY>', alternative: 'Authorization: Bearer <MASTER_API_KEY>' }
        : { note: 'No API key configured for this deployment.' },
      pipeline: {
        stages: ['Uploaded', 'Extracted', 'Prepared', 'Summarized', 'Synthesized', 'Complete'],
        failure_stage: 'Failed',
        providers: { llm: ctx.llm.name, tts: ctx.tts.name },
      },
      limits: {
        max_pdf_bytes: ctx.maxPdfBytes,
        max_input_chars: ctx.settings.maxInputChars,
        target_duration_seconds: {
          default: ctx.settings.targetDurationSeconds,
          min: MIN_TARGET_DURATION_SECONDS,
          max: MAX_TARGET_DURATION_SECONDS,
        },
      },
      endpoints: {
        public: ['GET /help', 'GET /health'],
        api_key_required: [
          'GET /v1/voices',
          'POST /v1/narrations?voice_id=&target_duration_seconds=',
          'GET /v1/narrations/{run_id}',
          'GET /v1/narrations/{run_id}/audio',
          'POST /v1/narrations/{run_id}/cancel',
        ],
      },
      request_examples: {
        create_narration: {
          method: 'POST',
          path: '/v1/narrations?target_duration_seconds=180',
          headers: ['Content-Type: application/pdf', 'x-file-name: paper.pdf'],
          body: '<raw PDF bytes>',
        },
      },
    });
  });

  return router;
}
