import { Router } from 'express';
import { sendError } from '../middleware/errors.js';
import type { AppContext } from '../types/appContext.js';

export function createVoicesRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/v1/voices', async (_req, res) => {
    try {
      const voices = await ctx.tts.listVoices();
      res.json({
        provider: ctx.tts.name,
        default_voice_id: ctx.settings.voiceId,
        voices,
        count: voices.length,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Failed to list voices';
      sendError(res, 502, 'PROVIDER_ERROR', message);
    }
  });

  return router;
}
