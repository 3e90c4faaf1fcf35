import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      const [runStats, redisPing] = await Promise.all([ctx.runs.stats(), ctx.queue.ping()]);

      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        providers: {
          llm: ctx.llm.name,
          tts: ctx.tts.name,
          storage: ctx.storage.name,
        },
        queue: {
          backend: 'redis',
          redis_ping: redisPing,
          runs: runStats,
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Health check failed';
      res.status(500).json({
        status: 'error',
        error: {
          code: 'HEALTH_CHECK_FAILED',
          message,
        },
      });
    }
  });

  return router;
}
