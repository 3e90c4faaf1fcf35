import express, { type Express } from 'express';
import { createApiKeyMiddleware } from './middleware/apiKey.js';
import { createErrorHandler, sendError } from './middleware/errors.js';
import { createArtifactsRouter } from './routes/artifacts.js';
import { createHealthRouter } from './routes/health.js';
import { createHelpRouter } from './routes/help.js';
import { createNarrationsRouter } from './routes/narrations.js';
import { createVoicesRouter } from './routes/voices.js';
import type { AppContext } from './types/appContext.js';

export function createApp(ctx: AppContext): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(createHelpRouter(ctx));
  app.use(createHealthRouter(ctx));
  app.use('/v1', createApiKeyMiddleware(ctx.masterApiKey));
  app.use(createVoicesRouter(ctx));
  app.use(createNarrationsRouter(ctx));
  if (ctx.artifactsDir) {
    app.use(createArtifactsRouter(ctx.artifactsDir));
  }

  app.use((req, res) => {
    sendError(res, 404, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`);
  });
  app.use(createErrorHandler({ maxPdfBytes: ctx.maxPdfBytes, logPrefix: 'papercast' }));

  return app;
}
