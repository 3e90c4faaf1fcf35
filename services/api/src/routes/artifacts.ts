import { Router } from 'express';
import { basename, join } from 'path';
import { sendError } from '../middleware/errors.js';

export function createArtifactsRouter(directory: string): Router {
  const router = Router();

  router.get('/artifacts/:file', (req, res) => {
    const file = basename(req.params.file);
    const requested = req.query.download;
    const downloadName = typeof requested === 'string' && requested ? basename(requested) : file;

    res.download(join(directory, file), downloadName, (error) => {
      if (!error || res.headersSent) return;
      sendError(res, 404, 'ARTIFACT_NOT_FOUND', 'No artifact with that name');
    });
  });

  return router;
}
