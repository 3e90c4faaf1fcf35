import { timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

function presentedKey(req: Request): string {
  const header = req.header('x-api-key');
  if (header) return header.trim();
  const authorization = req.header('authorization') || '';
  return authorization.startsWith('Bearer ') ? authorization.slice('Bearer '.length).trim() : '';
}

function keysMatch(incoming: string, expected: string): boolean {
  const a = Buffer.from(incoming);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Operator gate for /v1; disabled when no key is configured. */
export function createApiKeyMiddleware(masterApiKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!masterApiKey) {
      next();
      return;
    }

    if (!keysMatch(presentedKey(req), masterApiKey)) {
      res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid x-api-key',
        },
      });
      return;
    }

    next();
  };
}
