import type { NextFunction, Request, Response } from 'express';

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function sendError(
  res: Response,
  status: number,
  code: string,
  message: string,
  details?: Record<string, unknown>,
): void {
  const body: ApiErrorBody = { error: details ? { code, message, details } : { code, message } };
  res.status(status).json(body);
}

function numericField(error: unknown, field: 'status' | 'statusCode'): number | undefined {
  if (typeof error !== 'object' || error === null || !(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'number' ? value : undefined;
}

function typeField(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('type' in error)) return undefined;
  return typeof error.type === 'string' ? error.type : undefined;
}

/** Maps body-parser and unexpected errors onto the JSON error envelope. */
export function createErrorHandler(options: { maxPdfBytes: number; logPrefix: string }) {
  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (typeField(error) === 'entity.too.large') {
      sendError(res, 413, 'PAYLOAD_TOO_LARGE', `PDF exceeds the ${options.maxPdfBytes} byte upload limit`, {
        max_bytes: options.maxPdfBytes,
      });
      return;
    }

    const status = numericField(error, 'status') ?? numericField(error, 'statusCode');
    if (status !== undefined && status >= 400 && status < 500) {
      sendError(res, status, 'BAD_REQUEST', error instanceof Error ? error.message : 'Bad request');
      return;
    }

    // eslint-disable-next-line no-console
    console.error(`[${options.logPrefix}] unhandled error on ${req.method} ${req.path}`, error);
    sendError(res, 500, 'INTERNAL_ERROR', 'Internal server error');
  };
}
