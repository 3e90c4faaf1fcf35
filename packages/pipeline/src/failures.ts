export type FailureCategory =
  | 'rate_limit'
  | 'timeout'
  | 'server'
  | 'network'
  | 'empty_response'
  | 'invalid_request'
  | 'auth'
  | 'content_policy'
  | 'unknown';

const TRANSIENT_CATEGORIES: ReadonlySet<FailureCategory> = new Set([
  'rate_limit',
  'timeout',
  'server',
  'network',
  'empty_response',
]);

export function isTransientCategory(category: FailureCategory): boolean {
  return TRANSIENT_CATEGORIES.has(category);
}

/**
 * Provider-neutral failure crossing the LLM/TTS boundary.
 *
 * Provider adapters translate their SDK's exceptions into this shape so the
 * retry loop and the orchestrator never see a vendor error hierarchy.
 */
export class ProviderFailure extends Error {
  public readonly isRetryable: boolean;

  constructor(
    public readonly category: FailureCategory,
    message: string,
    public readonly statusCode?: number,
    public readonly retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProviderFailure';
    this.isRetryable = isTransientCategory(category);
    Object.setPrototypeOf(this, ProviderFailure.prototype);
  }
}

export function categoryForStatus(status: number): FailureCategory {
  if (status === 429) return 'rate_limit';
  if (status === 408 || status === 504) return 'timeout';
  if (status >= 500) return 'server';
  if (status === 401 || status === 403) return 'auth';
  if (status === 400 || status === 404 || status === 409 || status === 413 || status === 422) {
    return 'invalid_request';
  }
  return 'unknown';
}

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET']);

function errorCode(error: Error): string | undefined {
  if (!('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

/**
 * Best-effort normalization for errors that did not come through an adapter:
 * aborted/timed-out fetches, socket errors, and anything else.
 */
export function toProviderFailure(error: unknown): ProviderFailure {
  if (error instanceof ProviderFailure) return error;

  if (error instanceof Error) {
    const code = errorCode(error);
    if (error.name === 'TimeoutError' || error.name === 'AbortError' || code === 'ETIMEDOUT') {
      return new ProviderFailure('timeout', error.message || 'Request timed out', undefined, undefined, { cause: error });
    }
    if (code && NETWORK_CODES.has(code)) {
      return new ProviderFailure('network', error.message, undefined, undefined, { cause: error });
    }
    return new ProviderFailure('unknown', error.message, undefined, undefined, { cause: error });
  }

  return new ProviderFailure('unknown', String(error));
}
