/**
 * Provider-facing error taxonomy. Adapters translate SDK/HTTP failures into these
 * so callers never inspect axios or openai error shapes.
 */

export type ProviderErrorKind = 'rate_limited' | 'timeout' | 'unavailable' | 'invalid_request' | 'auth';

const TRANSIENT_KINDS: ReadonlySet<ProviderErrorKind> = new Set(['rate_limited', 'timeout', 'unavailable']);

export class ProviderError extends Error {
  readonly status: number | undefined;

  constructor(
    readonly provider: string,
    readonly kind: ProviderErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ProviderError';
    this.status = options?.status;
  }

  /** Retryable in principle. The chat fallback loop advances on either kind. */
  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

export class UnsupportedFormatError extends Error {
  constructor(readonly mimeType: string) {
    super(`Unsupported audio format: ${mimeType || '(empty)'}`);
    this.name = 'UnsupportedFormatError';
  }
}

export class LocationNotFoundError extends Error {
  constructor(readonly location: string) {
    super(`Location '${location}' not found`);
    this.name = 'LocationNotFoundError';
  }
}

/** Maps an HTTP status (or its absence) to an error kind. */
export function kindFromStatus(status: number | undefined): ProviderErrorKind {
  if (status === undefined) return 'unavailable';
  if (status === 401 || status === 403) return 'auth';
  if (status === 408) return 'timeout';
  if (status === 429) return 'rate_limited';
  if (status >= 500) return 'unavailable';
  return 'invalid_request';
}

/** HTTP status carried by SDK/HTTP errors (`status` or `statusCode`), if any. */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}
