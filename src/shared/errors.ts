export type AgedCacheErrorCode = 'INVALID_RETENTION' | 'INVALID_CONFIG';

export type ErrorContext = Record<string, unknown>;

export class AgedCacheError extends Error {
  readonly code: AgedCacheErrorCode;
  readonly context: ErrorContext;

  constructor(opts: {
    code: AgedCacheErrorCode;
    message: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super(opts.message, opts.cause ? { cause: opts.cause } : undefined);
    this.name = 'AgedCacheError';
    this.code = opts.code;
    this.context = opts.context ?? {};
  }
}
