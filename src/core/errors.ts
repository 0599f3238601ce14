export type RepositoryErrorKind =
  | 'NotFound'
  | 'InvalidData'
  | 'SaveFailed'
  | 'DeleteFailed'
  | 'FetchFailed'
  | 'SearchFailed'
  | 'ContextUnavailable';

const DESCRIPTIONS: Record<RepositoryErrorKind, string> = {
  NotFound: 'Note not found',
  InvalidData: 'Invalid data',
  SaveFailed: 'Save failed',
  DeleteFailed: 'Delete failed',
  FetchFailed: 'Fetch failed',
  SearchFailed: 'Search failed',
  ContextUnavailable: 'Context unavailable',
};

function describeCause(cause: unknown): string | undefined {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  return undefined;
}

/**
 * The single error type surfaced by repositories and the notes service.
 * Store failures keep the originating error as `cause`.
 */
export class RepositoryError extends Error {
  readonly kind: RepositoryErrorKind;

  constructor(kind: RepositoryErrorKind, options: { cause?: unknown; detail?: string } = {}) {
    const detail = options.detail ?? describeCause(options.cause);
    super(detail ? `${DESCRIPTIONS[kind]}: ${detail}` : DESCRIPTIONS[kind], {
      cause: options.cause,
    });
    this.name = 'RepositoryError';
    this.kind = kind;
  }

  static notFound(id?: string): RepositoryError {
    return new RepositoryError('NotFound', { detail: id });
  }

  static invalidData(detail: string): RepositoryError {
    return new RepositoryError('InvalidData', { detail });
  }

  static contextUnavailable(): RepositoryError {
    return new RepositoryError('ContextUnavailable', { detail: 'store is no longer available' });
  }
}

export function isRepositoryError(
  error: unknown,
  kind?: RepositoryErrorKind
): error is RepositoryError {
  return error instanceof RepositoryError && (kind === undefined || error.kind === kind);
}

/**
 * Wrap a store failure in the given kind. Errors that already belong to the
 * taxonomy are returned untouched so they are never wrapped twice.
 */
export function toRepositoryError(kind: RepositoryErrorKind, error: unknown): RepositoryError {
  if (error instanceof RepositoryError) {
    return error;
  }
  return new RepositoryError(kind, { cause: error });
}

/**
 * HTTP status code carried by a client error (nano attaches `statusCode`).
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const { statusCode } = error;
    return typeof statusCode === 'number' ? statusCode : undefined;
  }
  return undefined;
}

/**
 * Node system error code (ECONNREFUSED, ETIMEDOUT, ...) if any.
 */
export function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
