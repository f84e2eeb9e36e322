export type AdvisorErrorCode =
  | 'MALFORMED_CATALOG'
  | 'INDEX_BUILD_FAILED'
  | 'REFRESH_IN_PROGRESS'
  | 'REMOTE_FETCH_FAILED'
  | 'GENERATION_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'VERSION_STORE_FAILED';

/**
 * Base class for every failure this service reports on purpose. The message is
 * written for the person reading the reply, the code for the caller's logic.
 */
export class AdvisorError extends Error {
  readonly code: AdvisorErrorCode;

  constructor(code: AdvisorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MalformedCatalogError extends AdvisorError {
  readonly row: number;
  readonly column: string | null;

  constructor(row: number, column: string | null, detail: string) {
    super('MALFORMED_CATALOG', `Catalog row ${row}${column ? ` (${column})` : ''}: ${detail}`);
    this.row = row;
    this.column = column;
  }
}

export class IndexBuildError extends AdvisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INDEX_BUILD_FAILED', message, options);
  }
}

export class RefreshInProgressError extends AdvisorError {
  readonly runId: string;

  constructor(runId: string) {
    super('REFRESH_IN_PROGRESS', `A catalog refresh (${runId}) is already running`);
    this.runId = runId;
  }
}

export class RemoteFetchError extends AdvisorError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('REMOTE_FETCH_FAILED', `${source}: ${message}`, options);
    this.source = source;
  }
}

export type GenerationFailureReason = 'quota' | 'timeout' | 'unavailable' | 'empty-response';

export class GenerationUnavailableError extends AdvisorError {
  readonly reason: GenerationFailureReason;

  constructor(reason: GenerationFailureReason, message: string, options?: { cause?: unknown }) {
    super('GENERATION_UNAVAILABLE', message, options);
    this.reason = reason;
  }
}

export class NotFoundError extends AdvisorError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class VersionStoreError extends AdvisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VERSION_STORE_FAILED', message, options);
  }
}

export interface PublicError {
  status: number;
  code: AdvisorErrorCode | 'INTERNAL';
  message: string;
}

const STATUS_BY_CODE: Record<AdvisorErrorCode, number> = {
  MALFORMED_CATALOG: 422,
  INDEX_BUILD_FAILED: 422,
  REFRESH_IN_PROGRESS: 409,
  REMOTE_FETCH_FAILED: 502,
  GENERATION_UNAVAILABLE: 503,
  NOT_FOUND: 503,
  VERSION_STORE_FAILED: 500
};

export const toPublicError = (error: unknown): PublicError => {
  if (error instanceof AdvisorError) {
    return { status: STATUS_BY_CODE[error.code], code: error.code, message: error.message };
  }
  return {
    status: 500,
    code: 'INTERNAL',
    message: 'Something went wrong while handling the request. Please try again later.'
  };
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
