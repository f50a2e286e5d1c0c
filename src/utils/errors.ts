/**
 * Error taxonomy for extraction runs.
 *
 * Fatal to a run:       ConnectionError, QueryError
 * Recoverable per row:  MalformedRowError
 * Recoverable per sink: StorageError
 */

export type ExtractorErrorKind = 'connection' | 'query' | 'malformed_row' | 'storage';

export abstract class ExtractorError extends Error {
  abstract readonly kind: ExtractorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Source unreachable or credentials rejected. */
export class ConnectionError extends ExtractorError {
  readonly kind = 'connection' as const;

  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The join/filter could not be executed, or it exceeded the query timeout. */
export class QueryError extends ExtractorError {
  readonly kind = 'query' as const;

  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A source row lacks one of the identity fields. */
export class MalformedRowError extends ExtractorError {
  readonly kind = 'malformed_row' as const;

  constructor(
    message: string,
    public readonly missingFields: string[],
  ) {
    super(message);
  }
}

/** A sink could not be opened or written. `written` counts rows already persisted. */
export class StorageError extends ExtractorError {
  readonly kind = 'storage' as const;

  constructor(
    message: string,
    public readonly written = 0,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the `code` property that mysql2 and Node system
 * errors attach to their Error objects.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
