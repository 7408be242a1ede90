/**
 * Error taxonomy for catalog reconciliation.
 *
 * ParseWarning is a value, never thrown: the normalizer applies a default and
 * reports it. The error classes are caught per record by the session, except
 * LoadError, which aborts a run before anything is written.
 */

export type ReconcileErrorCode = 'CONFLICT' | 'RECORD_FAILED' | 'LOAD_FAILED';

export abstract class ReconcileError extends Error {
  abstract readonly code: ReconcileErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Merge would give an externalId to an entry while another entry owns it
 */
export class ConflictError extends ReconcileError {
  readonly code = 'CONFLICT' as const;

  constructor(
    readonly externalId: string,
    readonly catalogId: string,
    readonly ownerCatalogId: string
  ) {
    super(
      `externalId ${externalId} already belongs to catalog entry ${ownerCatalogId}; refusing to assign it to ${catalogId}`
    );
  }
}

/**
 * Unexpected failure while processing one incoming record
 */
export class RecordError extends ReconcileError {
  readonly code = 'RECORD_FAILED' as const;

  constructor(
    readonly recordName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  static wrap(recordName: string, error: unknown): RecordError {
    if (error instanceof RecordError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new RecordError(recordName, `Failed to process "${recordName}": ${message}`, { cause: error });
  }
}

/**
 * Catalog snapshot (or the batch itself) could not be loaded; fatal
 */
export class LoadError extends ReconcileError {
  readonly code = 'LOAD_FAILED' as const;
}

export interface ParseWarning {
  field: string;
  rawValue: unknown;
  recordName: string;
  message: string;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
