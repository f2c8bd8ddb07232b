/**
 * Error taxonomy for the retrieval engine.
 *
 * Every failure the pipelines raise is a RagError carrying a category and a
 * retryable flag. Callers retry only what is marked retryable; configuration
 * faults are never retried.
 */

export type ErrorCategory =
  | 'INPUT_ERROR'
  | 'BACKEND_UNAVAILABLE'
  | 'CONFIGURATION_ERROR'
  | 'INGESTION_FAILED'
  | 'DELETION_FAILED'
  | 'INTERNAL_ERROR';

export type Backend = 'embedding' | 'generation' | 'vector_store';

export class RagError extends Error {
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    category: ErrorCategory,
    message: string,
    options: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RagError';
    this.category = category;
    this.retryable = options.retryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  static fromUnknown(error: unknown, category: ErrorCategory = 'INTERNAL_ERROR'): RagError {
    if (error instanceof RagError) {
      return error;
    }
    if (error instanceof Error) {
      return new RagError(category, error.message, {
        details: { originalName: error.name },
        cause: error
      });
    }
    return new RagError(category, String(error), { details: { originalValue: error } });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      retryable: this.retryable,
      details: this.details
    };
  }
}

// ─── Input ───────────────────────────────────────────────────────────────────

export class InputError extends RagError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INPUT_ERROR', message, { details });
    this.name = 'InputError';
  }
}

export class EmptyDocumentError extends InputError {
  constructor(message: string = 'Document contains no text to index') {
    super(message);
    this.name = 'EmptyDocumentError';
  }
}

// ─── Backends ────────────────────────────────────────────────────────────────

export class BackendUnavailableError extends RagError {
  public readonly backend: Backend;

  constructor(backend: Backend, message: string, cause?: unknown) {
    super('BACKEND_UNAVAILABLE', message, { retryable: true, details: { backend }, cause });
    this.name = 'BackendUnavailableError';
    this.backend = backend;
  }
}

export class EmbeddingUnavailableError extends BackendUnavailableError {
  constructor(message: string, cause?: unknown) {
    super('embedding', message, cause);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class EmbeddingTimeoutError extends BackendUnavailableError {
  constructor(timeoutMs: number) {
    super('embedding', `Embedding request exceeded ${timeoutMs}ms`);
    this.name = 'EmbeddingTimeoutError';
  }
}

export class GenerationUnavailableError extends BackendUnavailableError {
  constructor(message: string, cause?: unknown) {
    super('generation', message, cause);
    this.name = 'GenerationUnavailableError';
  }
}

export class StoreUnavailableError extends BackendUnavailableError {
  constructor(message: string, cause?: unknown) {
    super('vector_store', message, cause);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Raised when a batch embedding call fails for some of its inputs.
 * `failures` names the position of every input that could not be embedded.
 */
export class EmbeddingBatchError extends RagError {
  public readonly failures: Array<{ index: number; error: Error }>;

  constructor(failures: Array<{ index: number; error: Error }>, total: number) {
    const retryable = failures.every(f => f.error instanceof RagError && f.error.retryable);
    super(
      'BACKEND_UNAVAILABLE',
      `${failures.length}/${total} embeddings failed (inputs ${failures.map(f => f.index).join(', ')})`,
      { retryable, details: { failedIndexes: failures.map(f => f.index) }, cause: failures[0]?.error }
    );
    this.name = 'EmbeddingBatchError';
    this.failures = failures;
  }
}

// ─── Configuration ───────────────────────────────────────────────────────────

export class ConfigurationError extends RagError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, { details });
    this.name = 'ConfigurationError';
  }
}

export class DimensionMismatchError extends ConfigurationError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Vector dimension mismatch: index expects ${expected} but got ${actual}`, { expected, actual });
    this.name = 'DimensionMismatchError';
  }
}

export class UnknownRoleError extends ConfigurationError {
  constructor(public readonly role: string) {
    super(`Unknown role '${role}'`, { role });
    this.name = 'UnknownRoleError';
  }
}

/** The authorization predicate could not be turned into a store filter. */
export class PredicateError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'PredicateError';
  }
}

// ─── Mutation failures ───────────────────────────────────────────────────────

export class PartialIngestionError extends RagError {
  constructor(
    public readonly documentId: string,
    public readonly rolledBack: boolean,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'INGESTION_FAILED',
      rolledBack
        ? `Ingestion of document ${documentId} failed and no partial data was retained: ${reason}`
        : `Ingestion of document ${documentId} failed and rollback did not complete: ${reason}`,
      { details: { documentId, rolledBack }, cause }
    );
    this.name = 'PartialIngestionError';
  }
}

export class IngestionTimeoutError extends RagError {
  constructor(timeoutMs: number) {
    super('INGESTION_FAILED', `Ingestion exceeded ${timeoutMs}ms`, { details: { timeoutMs } });
    this.name = 'IngestionTimeoutError';
  }
}

export class PartialDeletionError extends RagError {
  constructor(
    public readonly target: { documentId?: string; ownerId?: string },
    public readonly remaining: number
  ) {
    super('DELETION_FAILED', `Deletion incomplete: ${remaining} matching records still stored`, {
      details: { ...target, remaining }
    });
    this.name = 'PartialDeletionError';
  }
}

// ─── HTTP mapping ────────────────────────────────────────────────────────────

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  INPUT_ERROR: 400,
  BACKEND_UNAVAILABLE: 503,
  CONFIGURATION_ERROR: 500,
  INGESTION_FAILED: 502,
  DELETION_FAILED: 500,
  INTERNAL_ERROR: 500
};

export function toHttpError(error: unknown): { status: number; body: { error: ErrorCategory; message: string } } {
  const ragError = RagError.fromUnknown(error);
  // A wrapped backend outage is still reported as service-unavailable.
  const cause = ragError.cause;
  const status =
    ragError instanceof PartialIngestionError && cause instanceof BackendUnavailableError
      ? 503
      : STATUS_BY_CATEGORY[ragError.category];
  return { status, body: { error: ragError.category, message: ragError.message } };
}
