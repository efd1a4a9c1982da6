/**
 * Error kinds raised by the load pipeline.
 *
 * - `WRITE_ERROR`: an adapter failed to persist a dataset. Fatal to the run.
 * - `READBACK_ERROR`: an adapter failed to read back a copy it just wrote.
 * - `DIVISION_ERROR`: a compression ratio cannot be computed (zero or missing size).
 * - `INVALID_SIZE`: a size handed to the analyzer is negative or not finite.
 * - `INVALID_DATASET`: a dataset violates its structural invariants.
 * - `CONFIGURATION_ERROR`: the engine or a load input is misconfigured.
 * - `INVALID_TRANSITION`: the load state machine was asked for an illegal transition.
 */
export type LoadErrorKind =
  | 'WRITE_ERROR'
  | 'READBACK_ERROR'
  | 'DIVISION_ERROR'
  | 'INVALID_SIZE'
  | 'INVALID_DATASET'
  | 'CONFIGURATION_ERROR'
  | 'INVALID_TRANSITION';

/** Where an error happened. Every field is optional; set what applies. */
export interface LoadErrorContext {
  readonly dataset?: string;
  readonly format?: string;
  readonly destination?: string;
  readonly column?: string;
}

/** Serialisable shape of a `LoadError`, safe to log or archive. */
export interface LoadErrorInfo {
  readonly kind: LoadErrorKind;
  readonly message: string;
  readonly context: LoadErrorContext;
  readonly cause?: string;
}

export class LoadError extends Error {
  readonly kind: LoadErrorKind;
  readonly context: LoadErrorContext;

  constructor(kind: LoadErrorKind, message: string, context: LoadErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LoadError';
    this.kind = kind;
    this.context = context;
  }

  /** Wrap an unknown thrown value, keeping it as `cause`. */
  static wrap(kind: LoadErrorKind, error: unknown, context: LoadErrorContext = {}): LoadError {
    if (error instanceof LoadError && error.kind === kind) {
      return error;
    }
    return new LoadError(kind, errorMessage(error), context, { cause: error });
  }

  toJSON(): LoadErrorInfo {
    const info: LoadErrorInfo = { kind: this.kind, message: this.message, context: { ...this.context } };
    if (this.cause !== undefined) {
      return { ...info, cause: errorMessage(this.cause) };
    }
    return info;
  }
}

export function isLoadError(error: unknown): error is LoadError {
  return error instanceof LoadError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
