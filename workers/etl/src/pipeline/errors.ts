export type PipelineErrorKind = 'validation' | 'unexpected';

/** A failure that ends a run. Its message is what the audit log records. */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
}

/** A mandatory staging table had no valid rows. */
export class ValidationFailure extends PipelineError {
  readonly kind = 'validation';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationFailure';
  }
}

/** Anything else that went wrong mid-run (storage, I/O, bugs). */
export class UnexpectedFailure extends PipelineError {
  readonly kind = 'unexpected';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnexpectedFailure';
  }
}

/** Normalize a thrown value into a PipelineError, keeping the original as `cause`. */
export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new UnexpectedFailure(message, { cause: error });
}
