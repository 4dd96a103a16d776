export type AnalysisErrorKind =
  | 'InvalidImageError'
  | 'SchemaValidationError'
  | 'ModelUnavailableError'
  | 'IncompleteInputError'
  | 'AnalysisCancelledError';

/**
 * Base class for every failure a pipeline stage can report. `kind` is the tag
 * surfaced to callers; `retryable` tells the model gateway whether another
 * attempt with the same input may succeed.
 */
export abstract class AnalysisError extends Error {
  abstract readonly kind: AnalysisErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Empty, oversized or unsupported upload. The user has to resubmit. */
export class InvalidImageError extends AnalysisError {
  readonly kind = 'InvalidImageError' as const;
  readonly retryable = false;
}

/** Model output that is not JSON or does not match the stage schema. */
export class SchemaValidationError extends AnalysisError {
  readonly kind = 'SchemaValidationError' as const;
  readonly retryable = true;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class ModelUnavailableError extends AnalysisError {
  readonly kind = 'ModelUnavailableError' as const;
  readonly retryable: boolean;
  readonly status: number | undefined;

  constructor(
    message: string,
    options: { retryable?: boolean; status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.retryable = options.retryable ?? true;
    this.status = options.status;
  }
}

/** A stage was handed a payload missing required fields. Always a bug. */
export class IncompleteInputError extends AnalysisError {
  readonly kind = 'IncompleteInputError' as const;
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class AnalysisCancelledError extends AnalysisError {
  readonly kind = 'AnalysisCancelledError' as const;
  readonly retryable = false;
}
