// Error taxonomy shared by every pipeline stage.
// Each error names the company, product or setting it concerns.

/**
 * Malformed or out-of-range input: indicator records, series, supplier lists,
 * catalog entries. Aborts only the pipeline of the affected subject.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly subject: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Forecast requested on a series shorter than the model's minimum. */
export class InsufficientHistoryError extends Error {
  constructor(
    message: string,
    public readonly subject: string,
    public readonly required: number,
    public readonly actual: number,
  ) {
    super(message);
    this.name = 'InsufficientHistoryError';
  }
}

/**
 * Broken policy or runtime configuration. Raised while tables are loaded,
 * never per request.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly setting: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type EngineError = ValidationError | InsufficientHistoryError | ConfigurationError;

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof ValidationError
    || err instanceof InsufficientHistoryError
    || err instanceof ConfigurationError;
}

/** Subject the error concerns, for reporting. */
export function errorSubject(err: EngineError): string {
  return err instanceof ConfigurationError ? err.setting : err.subject;
}
