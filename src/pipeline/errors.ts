export class FatalInputError extends Error {
  constructor(
    public readonly inputPath: string,
    public readonly originalError: Error
  ) {
    super(`Cannot read corpus ${inputPath}: ${originalError.message}`);
    this.name = 'FatalInputError';
    this.cause = originalError;
  }
}

export type SummarizationFailureReason =
  | 'timeout'
  | 'empty_response'
  | 'aborted'
  | 'model_error';

export class SummarizationError extends Error {
  constructor(
    public readonly reason: SummarizationFailureReason,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'SummarizationError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class RenderError extends Error {
  constructor(
    public readonly outputPath: string,
    public readonly originalError: Error
  ) {
    super(`Failed to write ${outputPath}: ${originalError.message}`);
    this.name = 'RenderError';
    this.cause = originalError;
  }
}

export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class CorpusFetchError extends Error {
  constructor(
    public readonly query: string,
    message: string
  ) {
    super(message);
    this.name = 'CorpusFetchError';
  }
}
