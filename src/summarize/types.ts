import type { SummarizationError } from '../pipeline/errors';
import type { Result } from '../utils/result';

export interface SummarizeOptions {
  signal?: AbortSignal;
}

/**
 * Condenses one paper's raw text into prose. Implementations resolve with a
 * failed result instead of rejecting.
 */
export interface Summarizer {
  summarize(
    text: string,
    options?: SummarizeOptions
  ): Promise<Result<string, SummarizationError>>;
}
