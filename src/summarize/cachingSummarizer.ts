import type { SummarizationError } from '../pipeline/errors';
import { buildSummaryCacheKey, readSummaryCache, writeSummaryCache } from '../utils/cache';
import { errorMessage } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { ok, type Result } from '../utils/result';
import { SUMMARY_PROMPT_VERSION } from './prompts';
import type { SummarizeOptions, Summarizer } from './types';

export interface CachingSummarizerOptions {
  cacheDir: string;
  model: string;
  promptVersion?: string;
  logger?: Logger;
}

/**
 * Serves summaries for previously seen paper text from disk. Only successful
 * summaries are stored; cache read or write problems fall through to the
 * wrapped summarizer.
 */
export class CachingSummarizer implements Summarizer {
  private readonly logger: Logger;
  private readonly promptVersion: string;

  constructor(
    private readonly inner: Summarizer,
    private readonly options: CachingSummarizerOptions
  ) {
    this.logger = options.logger ?? createLogger('SummaryCache');
    this.promptVersion = options.promptVersion ?? SUMMARY_PROMPT_VERSION;
  }

  async summarize(
    text: string,
    options?: SummarizeOptions
  ): Promise<Result<string, SummarizationError>> {
    const { cacheDir, model } = this.options;
    const { key, inputHash } = buildSummaryCacheKey({
      model,
      promptVersion: this.promptVersion,
      text,
    });

    try {
      const cached = await readSummaryCache(cacheDir, key);
      if (cached) {
        this.logger.info('Cache hit', { inputHash });
        return ok(cached.summary);
      }
    } catch (error) {
      this.logger.warn(`Failed to read summary cache: ${errorMessage(error)}`, { inputHash });
    }

    const result = await this.inner.summarize(text, options);
    if (!result.ok) {
      return result;
    }

    try {
      await writeSummaryCache(cacheDir, key, {
        meta: {
          createdAt: new Date().toISOString(),
          model,
          promptVersion: this.promptVersion,
          inputHash,
        },
        summary: result.value,
      });
    } catch (error) {
      this.logger.warn(`Failed to write summary cache: ${errorMessage(error)}`, { inputHash });
    }
    return result;
  }
}
