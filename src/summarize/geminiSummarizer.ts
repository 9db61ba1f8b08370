import {
  GoogleGenerativeAI,
  type GenerateContentRequest,
  type SingleRequestOptions,
} from '@google/generative-ai';
import type { Settings } from '../config/settings';
import { SummarizationError, TimeoutError } from '../pipeline/errors';
import { limit } from '../utils/limiter';
import { errorMessage } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { err, ok, type Result } from '../utils/result';
import { withTimeout } from '../utils/timeout';
import { formatSummary } from './formatSummary';
import { buildSummaryPrompt } from './prompts';
import type { SummarizeOptions, Summarizer } from './types';

/** The slice of the Gemini model client the summarizer calls. */
export interface SummaryModel {
  generateContent(
    request: GenerateContentRequest,
    requestOptions?: SingleRequestOptions
  ): Promise<{ response: { text(): string } }>;
}

export interface GeminiSummarizerConfig {
  modelName: string;
  timeoutMs: number;
  maxOutputTokens: number;
}

const defaultLogger = createLogger('Summarizer');

export class GeminiSummarizer implements Summarizer {
  constructor(
    private readonly model: SummaryModel,
    private readonly config: GeminiSummarizerConfig,
    private readonly logger: Logger = defaultLogger
  ) {}

  static fromSettings(settings: Settings, logger: Logger = defaultLogger): GeminiSummarizer {
    if (!settings.googleApiKey) {
      throw new Error('GOOGLE_API_KEY environment variable is not set');
    }
    const genAI = new GoogleGenerativeAI(settings.googleApiKey);
    const model = genAI.getGenerativeModel({ model: settings.summaryModel });
    return new GeminiSummarizer(
      model,
      {
        modelName: settings.summaryModel,
        timeoutMs: settings.summaryTimeoutMs,
        maxOutputTokens: settings.summaryMaxTokens,
      },
      logger
    );
  }

  async summarize(
    text: string,
    options: SummarizeOptions = {}
  ): Promise<Result<string, SummarizationError>> {
    const { modelName, timeoutMs, maxOutputTokens } = this.config;
    const startedAt = Date.now();

    try {
      const response = await limit('summarize', () =>
        withTimeout(`Summarization with ${modelName}`, timeoutMs, () =>
          this.model.generateContent(
            {
              contents: [{ role: 'user', parts: [{ text: buildSummaryPrompt(text) }] }],
              generationConfig: { maxOutputTokens, temperature: 0.2 },
            },
            { signal: options.signal, timeout: timeoutMs }
          )
        )
      );

      const responseText = response.response.text();
      if (!responseText.trim()) {
        const failure = new SummarizationError(
          'empty_response',
          `Model ${modelName} returned no text`
        );
        this.logger.error(failure.message);
        return err(failure);
      }

      this.logger.info(
        `Summarized ${text.length} chars into ${responseText.length} chars in ${Date.now() - startedAt}ms`
      );
      return ok(formatSummary(responseText));
    } catch (error) {
      const failure = toSummarizationError(error, options.signal);
      this.logger.error(`Error during summarization: ${failure.message}`, {
        reason: failure.reason,
        model: modelName,
      });
      return err(failure);
    }
  }
}

function toSummarizationError(error: unknown, signal?: AbortSignal): SummarizationError {
  if (error instanceof TimeoutError) {
    return new SummarizationError('timeout', error.message, error);
  }
  if (signal?.aborted) {
    return new SummarizationError('aborted', 'Summarization aborted', error);
  }
  return new SummarizationError('model_error', errorMessage(error), error);
}
