import type { DuplicateTitlePolicy } from '../config/settings';
import type { DocumentWriter } from '../render/types';
import type { Summarizer } from '../summarize/types';
import type { Logger } from '../utils/logger';

export type FailureStage = 'summarize' | 'write' | 'aborted';

export type PaperOutcome =
  | {
      status: 'success';
      index: number;
      title: string;
      outputPath: string;
    }
  | {
      status: 'failed';
      index: number;
      title: string;
      stage: FailureStage;
      reason: string;
    };

export interface BatchReport {
  batchId: string;
  inputPath: string;
  outputDir: string;
  startedAt: string;
  finishedAt: string;
  /** Set when the corpus could not be read; `outcomes` is then empty. */
  fatal?: string;
  outcomes: PaperOutcome[];
}

export interface BatchOptions {
  summarizer: Summarizer;
  writer?: DocumentWriter;
  outputDir?: string;
  logger?: Logger;
  /** Papers processed at once. 1 keeps the batch strictly sequential. */
  concurrency?: number;
  onDuplicateTitle?: DuplicateTitlePolicy;
  signal?: AbortSignal;
  batchId?: string;
  delimiterLength?: number;
}
