import { v4 as uuidv4 } from 'uuid';
import type { DuplicateTitlePolicy } from '../config/settings';
import { loadCorpus } from '../corpus/loadCorpus';
import { segmentCorpus } from '../corpus/segment';
import { extractTitle } from '../corpus/title';
import type { PaperRecord } from '../corpus/types';
import { outputPathFor, PdfDocumentWriter } from '../render/pdfWriter';
import type { DocumentWriter } from '../render/types';
import type { Summarizer } from '../summarize/types';
import { LaneLimiter } from '../utils/limiter';
import { errorMessage, toError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { err, type Result } from '../utils/result';
import { sanitizeFileName } from '../utils/sanitize';
import { RenderError, SummarizationError } from './errors';
import { summarizeReport } from './report';
import type { BatchOptions, BatchReport, FailureStage, PaperOutcome } from './types';

export const DEFAULT_OUTPUT_DIR = 'summaries';

const defaultLogger = createLogger('Batch');

export interface PaperJob {
  record: PaperRecord;
  title: string;
  fileTitle: string;
}

interface BatchContext {
  summarizer: Summarizer;
  writer: DocumentWriter;
  outputDir: string;
  logger: Logger;
  total: number;
  signal?: AbortSignal;
}

/**
 * Gives every paper its title and the title its file is named after. Under
 * `suffix`, a paper whose sanitized name is already taken gets " (2)",
 * " (3)", ... appended until the name is free.
 */
export function planJobs(records: PaperRecord[], policy: DuplicateTitlePolicy): PaperJob[] {
  const taken = new Set<string>();

  return records.map((record) => {
    const title = extractTitle(record.text);
    if (policy === 'overwrite') {
      return { record, title, fileTitle: title };
    }

    let fileTitle = title;
    for (let n = 2; taken.has(sanitizeFileName(fileTitle)); n++) {
      fileTitle = `${title} (${n})`;
    }
    taken.add(sanitizeFileName(fileTitle));
    return { record, title, fileTitle };
  });
}

async function processPaper(job: PaperJob, ctx: BatchContext): Promise<PaperOutcome> {
  const { record, title, fileTitle } = job;
  const { logger, signal } = ctx;
  const failed = (stage: FailureStage, reason: string): PaperOutcome => ({
    status: 'failed',
    index: record.index,
    title,
    stage,
    reason,
  });

  if (signal?.aborted) {
    return failed('aborted', 'Batch aborted before the paper was started');
  }

  logger.info(`(${record.index}/${ctx.total}) Summarizing "${title}"`);

  let summary: Result<string, SummarizationError>;
  try {
    summary = await ctx.summarizer.summarize(record.text, { signal });
  } catch (error) {
    summary = err(new SummarizationError('model_error', errorMessage(error), error));
  }

  if (!summary.ok) {
    logger.error(`Summarization failed for "${title}": ${summary.error.message}`, {
      index: record.index,
      reason: summary.error.reason,
    });
    return failed(summary.error.reason === 'aborted' ? 'aborted' : 'summarize', summary.error.message);
  }

  if (signal?.aborted) {
    return failed('aborted', 'Batch aborted before the document was written');
  }

  let written: Result<string, RenderError>;
  try {
    written = await ctx.writer.write(ctx.outputDir, title, summary.value, { fileTitle });
  } catch (error) {
    const outputPath = outputPathFor(ctx.outputDir, fileTitle, ctx.writer.extension);
    written = err(new RenderError(outputPath, toError(error)));
  }

  if (!written.ok) {
    logger.error(`Could not save summary for "${title}": ${written.error.message}`, {
      index: record.index,
      outputPath: written.error.outputPath,
    });
    return failed('write', written.error.message);
  }

  return { status: 'success', index: record.index, title, outputPath: written.value };
}

export async function runBatch(inputPath: string, options: BatchOptions): Promise<BatchReport> {
  const logger = options.logger ?? defaultLogger;
  const outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;
  const batchId = options.batchId ?? uuidv4();
  const startedAt = new Date().toISOString();

  const finish = (outcomes: PaperOutcome[], fatal?: string): BatchReport => ({
    batchId,
    inputPath,
    outputDir,
    startedAt,
    finishedAt: new Date().toISOString(),
    ...(fatal !== undefined ? { fatal } : {}),
    outcomes,
  });

  const corpus = await loadCorpus(inputPath);
  if (!corpus.ok) {
    logger.error(corpus.error.message, { batchId, inputPath });
    return finish([], corpus.error.message);
  }

  const records = segmentCorpus(corpus.value, options.delimiterLength);
  if (records.length === 0) {
    logger.warn(`No papers found in ${inputPath}`, { batchId });
    return finish([]);
  }

  logger.info(`Starting batch ${batchId}: ${records.length} papers from ${inputPath}`);

  const ctx: BatchContext = {
    summarizer: options.summarizer,
    writer: options.writer ?? new PdfDocumentWriter(),
    outputDir,
    logger,
    total: records.length,
    signal: options.signal,
  };
  const pool = new LaneLimiter({ paper: Math.max(1, Math.floor(options.concurrency ?? 1)) });
  const jobs = planJobs(records, options.onDuplicateTitle ?? 'overwrite');

  const outcomes = await Promise.all(
    jobs.map((job) => pool.limit('paper', () => processPaper(job, ctx)))
  );

  const report = finish(outcomes);
  const counts = summarizeReport(report);
  logger.info(
    `Finished batch ${batchId}: ${counts.succeeded} succeeded, ${counts.failed} failed of ${counts.total}`
  );
  return report;
}
