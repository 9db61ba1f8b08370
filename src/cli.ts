import * as path from 'path';
import { loadSettings, type Settings } from './config/settings';
import { fetchCorpus } from './ingest/fetchCorpus';
import type { HttpGet } from './ingest/http';
import type { ExtractPdfText } from './ingest/pdfText';
import { summarizeReport, writeReport } from './pipeline/report';
import { runBatch } from './pipeline/runBatch';
import { PdfDocumentWriter } from './render/pdfWriter';
import { CachingSummarizer } from './summarize/cachingSummarizer';
import { GeminiSummarizer } from './summarize/geminiSummarizer';
import type { Summarizer } from './summarize/types';
import { errorMessage } from './utils/errors';
import { configureLimits } from './utils/limiter';
import { createLogger, type Logger } from './utils/logger';

const USAGE = [
  'Usage: paper-digest <corpus.txt> [output-dir]',
  'Splits a corpus of papers separated by a line of 50 "=" and writes one PDF summary per paper.',
  'Example: npm run summarize -- data/papers.txt summaries',
  'Usage: paper-digest fetch <query> [--max N] [--out corpus.txt]',
  'Searches arXiv and writes the newest matching papers as a corpus file.',
];

export interface CliDeps {
  http?: HttpGet;
  extractText?: ExtractPdfText;
}

interface FetchArgs {
  query: string;
  maxResults?: number;
  outFile?: string;
}

function parseFetchArgs(args: string[]): FetchArgs | string {
  const words: string[] = [];
  const parsed: FetchArgs = { query: '' };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--max') {
      const value = Number(args[++i]);
      if (!Number.isInteger(value) || value < 1) {
        return '--max needs a positive whole number';
      }
      parsed.maxResults = value;
    } else if (arg === '--out') {
      const value = args[++i];
      if (!value) {
        return '--out needs a file path';
      }
      parsed.outFile = value;
    } else {
      words.push(arg);
    }
  }
  parsed.query = words.join(' ').trim();
  return parsed.query ? parsed : 'A search query is required';
}

async function runFetch(
  args: string[],
  env: NodeJS.ProcessEnv,
  logger: Logger,
  deps: CliDeps
): Promise<number> {
  const parsed = parseFetchArgs(args);
  if (typeof parsed === 'string') {
    logger.error(parsed);
    USAGE.forEach((line) => logger.error(line));
    return 1;
  }

  try {
    const settings = loadSettings(env);
    configureLimits({ arxiv: settings.arxivConcurrency });
    const result = await fetchCorpus(
      parsed.query,
      parsed.maxResults ?? settings.arxivMaxResults,
      parsed.outFile ?? settings.corpusFile,
      { http: deps.http, extractText: deps.extractText, logger }
    );
    logger.info('Fetch complete', {
      outFile: result.outFile,
      written: result.written.length,
      skipped: result.skipped.length,
    });
    return 0;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }
}

/** Runs one batch from the command line and resolves with the exit code. */
export async function runCli(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = createLogger('CLI'),
  deps: CliDeps = {}
): Promise<number> {
  if (args[0] === 'fetch') {
    return runFetch(args.slice(1), env, logger, deps);
  }

  const [inputPath, outputArg] = args.filter((arg) => !arg.startsWith('--'));
  if (!inputPath) {
    USAGE.forEach((line) => logger.error(line));
    return 1;
  }

  let summarizer: Summarizer;
  let settings: Settings;
  try {
    settings = loadSettings(env);
    summarizer = GeminiSummarizer.fromSettings(settings);
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  }

  configureLimits({
    summarize: settings.concurrency,
    render: settings.renderConcurrency,
    arxiv: settings.arxivConcurrency,
  });

  if (settings.cacheEnabled) {
    summarizer = new CachingSummarizer(summarizer, {
      cacheDir: path.resolve(settings.cacheDir),
      model: settings.summaryModel,
    });
  }

  const controller = new AbortController();
  const onSignal = (): void => {
    logger.warn('Interrupted, finishing papers in flight');
    controller.abort();
  };
  process.once('SIGINT', onSignal);

  try {
    const report = await runBatch(inputPath, {
      summarizer,
      writer: new PdfDocumentWriter(),
      outputDir: outputArg ?? settings.outputDir,
      concurrency: settings.concurrency,
      onDuplicateTitle: settings.onDuplicateTitle,
      signal: controller.signal,
    });

    if (report.fatal) {
      logger.error(report.fatal);
      return 1;
    }

    const counts = summarizeReport(report);
    if (counts.total > 0) {
      const reportPath = await writeReport(report);
      logger.info(`Report written to ${reportPath}`);
    }
    logger.info('Batch complete', { ...counts });

    return counts.total > 0 && counts.succeeded === 0 ? 1 : 0;
  } finally {
    process.removeListener('SIGINT', onSignal);
  }
}
