import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_DELIMITER_LENGTH, isDelimiterLine } from '../corpus/segment';
import { CorpusFetchError } from '../pipeline/errors';
import { writeFileAtomic } from '../utils/atomicWrite';
import { errorMessage } from '../utils/errors';
import { limit } from '../utils/limiter';
import { createLogger, type Logger } from '../utils/logger';
import { ArxivClient, type ArxivPaper } from './arxiv/client';
import { httpGet, type HttpGet } from './http';
import { extractPdfText, type ExtractPdfText } from './pdfText';

export interface FetchCorpusOptions {
  http?: HttpGet;
  extractText?: ExtractPdfText;
  logger?: Logger;
}

type DownloadResult =
  | { paper: ArxivPaper; ok: true; text: string }
  | { paper: ArxivPaper; ok: false; reason: string };

export interface FetchCorpusResult {
  outFile: string;
  written: Array<{ index: number; title: string; pdfUrl: string }>;
  skipped: Array<{ title: string; pdfUrl: string; reason: string }>;
}

const DELIMITER = '='.repeat(DEFAULT_DELIMITER_LENGTH);
const ESCAPED_DELIMITER = '-'.repeat(DEFAULT_DELIMITER_LENGTH);

/** Keeps extracted text from closing its own block early. */
export function escapeDelimiterLines(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => (isDelimiterLine(line, DEFAULT_DELIMITER_LENGTH) ? ESCAPED_DELIMITER : line))
    .join('\n');
}

export function formatCorpusBlock(index: number, paper: ArxivPaper, text: string): string {
  return [
    '',
    DELIMITER,
    `Paper ${index}`,
    `Title: ${paper.title}`,
    `Abstract: ${paper.abstract}`,
    `PDF URL: ${paper.pdfUrl}`,
    '',
    'Full Content:',
    escapeDelimiterLines(text),
    DELIMITER,
    '',
  ].join('\n');
}

async function downloadPaperText(
  paper: ArxivPaper,
  http: HttpGet,
  extractText: ExtractPdfText
): Promise<DownloadResult> {
  return limit('arxiv', async () => {
    const res = await http(paper.pdfUrl);
    if (!res.ok) {
      return { paper, ok: false, reason: `fetch_failed_${res.status}` };
    }

    const contentType = res.headers.get('content-type') ?? '';
    if (!contentType.toLowerCase().includes('pdf')) {
      return { paper, ok: false, reason: 'not_pdf_response' };
    }

    const text = await extractText(Buffer.from(await res.arrayBuffer()));
    return { paper, ok: true, text };
  });
}

/**
 * Searches arXiv, downloads each hit's PDF and writes the papers as a corpus
 * file the batch summarizer reads. Papers whose PDF cannot be fetched or read
 * are left out; the file is only written when at least one paper made it.
 */
export async function fetchCorpus(
  query: string,
  maxResults: number,
  outFile: string,
  options: FetchCorpusOptions = {}
): Promise<FetchCorpusResult> {
  const http = options.http ?? httpGet;
  const extractText = options.extractText ?? extractPdfText;
  const logger = options.logger ?? createLogger('Fetch');

  logger.info(`Searching arXiv for "${query}"`, { maxResults });
  const papers = await new ArxivClient(http).search(query, maxResults);
  if (papers.length === 0) {
    throw new CorpusFetchError(query, `No papers found for "${query}"`);
  }

  const downloads = await Promise.all(
    papers.map(async (paper): Promise<DownloadResult> => {
      try {
        return await downloadPaperText(paper, http, extractText);
      } catch (error) {
        return { paper, ok: false, reason: errorMessage(error) };
      }
    })
  );

  const result: FetchCorpusResult = { outFile, written: [], skipped: [] };
  const blocks: string[] = [];
  for (const download of downloads) {
    const { title, pdfUrl } = download.paper;
    if (!download.ok) {
      logger.warn(`Skipping "${title}": ${download.reason}`, { pdfUrl });
      result.skipped.push({ title, pdfUrl, reason: download.reason });
      continue;
    }
    const index = result.written.length + 1;
    blocks.push(formatCorpusBlock(index, download.paper, download.text));
    result.written.push({ index, title, pdfUrl });
    logger.info(`Paper ${index}: '${title}' processed`);
  }

  if (blocks.length === 0) {
    throw new CorpusFetchError(query, `None of the ${papers.length} papers found for "${query}" could be downloaded`);
  }

  await fs.mkdir(path.dirname(outFile), { recursive: true });
  await writeFileAtomic(outFile, Buffer.from(blocks.join(''), 'utf8'));
  logger.info(`Corpus written to ${outFile}`, { papers: blocks.length, skipped: result.skipped.length });
  return result;
}
