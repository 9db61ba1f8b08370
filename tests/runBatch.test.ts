import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { PDFDocument } from 'pdf-lib';
import { summarizeReport } from '../src/pipeline/report';
import { planJobs, runBatch } from '../src/pipeline/runBatch';
import { RenderError } from '../src/pipeline/errors';
import { PdfDocumentWriter } from '../src/render/pdfWriter';
import type { DocumentWriter } from '../src/render/types';
import { silentLogger } from '../src/utils/logger';
import { err, ok } from '../src/utils/result';
import {
  buildCorpus,
  DELIMITER,
  exists,
  failWhen,
  FakeSummarizer,
  makeTempDir,
  recordingLogger,
  removeDir,
} from './utils/testHelpers';
import { readDrawnText } from './utils/pdfText';

async function pdfTitle(filePath: string): Promise<string | undefined> {
  const doc = await PDFDocument.load(await fs.readFile(filePath));
  return doc.getTitle();
}

describe('runBatch', () => {
  let root: string;
  let inputPath: string;
  let outputDir: string;
  const writer = new PdfDocumentWriter(silentLogger);

  beforeEach(async () => {
    root = await makeTempDir();
    inputPath = path.join(root, 'papers.txt');
    outputDir = path.join(root, 'summaries');
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('summarizes a titled and an untitled paper into two documents', async () => {
    const corpus = `\n${DELIMITER}\nTitle: Alpha\nFull Content:\nAlpha body.\n${DELIMITER}\nFull Content:\nNo title here.\n`;
    await fs.writeFile(inputPath, corpus, 'utf8');
    const summarizer = new FakeSummarizer(() => ok('* Key point\n\n* Another point'));

    const report = await runBatch(inputPath, { summarizer, writer, outputDir, logger: silentLogger });

    expect(summarizer.calls).toEqual([
      'Title: Alpha\nFull Content:\nAlpha body.',
      'Full Content:\nNo title here.',
    ]);
    expect(report.fatal).toBeUndefined();
    expect(report.outcomes).toEqual([
      { status: 'success', index: 1, title: 'Alpha', outputPath: path.join(outputDir, 'Alpha.pdf') },
      {
        status: 'success',
        index: 2,
        title: 'Untitled_Paper',
        outputPath: path.join(outputDir, 'Untitled_Paper.pdf'),
      },
    ]);
    expect(await pdfTitle(path.join(outputDir, 'Alpha.pdf'))).toBe('Summary of: Alpha');
    expect(await pdfTitle(path.join(outputDir, 'Untitled_Paper.pdf'))).toBe(
      'Summary of: Untitled_Paper'
    );
    expect(await readDrawnText(path.join(outputDir, 'Alpha.pdf'))).toEqual([
      'Summary of: Alpha',
      '* Key point',
      '* Another point',
    ]);
    expect(await readDrawnText(path.join(outputDir, 'Untitled_Paper.pdf'))).toEqual([
      'Summary of: Untitled_Paper',
      '* Key point',
      '* Another point',
    ]);
  });

  it('keeps going when one paper fails to summarize', async () => {
    await fs.writeFile(
      inputPath,
      buildCorpus(['Title: Alpha\nA', 'Title: Beta\nB', 'Title: Gamma\nC']),
      'utf8'
    );
    const logger = recordingLogger();

    const report = await runBatch(inputPath, {
      summarizer: failWhen((text) => text.includes('Beta')),
      writer,
      outputDir,
      logger,
    });

    expect(summarizeReport(report)).toEqual({ total: 3, succeeded: 2, failed: 1 });
    expect(report.outcomes[1]).toEqual({
      status: 'failed',
      index: 2,
      title: 'Beta',
      stage: 'summarize',
      reason: '503 Service Unavailable',
    });
    expect((await fs.readdir(outputDir)).sort()).toEqual(['Alpha.pdf', 'Gamma.pdf']);
    expect(await readDrawnText(path.join(outputDir, 'Gamma.pdf'))).toEqual([
      'Summary of: Gamma',
      'Point one',
      'Point two',
    ]);
    expect(logger.records.filter((r) => r.level === 'error').map((r) => r.message)).toEqual([
      'Summarization failed for "Beta": 503 Service Unavailable',
    ]);
  });

  it('records write failures and continues', async () => {
    await fs.writeFile(inputPath, buildCorpus(['Title: Alpha\nA', 'Title: Beta\nB']), 'utf8');
    const written: string[] = [];
    const flakyWriter: DocumentWriter = {
      extension: 'pdf',
      write: async (dir, title) => {
        if (title === 'Alpha') {
          return err(new RenderError(path.join(dir, 'Alpha.pdf'), new Error('EACCES: permission denied')));
        }
        written.push(title);
        return ok(path.join(dir, `${title}.pdf`));
      },
    };

    const report = await runBatch(inputPath, {
      summarizer: new FakeSummarizer(),
      writer: flakyWriter,
      outputDir,
      logger: silentLogger,
    });

    expect(report.outcomes.map((o) => o.status)).toEqual(['failed', 'success']);
    expect(report.outcomes[0]).toMatchObject({
      stage: 'write',
      reason: `Failed to write ${path.join(outputDir, 'Alpha.pdf')}: EACCES: permission denied`,
    });
    expect(written).toEqual(['Beta']);
  });

  it('turns a throwing summarizer or writer into failed outcomes', async () => {
    await fs.writeFile(inputPath, buildCorpus(['Title: Alpha\nA', 'Title: Beta\nB']), 'utf8');
    const summarizer = new FakeSummarizer((text) => {
      if (text.includes('Alpha')) {
        throw new Error('socket hang up');
      }
      return ok('fine');
    });
    const throwingWriter: DocumentWriter = {
      extension: 'pdf',
      write: async () => {
        throw new Error('disk full');
      },
    };

    const report = await runBatch(inputPath, {
      summarizer,
      writer: throwingWriter,
      outputDir,
      logger: silentLogger,
    });

    expect(report.outcomes).toEqual([
      { status: 'failed', index: 1, title: 'Alpha', stage: 'summarize', reason: 'socket hang up' },
      {
        status: 'failed',
        index: 2,
        title: 'Beta',
        stage: 'write',
        reason: `Failed to write ${path.join(outputDir, 'Beta.pdf')}: disk full`,
      },
    ]);
  });

  it('aborts the whole batch when the corpus is missing', async () => {
    const summarizer = new FakeSummarizer();
    const report = await runBatch(path.join(root, 'missing.txt'), {
      summarizer,
      writer,
      outputDir,
      logger: silentLogger,
    });

    expect(report.outcomes).toEqual([]);
    expect(report.fatal).toContain(`Cannot read corpus ${path.join(root, 'missing.txt')}`);
    expect(summarizer.calls).toEqual([]);
    expect(await exists(outputDir)).toBe(false);
  });

  it('treats a corpus that is not UTF-8 as fatal', async () => {
    await fs.writeFile(inputPath, Buffer.from([0x54, 0x69, 0xff, 0xfe, 0x0a]));

    const report = await runBatch(inputPath, {
      summarizer: new FakeSummarizer(),
      writer,
      outputDir,
      logger: silentLogger,
    });

    expect(report.outcomes).toEqual([]);
    expect(report.fatal).toContain('Corpus is not valid UTF-8');
    expect(await exists(outputDir)).toBe(false);
  });

  it('returns an empty report for a corpus without papers', async () => {
    await fs.writeFile(inputPath, 'Title: No delimiters at all\n', 'utf8');
    const logger = recordingLogger();

    const report = await runBatch(inputPath, {
      summarizer: new FakeSummarizer(),
      writer,
      outputDir,
      logger,
      batchId: 'batch-1',
    });

    expect(report).toMatchObject({ batchId: 'batch-1', inputPath, outputDir, outcomes: [] });
    expect(report.fatal).toBeUndefined();
    expect(logger.records).toEqual([
      { level: 'warn', message: `No papers found in ${inputPath}`, context: { batchId: 'batch-1' } },
    ]);
  });

  it('keeps corpus order and bounds papers in flight', async () => {
    await fs.writeFile(
      inputPath,
      buildCorpus(['Title: P1\na', 'Title: P2\nb', 'Title: P3\nc', 'Title: P4\nd', 'Title: P5\ne']),
      'utf8'
    );
    let inFlight = 0;
    let maxInFlight = 0;
    const summarizer = new FakeSummarizer(async (text) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      // Earlier papers finish later.
      const delay = text.includes('P1') ? 30 : 5;
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight--;
      return ok('summary');
    });
    const recorded: string[] = [];
    const recordingWriter: DocumentWriter = {
      extension: 'pdf',
      write: async (dir, title) => {
        recorded.push(title);
        return ok(path.join(dir, `${title}.pdf`));
      },
    };

    const report = await runBatch(inputPath, {
      summarizer,
      writer: recordingWriter,
      outputDir,
      logger: silentLogger,
      concurrency: 2,
    });

    expect(maxInFlight).toBe(2);
    expect(report.outcomes.map((o) => o.title)).toEqual(['P1', 'P2', 'P3', 'P4', 'P5']);
    expect(recorded[recorded.length - 1]).not.toBe('P5');
  });

  it('stops scheduling papers once the batch is aborted', async () => {
    await fs.writeFile(
      inputPath,
      buildCorpus(['Title: Alpha\nA', 'Title: Beta\nB', 'Title: Gamma\nC']),
      'utf8'
    );
    const controller = new AbortController();
    const summarizer = new FakeSummarizer(() => {
      controller.abort();
      return ok('late summary');
    });

    const report = await runBatch(inputPath, {
      summarizer,
      writer,
      outputDir,
      logger: silentLogger,
      signal: controller.signal,
    });

    expect(summarizer.calls).toHaveLength(1);
    expect(report.outcomes).toEqual([
      {
        status: 'failed',
        index: 1,
        title: 'Alpha',
        stage: 'aborted',
        reason: 'Batch aborted before the document was written',
      },
      {
        status: 'failed',
        index: 2,
        title: 'Beta',
        stage: 'aborted',
        reason: 'Batch aborted before the paper was started',
      },
      {
        status: 'failed',
        index: 3,
        title: 'Gamma',
        stage: 'aborted',
        reason: 'Batch aborted before the paper was started',
      },
    ]);
    expect(await exists(outputDir)).toBe(false);
  });

  it('lets the last paper win a shared file name by default', async () => {
    await fs.writeFile(inputPath, buildCorpus(['Title: Same\nfirst', 'Title: Same\nsecond']), 'utf8');

    const report = await runBatch(inputPath, {
      summarizer: new FakeSummarizer(),
      writer,
      outputDir,
      logger: silentLogger,
    });

    expect(report.outcomes.map((o) => o.status === 'success' && o.outputPath)).toEqual([
      path.join(outputDir, 'Same.pdf'),
      path.join(outputDir, 'Same.pdf'),
    ]);
    expect(await fs.readdir(outputDir)).toEqual(['Same.pdf']);
  });

  it('suffixes duplicate file names when asked to', async () => {
    await fs.writeFile(
      inputPath,
      buildCorpus(['Title: Same\nfirst', 'Title: Same\nsecond', 'Title: Same?\nthird']),
      'utf8'
    );

    const report = await runBatch(inputPath, {
      summarizer: new FakeSummarizer(),
      writer,
      outputDir,
      logger: silentLogger,
      onDuplicateTitle: 'suffix',
    });

    expect(report.outcomes.map((o) => o.title)).toEqual(['Same', 'Same', 'Same?']);
    expect((await fs.readdir(outputDir)).sort()).toEqual([
      'Same (2).pdf',
      'Same .pdf',
      'Same.pdf',
    ]);
  });
});

describe('planJobs', () => {
  const records = [
    { index: 1, text: 'Title: A:B' },
    { index: 2, text: 'Title: A/B' },
    { index: 3, text: 'no title' },
  ];

  it('compares duplicates by sanitized name', () => {
    expect(planJobs(records, 'suffix').map((j) => j.fileTitle)).toEqual([
      'A:B',
      'A/B (2)',
      'Untitled_Paper',
    ]);
  });

  it('never hands out a name that an earlier paper already took', () => {
    const clashing = ['Title: Same', 'Title: Same', 'Title: Same (2)', 'Title: Same'].map(
      (text, i) => ({ index: i + 1, text })
    );
    const names = planJobs(clashing, 'suffix').map((j) => j.fileTitle);

    expect(names).toEqual(['Same', 'Same (2)', 'Same (2) (2)', 'Same (3)']);
    expect(new Set(names).size).toBe(names.length);
  });

  it('leaves titles alone under overwrite', () => {
    expect(planJobs(records, 'overwrite').map((j) => j.fileTitle)).toEqual([
      'A:B',
      'A/B',
      'Untitled_Paper',
    ]);
  });
});
