import * as fs from 'fs/promises';
import * as path from 'path';
import { PDFDocument, PDFFont, PDFPage, StandardFonts, rgb } from 'pdf-lib';
import { RenderError } from '../pipeline/errors';
import { writeFileAtomic } from '../utils/atomicWrite';
import { toError } from '../utils/errors';
import { limit } from '../utils/limiter';
import { createLogger, type Logger } from '../utils/logger';
import { err, ok, type Result } from '../utils/result';
import { sanitizeFileName } from '../utils/sanitize';
import { buildDocumentBlocks, toEncodable, wrapText, type DocumentBlock } from './layout';
import type { DocumentWriter, WriteOptions } from './types';

const PAGE_SIZE: [number, number] = [612, 792];
const MARGIN = 72;

const STYLES = {
  heading: { size: 18, lineHeight: 24, spaceAfter: 18 },
  body: { size: 11, lineHeight: 15, spaceAfter: 6 },
} as const;

const defaultLogger = createLogger('PdfWriter');

export function outputPathFor(outputDir: string, title: string, extension = 'pdf'): string {
  return path.join(outputDir, `${sanitizeFileName(title)}.${extension}`);
}

export async function renderSummaryPdf(title: string, summary: string): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.setTitle(`Summary of: ${title}`);
  doc.setProducer('paper-digest');

  const fonts: Record<DocumentBlock['style'], PDFFont> = {
    heading: await doc.embedFont(StandardFonts.HelveticaBold),
    body: await doc.embedFont(StandardFonts.Helvetica),
  };

  const [pageWidth, pageHeight] = PAGE_SIZE;
  const maxWidth = pageWidth - MARGIN * 2;
  let page: PDFPage = doc.addPage(PAGE_SIZE);
  let y = pageHeight - MARGIN;

  for (const block of buildDocumentBlocks(title, summary)) {
    const font = fonts[block.style];
    const style = STYLES[block.style];
    const text = toEncodable(block.text, font);
    const lines = wrapText(text, maxWidth, (t) => font.widthOfTextAtSize(t, style.size));

    for (const line of lines) {
      if (y - style.lineHeight < MARGIN) {
        page = doc.addPage(PAGE_SIZE);
        y = pageHeight - MARGIN;
      }
      y -= style.lineHeight;
      page.drawText(line, { x: MARGIN, y, size: style.size, font, color: rgb(0, 0, 0) });
    }
    y -= style.spaceAfter;
  }

  return doc.save();
}

export class PdfDocumentWriter implements DocumentWriter {
  readonly extension = 'pdf';

  constructor(private readonly logger: Logger = defaultLogger) {}

  async write(
    outputDir: string,
    title: string,
    summary: string,
    options: WriteOptions = {}
  ): Promise<Result<string, RenderError>> {
    const outputPath = outputPathFor(outputDir, options.fileTitle ?? title, this.extension);
    try {
      await fs.mkdir(outputDir, { recursive: true });
      const bytes = await limit('render', () => renderSummaryPdf(title, summary));
      await writeFileAtomic(outputPath, bytes);
      this.logger.info(`Saved ${outputPath}`, { bytes: bytes.length });
      return ok(outputPath);
    } catch (error) {
      const failure = new RenderError(outputPath, toError(error));
      this.logger.error(failure.message, { outputPath });
      return err(failure);
    }
  }
}
