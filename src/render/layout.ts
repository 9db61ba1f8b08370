import type { PDFFont } from 'pdf-lib';

export type BlockStyle = 'heading' | 'body';

export interface DocumentBlock {
  style: BlockStyle;
  text: string;
}

export function buildDocumentBlocks(title: string, summary: string): DocumentBlock[] {
  const body = summary
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((text): DocumentBlock => ({ style: 'body', text }));

  return [{ style: 'heading', text: `Summary of: ${title}` }, ...body];
}

/**
 * Standard PDF fonts only carry WinAnsi glyphs; anything else is drawn as `?`.
 */
export function toEncodable(text: string, font: PDFFont): string {
  const supported = new Set(font.getCharacterSet());
  let out = '';
  for (const char of text.replace(/\t/g, ' ')) {
    const codePoint = char.codePointAt(0);
    out += codePoint !== undefined && supported.has(codePoint) ? char : '?';
  }
  return out;
}

export type MeasureText = (text: string) => number;

/** Greedy word wrap; words wider than the line are split by character. */
export function wrapText(text: string, maxWidth: number, measure: MeasureText): string[] {
  const lines: string[] = [];
  let line = '';

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    const candidate = line ? `${line} ${word}` : word;
    if (measure(candidate) <= maxWidth) {
      line = candidate;
      continue;
    }

    if (line) {
      lines.push(line);
      line = '';
    }

    let rest = word;
    while (measure(rest) > maxWidth && rest.length > 1) {
      let cut = rest.length - 1;
      while (cut > 1 && measure(rest.slice(0, cut)) > maxWidth) {
        cut--;
      }
      lines.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    line = rest;
  }

  if (line) {
    lines.push(line);
  }
  return lines;
}
