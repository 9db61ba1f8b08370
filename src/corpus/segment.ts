import type { PaperRecord } from './types';

export const DEFAULT_DELIMITER_LENGTH = 50;

export function isDelimiterLine(line: string, delimiterLength: number): boolean {
  const trimmed = line.trimEnd();
  return trimmed.length === delimiterLength && /^=+$/.test(trimmed);
}

/**
 * Splits a corpus on lines made only of `=` characters.
 *
 * Text before the first delimiter is discarded, every later block is trimmed,
 * and blocks left empty are dropped. A corpus without any delimiter line
 * yields no records.
 */
export function segmentCorpus(
  corpus: string,
  delimiterLength: number = DEFAULT_DELIMITER_LENGTH
): PaperRecord[] {
  let current: string[] = [];
  const blocks: string[][] = [current];

  for (const line of corpus.replace(/\r\n?/g, '\n').split('\n')) {
    if (isDelimiterLine(line, delimiterLength)) {
      current = [];
      blocks.push(current);
      continue;
    }
    current.push(line);
  }

  return blocks
    .slice(1)
    .map((lines) => lines.join('\n').trim())
    .filter((text) => text.length > 0)
    .map((text, i) => ({ index: i + 1, text }));
}
