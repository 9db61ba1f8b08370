import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { writeFileAtomic } from './atomicWrite';
import { isErrnoException } from './errors';

const SummaryCacheEntrySchema = z.object({
  meta: z.object({
    createdAt: z.string(),
    model: z.string(),
    promptVersion: z.string(),
    inputHash: z.string(),
  }),
  summary: z.string(),
});

export type SummaryCacheEntry = z.infer<typeof SummaryCacheEntrySchema>;

export interface SummaryCacheKeyParts {
  model: string;
  promptVersion: string;
  text: string;
}

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function buildSummaryCacheKey(parts: SummaryCacheKeyParts): {
  key: string;
  inputHash: string;
} {
  const inputHash = sha256(parts.text);
  return {
    key: sha256([parts.model, parts.promptVersion, inputHash].join('|')),
    inputHash,
  };
}

function entryPath(cacheDir: string, key: string): string {
  return path.join(cacheDir, `${key}.json`);
}

/** Missing and malformed entries both read as a miss. */
export async function readSummaryCache(
  cacheDir: string,
  key: string
): Promise<SummaryCacheEntry | null> {
  let data: string;
  try {
    data = await fs.readFile(entryPath(cacheDir, key), 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  try {
    const parsed = SummaryCacheEntrySchema.safeParse(JSON.parse(data));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export async function writeSummaryCache(
  cacheDir: string,
  key: string,
  entry: SummaryCacheEntry
): Promise<void> {
  await fs.mkdir(cacheDir, { recursive: true });
  await writeFileAtomic(entryPath(cacheDir, key), Buffer.from(JSON.stringify(entry), 'utf8'));
}
