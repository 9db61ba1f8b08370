import { z } from 'zod';

const EnvSchema = z.object({
  GOOGLE_API_KEY: z.string().optional(),
  SUMMARY_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  SUMMARY_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  SUMMARY_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  SUMMARY_CONCURRENCY: z.coerce.number().int().positive().default(1),
  RENDER_CONCURRENCY: z.coerce.number().int().positive().default(4),
  ARXIV_CONCURRENCY: z.coerce.number().int().positive().default(3),
  ARXIV_MAX_RESULTS: z.coerce.number().int().positive().default(3),
  CORPUS_FILE: z.string().min(1).default('paper_content.txt'),
  OUTPUT_DIR: z.string().min(1).default('summaries'),
  SUMMARY_CACHE: z.enum(['0', '1']).default('0'),
  SUMMARY_CACHE_DIR: z.string().min(1).default('.cache/summaries'),
  ON_DUPLICATE_TITLE: z.enum(['overwrite', 'suffix']).default('overwrite'),
});

export type DuplicateTitlePolicy = z.output<typeof EnvSchema>['ON_DUPLICATE_TITLE'];

export interface Settings {
  googleApiKey?: string;
  summaryModel: string;
  summaryTimeoutMs: number;
  summaryMaxTokens: number;
  concurrency: number;
  renderConcurrency: number;
  arxivConcurrency: number;
  arxivMaxResults: number;
  corpusFile: string;
  outputDir: string;
  cacheEnabled: boolean;
  cacheDir: string;
  onDuplicateTitle: DuplicateTitlePolicy;
}

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      `Invalid configuration:\n${issues
        .map((issue) => `- ${issue.path.join('.')}: ${issue.message}`)
        .join('\n')}`
    );
    this.name = 'ConfigError';
  }
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  // `KEY=` in a .env file means "unset", not an empty value.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  const vars = parsed.data;
  return {
    googleApiKey: vars.GOOGLE_API_KEY,
    summaryModel: vars.SUMMARY_MODEL,
    summaryTimeoutMs: vars.SUMMARY_TIMEOUT_MS,
    summaryMaxTokens: vars.SUMMARY_MAX_TOKENS,
    concurrency: vars.SUMMARY_CONCURRENCY,
    renderConcurrency: vars.RENDER_CONCURRENCY,
    arxivConcurrency: vars.ARXIV_CONCURRENCY,
    arxivMaxResults: vars.ARXIV_MAX_RESULTS,
    corpusFile: vars.CORPUS_FILE,
    outputDir: vars.OUTPUT_DIR,
    cacheEnabled: vars.SUMMARY_CACHE === '1',
    cacheDir: vars.SUMMARY_CACHE_DIR,
    onDuplicateTitle: vars.ON_DUPLICATE_TITLE,
  };
}
