import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { limit } from '../../utils/limiter';
import { httpGet, type HttpGet } from '../http';

export type ArxivPaper = {
  arxivId: string;
  title: string;
  abstract: string;
  pdfUrl: string;
  published?: string;
};

export const ARXIV_API_URL = 'https://export.arxiv.org/api/query';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  trimValues: true,
  parseTagValue: false,
});

const LinkSchema = z.object({
  href: z.string(),
  title: z.string().optional(),
});

const EntrySchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  summary: z.string().default(''),
  published: z.string().optional(),
  link: z.union([LinkSchema, z.array(LinkSchema)]).optional(),
});

type Entry = z.infer<typeof EntrySchema>;

const FeedSchema = z.object({
  feed: z.object({
    entry: z.union([EntrySchema, z.array(EntrySchema)]).optional(),
  }),
});

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function toArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function pdfUrlFor(entry: Entry): string {
  const pdfLink = toArray(entry.link).find((link) => link.title === 'pdf');
  return pdfLink?.href ?? entry.id.replace('/abs/', '/pdf/');
}

/**
 * Turns an arXiv Atom feed into papers. The API reports a bad query as a
 * single entry whose id points at its errors page.
 */
export function parseArxivFeed(xml: string): ArxivPaper[] {
  const parsed = FeedSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new Error(`Unexpected arXiv response: ${parsed.error.issues[0]?.message ?? 'invalid feed'}`);
  }

  const entries = toArray(parsed.data.feed.entry);
  const apiError = entries.find((entry) => entry.id.includes('/api/errors'));
  if (apiError) {
    throw new Error(`arXiv rejected the query: ${collapseWhitespace(apiError.summary)}`);
  }

  return entries
    .map((entry) => ({
      arxivId: entry.id.split('/abs/')[1] ?? entry.id,
      title: collapseWhitespace(entry.title),
      abstract: collapseWhitespace(entry.summary),
      pdfUrl: pdfUrlFor(entry),
      published: entry.published,
    }))
    .filter((paper) => paper.title);
}

export class ArxivClient {
  constructor(
    private readonly http: HttpGet = httpGet,
    private readonly baseUrl: string = ARXIV_API_URL
  ) {}

  /** Newest submissions first. */
  async search(query: string, maxResults: number): Promise<ArxivPaper[]> {
    return limit('arxiv', async () => {
      const url =
        `${this.baseUrl}?` +
        new URLSearchParams({
          search_query: query,
          start: '0',
          max_results: String(maxResults),
          sortBy: 'submittedDate',
          sortOrder: 'descending',
        }).toString();

      const res = await this.http(url);
      if (!res.ok) {
        throw new Error(`arXiv search failed: ${res.status} ${await res.text()}`);
      }
      return parseArxivFeed(await res.text());
    });
  }
}
