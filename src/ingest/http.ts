import fetch from 'node-fetch';

export const HTTP_TIMEOUT_MS = 10_000;

/** The slice of a fetch response the ingest code reads. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type HttpGet = (url: string) => Promise<HttpResponse>;

export const httpGet: HttpGet = (url) => fetch(url, { timeout: HTTP_TIMEOUT_MS });
