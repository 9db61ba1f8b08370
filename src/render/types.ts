import type { RenderError } from '../pipeline/errors';
import type { Result } from '../utils/result';

export interface WriteOptions {
  /** Name the file after this instead of the title, e.g. a disambiguated title. */
  fileTitle?: string;
}

export interface DocumentWriter {
  readonly extension: string;
  write(
    outputDir: string,
    title: string,
    summary: string,
    options?: WriteOptions
  ): Promise<Result<string, RenderError>>;
}
