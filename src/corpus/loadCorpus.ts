import * as fs from 'fs/promises';
import { FatalInputError } from '../pipeline/errors';
import { isErrnoException, toError } from '../utils/errors';
import { err, ok, type Result } from '../utils/result';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export async function loadCorpus(
  inputPath: string
): Promise<Result<string, FatalInputError>> {
  try {
    const buffer = await fs.readFile(inputPath);
    return ok(utf8.decode(buffer));
  } catch (error) {
    const cause =
      isErrnoException(error) && error.code === 'ERR_ENCODING_INVALID_ENCODED_DATA'
        ? new Error(`Corpus is not valid UTF-8 (${error.message})`)
        : toError(error);
    return err(new FatalInputError(inputPath, cause));
  }
}
