import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';

/**
 * Writes bytes through a temporary sibling file so a reader never sees a
 * partially written file; the handle is closed on every path.
 */
export async function writeFileAtomic(filePath: string, bytes: Uint8Array): Promise<void> {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    const handle = await fs.open(tmpPath, 'w');
    try {
      await handle.writeFile(bytes);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}
