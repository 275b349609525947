import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

/**
 * Ensures the parent directory of `path` exists.
 */
export async function ensureParentDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes via a sibling temp file and rename, so readers never see a partial file.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureParentDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.northstar-' });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
