import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';
import { isRecord } from '../json-utils';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/** Permission bits of `path`, or undefined when it does not exist yet. */
async function existingMode(path: string): Promise<number | undefined> {
  try {
    return (await fs.stat(path)).mode & 0o7777;
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') return undefined;
    throw error;
  }
}

/**
 * Writes through a temp file in the same directory and renames it over
 * `path`, so readers never observe partial content. An existing file keeps
 * its permission bits.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const mode = await existingMode(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.mender-' });
  try {
    await fs.writeFile(tempPath, content);
    if (mode !== undefined) await fs.chmod(tempPath, mode);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
