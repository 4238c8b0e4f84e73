import nodeFs from 'node:fs/promises';
import isBinaryPath from 'is-binary-path';

export const DEFAULT_IGNORES = ['.git/', 'node_modules/', '.mender/'];

export const IGNORE_FILES = ['.gitignore', '.menderignore'];

type Fs = typeof nodeFs;

export async function isBinaryFile(filePath: string, fs: Fs = nodeFs): Promise<boolean> {
  if (isBinaryPath(filePath)) {
    return true;
  }

  // Sample the head for NUL bytes
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(1024);
    const { bytesRead } = await handle.read(buffer, 0, 1024, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}

/** Reads a UTF-8 file, or returns undefined when it does not exist. */
export async function readOptional(filePath: string, fs: Fs = nodeFs): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
