import nodeFs from 'node:fs/promises';
import path from 'node:path';
import ignore from 'ignore';
import type { RepoSnapshot, RepoFileMeta, ScanOptions } from './types';
import { isBinaryFile, DEFAULT_IGNORES, IGNORE_FILES, readOptional } from './utils';

export * from './types';
export { DEFAULT_IGNORES, IGNORE_FILES, isBinaryFile } from './utils';

type Fs = typeof nodeFs;

function byPath(a: RepoFileMeta, b: RepoFileMeta): number {
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

export class RepoScanner {
  constructor(private readonly fs: Fs = nodeFs) {}

  async scan(repoRoot: string, options: ScanOptions = {}): Promise<RepoSnapshot> {
    const ig = ignore().add(DEFAULT_IGNORES);
    for (const name of IGNORE_FILES) {
      const content = await readOptional(path.join(repoRoot, name), this.fs);
      if (content !== undefined) ig.add(content);
    }
    if (options.exclude && options.exclude.length > 0) {
      ig.add(options.exclude);
    }

    const includes = options.include && options.include.length > 0 ? ignore().add(options.include) : undefined;

    const files: RepoFileMeta[] = [];
    const warnings: string[] = [];
    let stoppedEarly = false;

    const walk = async (dir: string, relativeDir: string): Promise<void> => {
      const entries = await this.fs.readdir(dir, { withFileTypes: true });

      for (const entry of entries) {
        if (stoppedEarly) return;
        const relativePath = relativeDir ? path.posix.join(relativeDir, entry.name) : entry.name;
        const absPath = path.join(dir, entry.name);

        if (entry.isDirectory()) {
          // Directory patterns only match with a trailing slash
          if (ig.ignores(relativePath + '/')) continue;
          await walk(absPath, relativePath);
          continue;
        }
        if (!entry.isFile()) continue;
        if (ig.ignores(relativePath)) continue;
        if (includes && !includes.ignores(relativePath)) continue;

        if (options.maxFiles !== undefined && files.length >= options.maxFiles) {
          warnings.push(`Stopped scanning early, hit max files limit of ${options.maxFiles}.`);
          stoppedEarly = true;
          return;
        }

        const stats = await this.fs.stat(absPath);
        if (options.maxFileBytes !== undefined && stats.size > options.maxFileBytes) {
          warnings.push(`Skipping large file: ${relativePath} (${stats.size} bytes)`);
          continue;
        }

        files.push({
          path: relativePath,
          absPath,
          sizeBytes: stats.size,
          ext: path.extname(entry.name),
          isText: !(await isBinaryFile(absPath, this.fs)),
        });
      }
    };

    await walk(repoRoot, '');
    files.sort(byPath);

    return { repoRoot, files, warnings };
  }
}

/**
 * Lists the text files under `root` that the loop may audit and fix, as
 * sorted root-relative paths. Binary files are dropped with a warning.
 */
export async function discoverResources(
  root: string,
  options: ScanOptions = {},
  scanner: RepoScanner = new RepoScanner(),
): Promise<{ resources: string[]; warnings: string[] }> {
  const snapshot = await scanner.scan(root, options);
  const warnings = [...snapshot.warnings];
  const resources: string[] = [];
  for (const file of snapshot.files) {
    if (file.isText) {
      resources.push(file.path);
    } else {
      warnings.push(`Skipping binary file: ${file.path}`);
    }
  }
  return { resources, warnings };
}
