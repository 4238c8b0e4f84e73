import { afterEach, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { atomicWrite } from './io';
import { createRunDir, getRunArtifactPaths } from './artifacts';

describe('atomicWrite', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) await fs.rm(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it('creates parent directories and replaces existing content', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-io-test-'));
    const target = path.join(tmpDir, 'nested', 'dir', 'file.py');

    await atomicWrite(target, 'x = 1\n');
    await atomicWrite(target, 'x = 2\n');

    expect(await fs.readFile(target, 'utf8')).toBe('x = 2\n');
    expect(await fs.readdir(path.dirname(target))).toEqual(['file.py']);
  });

  it.skipIf(process.platform === 'win32')('keeps the mode of the file it replaces', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-io-test-'));
    const target = path.join(tmpDir, 'run.sh');
    await fs.writeFile(target, 'echo 1\n');
    await fs.chmod(target, 0o755);

    await atomicWrite(target, 'echo 2\n');

    expect((await fs.stat(target)).mode & 0o777).toBe(0o755);
    expect(await fs.readFile(target, 'utf8')).toBe('echo 2\n');
  });
});

describe('run artifacts', () => {
  it('lays out trace and summary under .mender/runs/<runId>', () => {
    expect(getRunArtifactPaths('/work/project', 'run-1')).toEqual({
      root: '/work/project/.mender/runs/run-1',
      trace: '/work/project/.mender/runs/run-1/trace.jsonl',
      summary: '/work/project/.mender/runs/run-1/summary.json',
    });
  });

  it('creates the run directory', async () => {
    const base = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-run-dir-'));
    const paths = await createRunDir(base, 'run-2');
    const stat = await fs.stat(paths.root);
    expect(stat.isDirectory()).toBe(true);
    await fs.rm(base, { recursive: true, force: true });
  });
});
