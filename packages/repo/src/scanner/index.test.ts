import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { RepoScanner, discoverResources } from './index';

describe('RepoScanner', () => {
  let tmpDir: string;
  let scanner: RepoScanner;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-scanner-test-'));
    scanner = new RepoScanner();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string | Buffer>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  it('scans a simple tree in sorted order', async () => {
    await createFiles({
      'src/main.py': 'print("hi")',
      'app.py': 'x = 1',
      'notes.txt': 'todo',
    });

    const snapshot = await scanner.scan(tmpDir);
    expect(snapshot.repoRoot).toBe(tmpDir);
    expect(snapshot.files.map((f) => f.path)).toEqual(['app.py', 'notes.txt', 'src/main.py']);
    expect(snapshot.files[0]).toMatchObject({ ext: '.py', sizeBytes: 5, isText: true });
    expect(snapshot.warnings).toEqual([]);
  });

  it('always skips version control and run directories', async () => {
    await createFiles({
      '.git/config': 'ignored',
      'node_modules/foo/index.js': 'ignored',
      '.mender/runs/r1/trace.jsonl': 'ignored',
      'src/index.ts': 'kept',
    });

    const snapshot = await scanner.scan(tmpDir);
    expect(snapshot.files.map((f) => f.path)).toEqual(['src/index.ts']);
  });

  it('respects .gitignore and .menderignore', async () => {
    await createFiles({
      '.gitignore': '*.log\nsecret/',
      '.menderignore': 'legacy.py',
      'app.log': 'ignored',
      'secret/data.py': 'ignored',
      'legacy.py': 'ignored',
      'main.py': 'kept',
    });

    const snapshot = await scanner.scan(tmpDir);
    expect(snapshot.files.map((f) => f.path)).toEqual(['.gitignore', '.menderignore', 'main.py']);
  });

  it('applies include and exclude patterns', async () => {
    await createFiles({
      'a.py': 'a',
      'b.ts': 'b',
      'README.md': 'readme',
      'build/out.py': 'ignored',
      'pkg/c.py': 'c',
    });

    const snapshot = await scanner.scan(tmpDir, {
      include: ['*.py', '*.ts'],
      exclude: ['build/'],
    });
    expect(snapshot.files.map((f) => f.path)).toEqual(['a.py', 'b.ts', 'pkg/c.py']);
  });

  it('detects binary files by extension and content', async () => {
    await createFiles({
      'data.bin': Buffer.from([0x61, 0x00, 0x62]),
      'script.sh': '#!/bin/bash\necho hi',
      'image.png': 'fake png content',
    });

    const snapshot = await scanner.scan(tmpDir);
    const isText = Object.fromEntries(snapshot.files.map((f) => [f.path, f.isText]));
    expect(isText).toEqual({ 'data.bin': false, 'image.png': false, 'script.sh': true });
  });

  describe('guardrails', () => {
    it('enforces maxFiles', async () => {
      await createFiles({ 'a.py': 'a', 'b.py': 'b', 'c.py': 'c' });

      const snapshot = await scanner.scan(tmpDir, { maxFiles: 2 });
      expect(snapshot.files).toHaveLength(2);
      expect(snapshot.warnings).toEqual(['Stopped scanning early, hit max files limit of 2.']);
    });

    it('enforces maxFileBytes', async () => {
      await createFiles({ 'small.py': 'small', 'large.py': 'a'.repeat(200) });

      const snapshot = await scanner.scan(tmpDir, { maxFileBytes: 100 });
      expect(snapshot.files.map((f) => f.path)).toEqual(['small.py']);
      expect(snapshot.warnings).toEqual(['Skipping large file: large.py (200 bytes)']);
    });
  });
});

describe('discoverResources', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-discover-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns sorted text resources and reports binaries', async () => {
    await fs.mkdir(path.join(tmpDir, 'lib'));
    await fs.writeFile(path.join(tmpDir, 'lib', 'util.py'), 'def f(): pass\n');
    await fs.writeFile(path.join(tmpDir, 'app.py'), 'import lib\n');
    await fs.writeFile(path.join(tmpDir, 'blob.py'), Buffer.from([0x00, 0x01]));

    const result = await discoverResources(tmpDir, { include: ['*.py'] });

    expect(result.resources).toEqual(['app.py', 'lib/util.py']);
    expect(result.warnings).toEqual(['Skipping binary file: blob.py']);
  });

  it('returns nothing for an empty directory', async () => {
    await expect(discoverResources(tmpDir)).resolves.toEqual({ resources: [], warnings: [] });
  });
});
