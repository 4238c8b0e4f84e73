import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ConfigError, NoopLogger, ProviderError } from '@mender/shared';
import { FakeAdapter } from '@mender/adapters';
import { LlmAuditor } from './auditor';
import { REFORMAT_PROMPT } from './prompts';
import type { WorkerContext } from './types';

const mocks = vi.hoisted(() => ({ execa: vi.fn() }));

vi.mock('execa', () => ({ execa: mocks.execa }));

describe('LlmAuditor', () => {
  let root: string;
  let logger: NoopLogger;
  let ctx: WorkerContext;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-auditor-test-'));
    await fs.writeFile(path.join(root, 'a.py'), 'def f(x):\n    return x / 0\n');
    await fs.writeFile(path.join(root, 'b.py'), 'print("ok")\n');
    logger = new NoopLogger();
    ctx = { runId: 'run-1', iteration: 1, logger, abortSignal: new AbortController().signal };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('builds a plan from structured answers and leaves clean files out', async () => {
    const provider = new FakeAdapter([
      '{"issues": [{"line": 2, "type": "BUG", "severity": "HIGH", "description": "Division by zero"}]}',
      '{"issues": []}',
    ]);

    const plan = await new LlmAuditor(provider, root).audit(['a.py', 'b.py'], ctx);

    expect([...plan.keys()]).toEqual(['a.py']);
    expect(plan.get('a.py')).toEqual([
      {
        location: { resource: 'a.py', line: 2 },
        category: 'BUG',
        severity: 'HIGH',
        description: 'Division by zero',
      },
    ]);
    expect(provider.requests[0].messages[1].content).toContain('<untrusted_file>\ndef f(x):');
    expect(provider.requests[0].jsonMode).toBe(true);
  });

  it('asks once for a reformat and reports the remediation', async () => {
    const logSpy = vi.spyOn(logger, 'log');
    const provider = new FakeAdapter([
      '{"issues": [{"description": "cut off',
      '{"issues": [{"description": "Unused variable"}]}',
    ]);

    const plan = await new LlmAuditor(provider, root).audit(['a.py'], ctx);

    expect(plan.get('a.py')?.map((i) => i.description)).toEqual(['Unused variable']);
    expect(provider.requests).toHaveLength(2);
    expect(provider.requests[1].messages[0].content).toBe(REFORMAT_PROMPT);
    expect(logSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'AuditParsed',
        payload: {
          resource: 'a.py',
          kind: 'structured',
          status: 'OK',
          issueCount: 1,
          remediated: true,
        },
      }),
    );
  });

  it('reports a prose answer as PARTIAL', async () => {
    const logSpy = vi.spyOn(logger, 'log');
    const provider = new FakeAdapter(['Issues:\n- missing docstring']);

    const plan = await new LlmAuditor(provider, root).audit(['b.py'], ctx);

    expect(plan.get('b.py')?.[0]).toMatchObject({ category: 'UNKNOWN', description: 'missing docstring' });
    expect(logSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'AuditParsed',
        payload: expect.objectContaining({ kind: 'fallback', status: 'PARTIAL' }),
      }),
    );
  });

  it('skips a resource whose audit fails', async () => {
    const provider = new FakeAdapter((_req, index) =>
      index === 0 ? new Error('provider down') : '{"issues": [{"description": "b issue"}]}',
    );

    const plan = await new LlmAuditor(provider, root).audit(['a.py', 'b.py'], ctx);

    expect([...plan.keys()]).toEqual(['b.py']);
  });

  it('fails when no resource could be audited', async () => {
    const provider = new FakeAdapter(['{"issues": []}']);

    await expect(new LlmAuditor(provider, root).audit(['missing.py'], ctx)).rejects.toThrow(
      ProviderError,
    );
  });

  it('propagates configuration errors', async () => {
    const provider = new FakeAdapter(() => new ConfigError('Missing API key'));

    await expect(new LlmAuditor(provider, root).audit(['a.py', 'b.py'], ctx)).rejects.toThrow(
      ConfigError,
    );
    expect(provider.requests).toHaveLength(1);
  });

  it('returns the empty plan for no resources', async () => {
    const plan = await new LlmAuditor(new FakeAdapter(), root).audit([], ctx);
    expect(plan.size).toBe(0);
  });

  it('puts linter output into the audit prompt', async () => {
    mocks.execa.mockResolvedValue({
      exitCode: 1,
      all: '\u001b[1ma.py:2:12\u001b[0m: E999 division by zero',
      timedOut: false,
      isCanceled: false,
    });
    const provider = new FakeAdapter(['{"issues": []}']);
    const lint = { command: 'ruff', args: ['check'], timeoutMs: 1000, maxOutputLines: 20, root };

    await new LlmAuditor(provider, root, {}, lint).audit(['a.py'], ctx);

    expect(mocks.execa).toHaveBeenCalledWith(
      'ruff',
      ['check', 'a.py'],
      expect.objectContaining({ cwd: root, reject: false, timeout: 1000 }),
    );
    expect(provider.requests[0].messages[1].content).toContain(
      'Static analysis output:\n<untrusted_lint>\na.py:2:12: E999 division by zero\n</untrusted_lint>',
    );
  });

  it('audits without linter output when the linter cannot start', async () => {
    mocks.execa.mockResolvedValue({ exitCode: undefined, all: '', timedOut: false, isCanceled: false });
    const provider = new FakeAdapter(['{"issues": []}']);
    const lint = { command: 'missing-linter', args: [], timeoutMs: 1000, maxOutputLines: 20, root };

    const plan = await new LlmAuditor(provider, root, {}, lint).audit(['a.py'], ctx);

    expect(plan.size).toBe(0);
    expect(provider.requests[0].messages[1].content).not.toContain('Static analysis output');
  });
});
