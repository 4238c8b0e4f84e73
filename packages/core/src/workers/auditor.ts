import { readFile } from 'node:fs/promises';
import { ConfigError, ProviderError, errorMessage, resolveInside } from '@mender/shared';
import type { ProviderAdapter } from '@mender/adapters';
import { createPlan } from '../model/plan';
import type { Issue, Plan } from '../model/types';
import { normalizeWithRemediation, parseStatus } from '../normalize/audit';
import { auditMessages, reformatMessages } from './prompts';
import { toAdapterContext, type ProviderCallOptions } from './context';
import { runLinter, type LinterOptions } from './lint';
import type { Auditor, WorkerContext } from './types';

/**
 * Audits each resource with one provider call, plus at most one reformat
 * call when the answer is broken JSON. With `lint` set, the linter's output
 * for the resource goes into the audit prompt.
 */
export class LlmAuditor implements Auditor {
  constructor(
    private readonly provider: ProviderAdapter,
    private readonly root: string,
    private readonly callOptions: ProviderCallOptions = {},
    private readonly lint?: LinterOptions,
  ) {}

  async audit(resources: readonly string[], ctx: WorkerContext): Promise<Plan> {
    const entries: Array<[string, Issue[]]> = [];
    let failures = 0;

    for (const resource of resources) {
      ctx.abortSignal.throwIfAborted();
      try {
        entries.push([resource, await this.auditOne(resource, ctx)]);
      } catch (error) {
        if (error instanceof ConfigError || ctx.abortSignal.aborted) throw error;
        failures++;
        await ctx.logger.warn(`Skipping ${resource}: ${errorMessage(error)}`);
      }
    }

    if (resources.length > 0 && failures === resources.length) {
      throw new ProviderError(`Could not audit any of ${resources.length} resource(s)`);
    }
    return createPlan(entries);
  }

  private async auditOne(resource: string, ctx: WorkerContext): Promise<Issue[]> {
    const content = await readFile(resolveInside(this.root, resource), 'utf-8');
    const adapterCtx = toAdapterContext(ctx, this.callOptions);
    const lintOutput = this.lint ? await runLinter(this.lint, resource, ctx) : undefined;

    const response = await this.provider.generate(
      { messages: auditMessages(resource, content, lintOutput), jsonMode: true, temperature: 0.1 },
      adapterCtx,
    );
    const normalized = await normalizeWithRemediation(response.text ?? '', resource, async (text) => {
      const retry = await this.provider.generate(
        { messages: reformatMessages(text), jsonMode: true, temperature: 0 },
        adapterCtx,
      );
      return retry.text ?? '';
    });

    const { result } = normalized;
    await ctx.logger.log({
      type: 'AuditParsed',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: ctx.runId,
      payload: {
        resource,
        kind: result.kind,
        status: parseStatus(result),
        issueCount: result.issues.length,
        remediated: normalized.remediated,
      },
    });
    if (normalized.remediationError) {
      await ctx.logger.debug(`Reformat of ${resource} failed: ${normalized.remediationError}`);
    }
    return result.issues;
  }
}
