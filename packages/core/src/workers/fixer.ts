import { readFile } from 'node:fs/promises';
import {
  ConfigError,
  SandboxViolationError,
  atomicWrite,
  errorMessage,
  resolveInside,
  type ChatMessage,
} from '@mender/shared';
import type { ProviderAdapter } from '@mender/adapters';
import type { FixOutcome, FixStatus, Issue, Plan } from '../model/types';
import { FIXER_STRICT_RETRY_PROMPT, fixMessages } from './prompts';
import { toAdapterContext, type ProviderCallOptions } from './context';
import type { Fixer, WorkerContext } from './types';

const CODE_BLOCK = /```[^\n`]*\r?\n([\s\S]*?)```/;

/** Returns the body of the first fenced code block, if any. */
export function extractCodeBlock(text: string): string | undefined {
  return CODE_BLOCK.exec(text)?.[1];
}

/**
 * Rewrites each planned resource with the complete file the provider returns.
 * Only resources in the run's resource list under `root` are ever written.
 */
export class LlmFixer implements Fixer {
  constructor(
    private readonly provider: ProviderAdapter,
    private readonly root: string,
    private readonly callOptions: ProviderCallOptions = {},
  ) {}

  async fix(resources: readonly string[], plan: Plan, ctx: WorkerContext): Promise<FixOutcome[]> {
    const allowed = new Set(resources);
    const outcomes: FixOutcome[] = [];

    for (const [resource, issues] of plan) {
      ctx.abortSignal.throwIfAborted();
      if (!allowed.has(resource)) throw new SandboxViolationError(resource);
      const absPath = resolveInside(this.root, resource);

      try {
        outcomes.push(await this.fixOne(resource, absPath, issues, ctx));
      } catch (error) {
        if (error instanceof ConfigError || ctx.abortSignal.aborted) throw error;
        await ctx.logger.warn(`Could not fix ${resource}: ${errorMessage(error)}`);
        outcomes.push({
          resource,
          modified: false,
          issuesAddressed: 0,
          status: 'ERROR',
          error: errorMessage(error),
        });
      }
    }
    return outcomes;
  }

  private async fixOne(
    resource: string,
    absPath: string,
    issues: readonly Issue[],
    ctx: WorkerContext,
  ): Promise<FixOutcome> {
    const original = await readFile(absPath, 'utf-8');
    const adapterCtx = toAdapterContext(ctx, this.callOptions);
    const messages = fixMessages(resource, original, issues);

    const first = await this.provider.generate({ messages, temperature: 0.1 }, adapterCtx);
    let code = extractCodeBlock(first.text ?? '');
    let status: FixStatus = 'FIXED';

    if (code === undefined) {
      const retryMessages: ChatMessage[] = [
        ...messages,
        { role: 'assistant', content: first.text ?? '' },
        { role: 'user', content: FIXER_STRICT_RETRY_PROMPT },
      ];
      const retry = await this.provider.generate({ messages: retryMessages, temperature: 0 }, adapterCtx);
      code = extractCodeBlock(retry.text ?? '');
      status = 'FIXED_VIA_FALLBACK';
    }

    if (code === undefined) {
      return failed(resource, 'Fixer response contained no code block');
    }
    if (code.trim() === '') {
      return failed(resource, 'Fixer returned an empty file');
    }
    if (code === original) {
      return { resource, modified: false, issuesAddressed: 0, status: 'NO_CHANGE' };
    }

    ctx.abortSignal.throwIfAborted();
    await atomicWrite(absPath, code);
    return { resource, modified: true, issuesAddressed: issues.length, status };
  }
}

function failed(resource: string, error: string): FixOutcome {
  return { resource, modified: false, issuesAddressed: 0, status: 'ERROR', error };
}
