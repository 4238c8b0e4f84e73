import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  ProviderConfig,
} from '@mender/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import { executeProviderRequest } from '../common';

/** Reply used when a fake provider has no script: an audit with nothing to report. */
export const FAKE_DEFAULT_REPLY = '{"issues": []}';

/**
 * Computes the reply for the n-th call (0-based). Returning an Error makes the call fail.
 */
export type FakeResponder = (req: ModelRequest, callIndex: number) => string | Error;

/**
 * Offline provider that answers from a script.
 *
 * A list script is consumed in order and its last entry repeats once the list
 * runs out. Every request is recorded for inspection.
 */
export class FakeAdapter implements ProviderAdapter {
  readonly requests: ModelRequest[] = [];
  private calls = 0;

  constructor(
    private readonly script: readonly string[] | FakeResponder = [],
    private readonly model = 'fake',
  ) {}

  static fromConfig(config: ProviderConfig): FakeAdapter {
    return new FakeAdapter(config.responses ?? [], config.model);
  }

  id(): string {
    return 'fake';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      latencyClass: 'fast',
      requiresApiKey: false,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'fake', this.model, async (signal) => {
      signal.throwIfAborted();
      const index = this.calls++;
      this.requests.push(req);
      const reply = this.replyFor(req, index);
      if (reply instanceof Error) throw reply;
      return { text: reply };
    });
  }

  private replyFor(req: ModelRequest, index: number): string | Error {
    if (typeof this.script === 'function') {
      return this.script(req, index);
    }
    if (this.script.length === 0) return FAKE_DEFAULT_REPLY;
    return this.script[Math.min(index, this.script.length - 1)];
  }
}
