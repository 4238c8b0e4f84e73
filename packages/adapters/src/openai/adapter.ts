import OpenAI, { APIError, APIConnectionTimeoutError } from 'openai';
import {
  ConfigError,
  TimeoutError,
  type ChatMessage,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
  type ProviderConfig,
} from '@mender/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext } from '../types';
import {
  BaseProviderAdapter,
  parseRetryAfter,
  type APIErrorLike,
  type ErrorTypeConfig,
} from '../base-adapter';
import { executeProviderRequest } from '../common';

export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof APIError,
    isTimeoutError: (error: unknown) => error instanceof APIConnectionTimeoutError,
    retryAfterSeconds: (error) =>
      error instanceof APIError ? parseRetryAfter(error.headers?.['retry-after']) : undefined,
  };

  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;

  constructor(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env) {
    super();
    const apiKey = config.api_key ?? (config.api_key_env ? env[config.api_key_env] : undefined);
    if (!apiKey) {
      throw new ConfigError(
        `Missing API Key for OpenAI provider. Checked config.api_key and env var ${config.api_key_env ?? '(unset)'}`,
      );
    }
    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseURL,
      // Retries are owned by executeProviderRequest.
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      latencyClass: 'medium',
      requiresApiKey: true,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'openai', this.model, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: req.messages.map((m) => this.mapMessage(m)),
            max_tokens: this.maxTokens ?? req.maxTokens,
            temperature: this.temperature ?? req.temperature ?? 0.2,
            response_format: req.jsonMode ? { type: 'json_object' } : undefined,
          },
          { signal },
        );

        const choice = completion.choices[0];
        return {
          text: choice?.message.content ?? undefined,
          usage: completion.usage
            ? {
                inputTokens: completion.usage.prompt_tokens,
                outputTokens: completion.usage.completion_tokens,
                totalTokens: completion.usage.total_tokens,
              }
            : undefined,
        };
      } catch (error) {
        if (signal.aborted && signal.reason instanceof TimeoutError) {
          throw signal.reason;
        }
        throw this.mapError(error);
      }
    });
  }

  private mapMessage(m: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
    switch (m.role) {
      case 'system':
        return { role: 'system', content: m.content };
      case 'user':
        return { role: 'user', content: m.content };
      case 'assistant':
        return { role: 'assistant', content: m.content };
    }
  }
}
