export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** One completion request, independent of the provider behind it. */
export interface ModelRequest {
  messages: ChatMessage[];
  maxTokens?: number;
  /** 0-2 */
  temperature?: number;
  /** Ask the provider to constrain output to a JSON object */
  jsonMode?: boolean;
}

export interface Usage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface ModelResponse {
  text?: string;
  usage?: Usage;
}

export interface ProviderCapabilities {
  supportsJsonMode: boolean;
  maxContextTokens?: number;
  latencyClass: 'fast' | 'medium' | 'slow';
  requiresApiKey: boolean;
}
