/**
 * Reasoning service behind the compliance comparator.
 *
 * Implementations report failures with the shapes from utils/serviceErrors:
 * ServiceRateLimitError when throttled, ServiceConnectionError (with the HTTP
 * status when there is one) for transport faults, ServiceConfigurationError
 * when credentials are missing. Retries belong to the caller.
 */

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export interface LLMGenerateOptions {
  temperature?: number;
  max_tokens?: number;
  model?: string;
  /** 'json' constrains the answer to a single JSON object */
  responseFormat?: 'json' | 'text';
  /** Aborts the request in flight */
  signal?: AbortSignal;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: LLMUsage;
}

export interface LLMProvider {
  generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;
  /** True when credentials are configured; makes no request */
  isAvailable(): Promise<boolean>;
  getName(): string;
}
