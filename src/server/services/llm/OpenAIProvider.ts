/**
 * OpenAI LLM Provider
 *
 * Implements LLMProvider interface for the OpenAI chat completions API.
 * The SDK's own retries are disabled; backoff is owned by the reasoning client.
 */

import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { ExternalServiceError, RunCancelledError } from '../../types/errors.js';
import {
  ServiceConfigurationError,
  ServiceConnectionError,
  ServiceRateLimitError,
} from '../../utils/serviceErrors.js';
import { getEnv } from '../../config/env.js';

export interface OpenAIProviderConfig {
  apiKey?: string;
  defaultModel?: string;
  temperature?: number;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

function parseRetryAfter(headers: InstanceType<typeof APIError>['headers']): number | undefined {
  const value = headers?.['retry-after'];
  if (!value) {
    return undefined;
  }
  const seconds = parseInt(value, 10);
  return isNaN(seconds) || seconds <= 0 ? undefined : seconds;
}

/**
 * Translate SDK errors into the provider-neutral service error shapes
 */
export function mapOpenAIError(error: unknown): unknown {
  if (error instanceof APIUserAbortError) {
    return new RunCancelledError();
  }
  // Connection errors carry no status; check them before the generic APIError branch
  if (error instanceof APIConnectionError) {
    return new ServiceConnectionError('OpenAI', undefined, error.message);
  }
  if (error instanceof APIError) {
    if (error.status === 429) {
      return new ServiceRateLimitError('OpenAI', parseRetryAfter(error.headers));
    }
    return new ServiceConnectionError('OpenAI', error.status, error.message);
  }
  return error;
}

export class OpenAIProvider implements LLMProvider {
  private config: OpenAIProviderConfig;
  private client: OpenAI | null = null;

  constructor(config?: OpenAIProviderConfig) {
    const env = getEnv();
    this.config = {
      apiKey: env.OPENAI_API_KEY,
      defaultModel: env.COMPLIANCE_MODEL,
      temperature: env.COMPLIANCE_TEMPERATURE,
      timeout: 120000,
      ...config,
    };
  }

  getName(): string {
    return 'openai';
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const client = this.getClient();
    const model = options?.model || this.config.defaultModel || 'gpt-4o-mini';
    const temperature = options?.temperature ?? this.config.temperature ?? 0;
    const max_tokens = options?.max_tokens;

    try {
      const response = await client.chat.completions.create(
        {
          model,
          messages: messages.map((msg) => ({
            role: msg.role,
            content: msg.content,
          })),
          temperature,
          ...(max_tokens && { max_tokens }),
          ...(options?.responseFormat === 'json' && { response_format: { type: 'json_object' as const } }),
        },
        { signal: options?.signal }
      );

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ExternalServiceError('OpenAI', 'Empty response from OpenAI', {
          reason: 'empty_response',
          provider: 'openai',
          model,
        });
      }

      return {
        content,
        model: response.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      const mapped = mapOpenAIError(error);
      logger.debug({ error: mapped instanceof Error ? mapped.message : String(mapped), model }, 'Error calling OpenAI');
      throw mapped;
    }
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }
    if (!this.config.apiKey) {
      throw new ServiceConfigurationError('OpenAI', ['OPENAI_API_KEY']);
    }
    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      maxRetries: 0,
      timeout: this.config.timeout,
    });
    return this.client;
  }
}
