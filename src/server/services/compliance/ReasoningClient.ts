/**
 * Rate-limited front door to the reasoning service.
 *
 * Every call goes through retryWithBackoff; whatever escapes is classified
 * into exactly one of ThrottleExhaustedError, TransportError,
 * RequestRejectedError or RunCancelledError so the comparator can decide
 * between a row-level ERROR and aborting the document.
 */

import type { Logger } from 'pino';
import type { LLMProvider, LLMMessage } from '../llm/LLMProvider.js';
import { retryWithBackoff, isRetryableError } from '../../utils/retry.js';
import { withAbort } from '../../utils/withAbort.js';
import { logger as rootLogger } from '../../utils/logger.js';
import {
  AppError,
  RequestRejectedError,
  RunCancelledError,
  ThrottleExhaustedError,
  TransportError,
} from '../../types/errors.js';
import { getEnv } from '../../config/env.js';

export interface BackoffPolicy {
  /** Total attempts per call, first one included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** 0.2 spreads each delay by ±20% */
  jitterRatio: number;
}

export function defaultBackoffPolicy(): BackoffPolicy {
  const env = getEnv();
  return {
    maxAttempts: env.COMPLIANCE_MAX_ATTEMPTS,
    baseDelayMs: env.COMPLIANCE_BASE_DELAY_MS,
    maxDelayMs: env.COMPLIANCE_MAX_DELAY_MS,
    multiplier: 2,
    jitterRatio: env.COMPLIANCE_JITTER_RATIO,
  };
}

export interface AskOptions {
  /** Stops further attempts and interrupts backoff sleeps */
  signal?: AbortSignal;
  /** Abandons a request already in flight; defaults to `signal` */
  abandonSignal?: AbortSignal;
  /** Used only for log context */
  label?: string;
}

export interface ReasoningClientOptions {
  policy?: Partial<BackoffPolicy>;
  systemPrompt?: string;
  logger?: Logger;
  random?: () => number;
}

function isThrottle(error: unknown): boolean {
  if (error && typeof error === 'object' && 'name' in error && error.name === 'ServiceRateLimitError') {
    return true;
  }
  return error !== null && typeof error === 'object' && 'statusCode' in error && error.statusCode === 429;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ReasoningClient {
  readonly policy: BackoffPolicy;
  private readonly log: Logger;

  constructor(
    private readonly provider: LLMProvider,
    private readonly options: ReasoningClientOptions = {}
  ) {
    this.policy = { ...defaultBackoffPolicy(), ...options.policy };
    this.log = options.logger ?? rootLogger.child({ component: 'reasoning-client' });
  }

  /**
   * Send one prompt and return the raw response text.
   *
   * @throws ThrottleExhaustedError when every attempt was throttled
   * @throws TransportError when a transient failure outlived the retries
   * @throws RequestRejectedError for non-retryable request faults
   * @throws RunCancelledError when the signal aborts
   */
  async ask(prompt: string, options: AskOptions = {}): Promise<string> {
    const messages: LLMMessage[] = [];
    if (this.options.systemPrompt) {
      messages.push({ role: 'system', content: this.options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const abandonSignal = options.abandonSignal ?? options.signal;
    let attempts = 0;
    try {
      const response = await retryWithBackoff(
        (attempt) => {
          attempts = attempt + 1;
          return withAbort(this.provider.generate(messages, { responseFormat: 'json', signal: abandonSignal }), abandonSignal);
        },
        {
          maxAttempts: this.policy.maxAttempts,
          initialDelay: this.policy.baseDelayMs,
          maxDelay: this.policy.maxDelayMs,
          multiplier: this.policy.multiplier,
          jitterRatio: this.policy.jitterRatio,
          random: this.options.random,
          isRetryable: (error) => !(error instanceof RunCancelledError) && (isThrottle(error) || isRetryableError(error)),
          signal: options.signal,
        },
        options.label
      );
      return response.content;
    } catch (error) {
      throw this.classify(error, attempts, options);
    }
  }

  private classify(error: unknown, attempts: number, options: AskOptions): AppError {
    if (error instanceof RunCancelledError || options.signal?.aborted) {
      return error instanceof RunCancelledError ? error : new RunCancelledError();
    }
    if (isThrottle(error)) {
      this.log.warn({ attempts, label: options.label }, 'Reasoning service throttling exhausted retries');
      return new ThrottleExhaustedError(attempts, { label: options.label });
    }
    if (isRetryableError(error)) {
      return new TransportError(`Reasoning service unreachable after ${attempts} attempts: ${describe(error)}`, {
        attempts,
        label: options.label,
      });
    }
    return new RequestRejectedError(`Reasoning service rejected the request: ${describe(error)}`, {
      label: options.label,
    });
  }
}
