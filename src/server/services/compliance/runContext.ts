/**
 * Per-run state passed through every comparison call.
 *
 * `signal` aborts on cancellation or timeout and stops new dispatch at once;
 * `abandonSignal` follows it after `drainGraceMs`, abandoning whatever is
 * still in flight.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { AdmissionGate } from '../../utils/concurrency.js';
import { createChildLogger } from '../../utils/logger.js';
import { getEnv } from '../../config/env.js';

export interface RunOptions {
  runId?: string;
  concurrency?: number;
  /** Caller-level cancellation */
  signal?: AbortSignal;
  /** 0 disables the run timeout */
  timeoutMs?: number;
  drainGraceMs?: number;
  throttleAbortThreshold?: number;
  contextCharLimit?: number;
  minimumConfidence?: number;
  logger?: Logger;
}

export interface RunContext {
  readonly runId: string;
  readonly gate: AdmissionGate;
  readonly signal: AbortSignal;
  readonly abandonSignal: AbortSignal;
  readonly throttleAbortThreshold: number;
  readonly contextCharLimit: number;
  readonly minimumConfidence: number;
  readonly logger: Logger;
  cancel(reason?: string): void;
  /** Clears the run's timers; call once the run has finished */
  dispose(): void;
}

export function createRunContext(options: RunOptions = {}): RunContext {
  const env = getEnv();
  const runId = options.runId ?? randomUUID();
  const log = options.logger ?? createChildLogger({ runId });
  const timeoutMs = options.timeoutMs ?? env.COMPLIANCE_RUN_TIMEOUT_MS;
  const drainGraceMs = options.drainGraceMs ?? env.COMPLIANCE_DRAIN_GRACE_MS;

  const controller = new AbortController();
  const abandonController = new AbortController();
  let runTimer: NodeJS.Timeout | undefined;
  let graceTimer: NodeJS.Timeout | undefined;

  const cancel = (reason = 'cancelled') => {
    if (controller.signal.aborted) {
      return;
    }
    log.warn({ reason, drainGraceMs }, 'Run cancelled, draining in-flight requests');
    controller.abort(reason);
    if (drainGraceMs <= 0) {
      abandonController.abort(reason);
      return;
    }
    graceTimer = setTimeout(() => abandonController.abort(reason), drainGraceMs);
  };

  const onCallerAbort = () => cancel('cancelled by caller');
  if (options.signal?.aborted) {
    cancel('cancelled by caller');
  } else {
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
  }

  if (timeoutMs > 0) {
    runTimer = setTimeout(() => cancel(`timed out after ${timeoutMs}ms`), timeoutMs);
  }

  return {
    runId,
    gate: new AdmissionGate(options.concurrency ?? env.COMPLIANCE_CONCURRENCY),
    signal: controller.signal,
    abandonSignal: abandonController.signal,
    throttleAbortThreshold: options.throttleAbortThreshold ?? env.COMPLIANCE_THROTTLE_ABORT_THRESHOLD,
    contextCharLimit: options.contextCharLimit ?? env.COMPLIANCE_CONTEXT_CHAR_LIMIT,
    minimumConfidence: options.minimumConfidence ?? env.COMPLIANCE_MIN_CONFIDENCE,
    logger: log,
    cancel,
    dispose() {
      clearTimeout(runTimer);
      clearTimeout(graceTimer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    },
  };
}
