/**
 * Semantic Comparator
 *
 * Decides, row by row, whether an extracted document complies with the
 * master specification. Calls go through the run's admission gate and may
 * finish in any order; verdicts are handed back in specification order,
 * one per row with an expected value.
 */

import type {
  DocumentComparison,
  ExtractedDocument,
  SpecificationRow,
  Verdict,
} from '../../types/compliance.js';
import { RunCancelledError, ThrottleExhaustedError, UnparseableResponseError } from '../../types/errors.js';
import type { ReasoningClient } from './ReasoningClient.js';
import type { RunContext } from './runContext.js';
import { selectContext } from './relevance.js';
import { buildComparisonPrompt } from './prompts.js';
import { parseJudgment } from './responseParser.js';
import { decideVerdict, errorVerdict } from './verdictPolicy.js';

export const ABORTED_RATIONALE = 'aborted: rate limit';
export const CANCELLED_RATIONALE = 'cancelled';

/** Mutable per-document state; only touched between awaits */
interface DocumentState {
  consecutiveThrottles: number;
  aborted: boolean;
  truncatedRows: number;
  /** Aborts with the run, or alone when the document is abandoned for throttling */
  stop: AbortController;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SemanticComparator {
  constructor(private readonly client: ReasoningClient) {}

  /**
   * Compare every row that has an expected value against one document.
   */
  async compare(
    rows: readonly SpecificationRow[],
    document: ExtractedDocument,
    ctx: RunContext
  ): Promise<DocumentComparison> {
    const { documentId } = document;
    const log = ctx.logger.child({ documentId });
    const comparable = rows.filter((row) => row.expectedValue !== null);
    const state: DocumentState = { consecutiveThrottles: 0, aborted: false, truncatedRows: 0, stop: new AbortController() };
    const onRunAbort = () => state.stop.abort(ctx.signal.reason);
    if (ctx.signal.aborted) {
      onRunAbort();
    } else {
      ctx.signal.addEventListener('abort', onRunAbort, { once: true });
    }

    log.info({ rows: comparable.length, skipped: rows.length - comparable.length }, 'Comparing document');

    let verdicts: Verdict[];
    try {
      verdicts = await Promise.all(
        comparable.map((row) => ctx.gate.run(() => this.evaluate(row, document, ctx, state)))
      );
    } finally {
      ctx.signal.removeEventListener('abort', onRunAbort);
    }
    const ordered = [...verdicts].sort((a, b) => a.row.index - b.row.index);

    const warnings: string[] = [];
    if (state.aborted) {
      const abandoned = ordered.filter((verdict) => verdict.rationale === ABORTED_RATIONALE).length;
      warnings.push(
        `Document "${documentId}": ${abandoned} row(s) not verified after ${ctx.throttleAbortThreshold} consecutive rate-limit failures`
      );
    }
    const cancelled = ordered.filter((verdict) => verdict.rationale === CANCELLED_RATIONALE).length;
    if (cancelled > 0) {
      warnings.push(`Document "${documentId}": ${cancelled} row(s) not verified because the run was cancelled`);
    }
    if (state.truncatedRows > 0) {
      log.debug({ truncatedRows: state.truncatedRows }, 'Document context was truncated for some rows');
    }

    log.info(
      {
        match: ordered.filter((verdict) => verdict.status === 'MATCH').length,
        mismatch: ordered.filter((verdict) => verdict.status === 'MISMATCH').length,
        aborted: state.aborted,
      },
      'Document comparison finished'
    );

    return Object.freeze({ documentId, verdicts: Object.freeze(ordered), warnings: Object.freeze(warnings), aborted: state.aborted });
  }

  /**
   * Compare against several documents. A fault in one document turns its rows
   * into ERROR verdicts and never stops the others.
   */
  async compareAll(
    rows: readonly SpecificationRow[],
    documents: readonly ExtractedDocument[],
    ctx: RunContext
  ): Promise<DocumentComparison[]> {
    return Promise.all(
      documents.map(async (document) => {
        try {
          return await this.compare(rows, document, ctx);
        } catch (error) {
          const reason = `document error: ${errorMessage(error)}`;
          ctx.logger.error({ documentId: document.documentId, error: errorMessage(error) }, 'Document comparison failed');
          const verdicts = rows
            .filter((row) => row.expectedValue !== null)
            .map((row) => errorVerdict(row, document.documentId, reason));
          return {
            documentId: document.documentId,
            verdicts,
            warnings: [`Document "${document.documentId}": ${reason}`],
            aborted: false,
          };
        }
      })
    );
  }

  private async evaluate(
    row: SpecificationRow,
    document: ExtractedDocument,
    ctx: RunContext,
    state: DocumentState
  ): Promise<Verdict> {
    const { documentId } = document;
    if (state.aborted) {
      return errorVerdict(row, documentId, ABORTED_RATIONALE);
    }
    if (ctx.signal.aborted) {
      return errorVerdict(row, documentId, CANCELLED_RATIONALE);
    }

    const context = selectContext(document, row, ctx.contextCharLimit);
    if (context.truncated) {
      state.truncatedRows++;
    }
    const prompt = buildComparisonPrompt(row, documentId, context.text);

    let raw: string;
    try {
      raw = await this.client.ask(prompt, {
        signal: state.stop.signal,
        abandonSignal: ctx.abandonSignal,
        label: `${documentId}#${row.name}`,
      });
    } catch (error) {
      if (error instanceof ThrottleExhaustedError) {
        state.consecutiveThrottles++;
        if (!state.aborted && state.consecutiveThrottles >= ctx.throttleAbortThreshold) {
          state.aborted = true;
          state.stop.abort(ABORTED_RATIONALE);
          ctx.logger.warn(
            { documentId, consecutiveThrottles: state.consecutiveThrottles },
            'Aborting remaining rows after repeated throttling'
          );
        }
        return errorVerdict(row, documentId, `rate limit: ${error.message}`);
      }
      state.consecutiveThrottles = 0;
      if (error instanceof RunCancelledError) {
        // Retries stopped by the throttle abort count as abandoned, not cancelled
        return errorVerdict(row, documentId, state.aborted ? ABORTED_RATIONALE : CANCELLED_RATIONALE);
      }
      ctx.logger.warn({ documentId, parameter: row.name, error: errorMessage(error) }, 'Reasoning call failed');
      return errorVerdict(row, documentId, errorMessage(error));
    }
    state.consecutiveThrottles = 0;

    try {
      return decideVerdict(row, documentId, parseJudgment(raw), ctx.minimumConfidence);
    } catch (error) {
      if (error instanceof UnparseableResponseError) {
        ctx.logger.warn({ documentId, parameter: row.name }, 'Unparseable reasoning response');
        return errorVerdict(row, documentId, error.message);
      }
      throw error;
    }
  }
}
