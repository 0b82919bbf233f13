/**
 * Turning a parsed judgment into a Verdict.
 *
 * A numeric check overrides the oracle's status whenever both the expected
 * and observed values parse as numbers. An uncertain MATCH is reported as a
 * MISMATCH so it gets human review.
 */

import type { SpecificationRow, Verdict, VerdictStatus } from '../../types/compliance.js';
import type { Judgment } from './responseParser.js';
import { evaluateNumeric } from './numeric.js';

const HEDGE_PATTERN =
  /\b(possibly|possible|probably|perhaps|might|may be|maybe|unclear|uncertain|not sure|not certain|appears? to|seems?|likely|ambiguous|partial(?:ly)?|assum(?:e|ed|ing))\b/i;

export function isHedged(judgment: Judgment, minimumConfidence: number): boolean {
  if (judgment.uncertain) {
    return true;
  }
  if (judgment.confidence !== undefined && judgment.confidence < minimumConfidence) {
    return true;
  }
  return HEDGE_PATTERN.test(judgment.rationale);
}

export function createVerdict(
  row: SpecificationRow,
  documentId: string,
  status: VerdictStatus,
  observedValue: string | null,
  rationale: string,
  confidence?: number
): Verdict {
  return Object.freeze({
    row,
    documentId,
    status,
    observedValue,
    rationale,
    ...(confidence !== undefined && { confidence }),
  });
}

export function errorVerdict(row: SpecificationRow, documentId: string, rationale: string): Verdict {
  return createVerdict(row, documentId, 'ERROR', null, rationale);
}

export function decideVerdict(
  row: SpecificationRow,
  documentId: string,
  judgment: Judgment,
  minimumConfidence: number
): Verdict {
  if (judgment.status === 'NOT_FOUND') {
    const rationale = judgment.rationale || 'parameter not reported in document';
    return createVerdict(row, documentId, 'NOT_FOUND', null, rationale, judgment.confidence);
  }

  let status: VerdictStatus = judgment.status;
  let rationale = judgment.rationale;

  const numeric =
    row.expectedValue !== null && judgment.observedValue !== null
      ? evaluateNumeric(row.expectedValue, judgment.observedValue, row.unit, judgment.observedUnit ?? undefined)
      : null;
  if (numeric) {
    status = numeric.satisfied ? 'MATCH' : 'MISMATCH';
    rationale = numeric.rationale;
  }

  if (status === 'MATCH' && isHedged(judgment, minimumConfidence)) {
    status = 'MISMATCH';
    rationale = `uncertain match, needs review: ${rationale || 'oracle was not certain'}`;
  }

  return createVerdict(row, documentId, status, judgment.observedValue, rationale, judgment.confidence);
}
