/**
 * Parsing boundary for reasoning-service output.
 *
 * Raw text never reaches a Verdict directly: it is parsed into a closed
 * set of statuses or rejected with UnparseableResponseError.
 */

import { z } from 'zod';
import type { JudgedStatus } from '../../types/compliance.js';
import { UnparseableResponseError } from '../../types/errors.js';

export interface Judgment {
  status: JudgedStatus;
  observedValue: string | null;
  observedUnit: string | null;
  rationale: string;
  confidence?: number;
  uncertain: boolean;
}

const judgmentSchema = z.object({
  status: z.string(),
  observed_value: z.union([z.string(), z.number(), z.null()]).optional(),
  observed_unit: z.union([z.string(), z.null()]).optional(),
  rationale: z.string().optional(),
  reason: z.string().optional(),
  confidence: z.union([z.number(), z.string()]).optional(),
  uncertain: z.boolean().optional(),
});

const PLACEHOLDERS = new Set(['', 'n/a', 'na', 'none', 'null', 'not specified', 'not explicitly mentioned', 'not found', '-']);

function parseStatus(value: string): JudgedStatus | undefined {
  const token = value.trim().toUpperCase().replace(/[\s-]+/g, '_');
  switch (token) {
    case 'MATCH':
      return 'MATCH';
    case 'MISMATCH':
      return 'MISMATCH';
    case 'NOT_FOUND':
    case 'NOTFOUND':
      return 'NOT_FOUND';
    default:
      return undefined;
  }
}

function cleanValue(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim();
  return PLACEHOLDERS.has(text.toLowerCase()) ? null : text;
}

function parseConfidence(value: string | number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const number = typeof value === 'number' ? value : parseFloat(value);
  if (isNaN(number)) {
    return undefined;
  }
  // Some models answer in percent
  const scaled = number > 1 ? number / 100 : number;
  return Math.min(1, Math.max(0, scaled));
}

function stripCodeFence(text: string): string {
  let body = text.trim();
  if (body.startsWith('```json')) {
    body = body.replace(/^```json\s*/, '').replace(/\s*```$/, '');
  } else if (body.startsWith('```')) {
    body = body.replace(/^```\s*/, '').replace(/\s*```$/, '');
  }
  return body;
}

function parseJson(body: string): Judgment | null {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return null;
  }
  const result = judgmentSchema.safeParse(data);
  if (!result.success) {
    return null;
  }
  const status = parseStatus(result.data.status);
  if (!status) {
    return null;
  }
  return {
    status,
    observedValue: status === 'NOT_FOUND' ? null : cleanValue(result.data.observed_value),
    observedUnit: cleanValue(result.data.observed_unit),
    rationale: (result.data.rationale ?? result.data.reason ?? '').trim(),
    confidence: parseConfidence(result.data.confidence),
    uncertain: result.data.uncertain ?? false,
  };
}

function field(body: string, name: string): string | undefined {
  const match = body.match(new RegExp(`^\\s*${name}\\s*[:=]\\s*(.*)$`, 'im'));
  return match?.[1]?.trim();
}

/**
 * Fallback for plain-text answers of the form
 * STATUS: MISMATCH / OBSERVED: 0.08 / UNIT: mg/kg / RATIONALE: ... / CONFIDENCE: 0.9
 */
function parseLines(body: string): Judgment | null {
  const statusText = field(body, 'status');
  const status = statusText ? parseStatus(statusText) : undefined;
  if (!status) {
    return null;
  }
  const uncertainText = field(body, 'uncertain');
  return {
    status,
    observedValue: status === 'NOT_FOUND' ? null : cleanValue(field(body, 'observed(?:_value)?')),
    observedUnit: cleanValue(field(body, '(?:observed_)?unit')),
    rationale: field(body, 'rationale') ?? '',
    confidence: parseConfidence(field(body, 'confidence')),
    uncertain: uncertainText?.toLowerCase() === 'true' || uncertainText?.toLowerCase() === 'yes',
  };
}

/**
 * @throws UnparseableResponseError when no recognizable status is present
 */
export function parseJudgment(raw: string): Judgment {
  const body = stripCodeFence(raw);
  const judgment = parseJson(body) ?? parseLines(body);
  if (!judgment) {
    throw new UnparseableResponseError('unparseable response', { excerpt: raw.slice(0, 200) });
  }
  return judgment;
}
