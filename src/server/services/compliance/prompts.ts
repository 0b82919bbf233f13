/**
 * Prompt construction for one (specification row, document) comparison.
 */

import type { SpecificationRow } from '../../types/compliance.js';

export const COMPARISON_SYSTEM_PROMPT = [
  'You are a senior data quality analyst reviewing supplier certificates of analysis and lab reports',
  'against an internal master specification. Your work is audited: report only what the document states,',
  'and say so when you are unsure. Always answer with a single JSON object and nothing else.',
].join(' ');

const RULES = `
RULES:
1. Field matching: find the statement in the document that reports this parameter, even when it uses
   another name (e.g. "Pb" for "Lead", "Material Description" for "Product Name", "TPC" for "Total Plate Count").
2. Normalize before comparing: dates to YYYY-MM-DD, text case-insensitive with surrounding whitespace ignored,
   "Rev.6.0" equals "Rev. 6.0", ISO country codes equal the country name.
3. Limits: an expected value such as "<0.05" or "NMT 10" is a limit. A reading inside the limit is a MATCH.
4. Units: report the unit the document uses in "observed_unit". Do not convert units.
5. Incompatible data types (e.g. a person's name against a date) are a MISMATCH.
6. Placeholders such as "N/A", "Not specified" or "9999-12-31" in the document are not values.
7. If the document does not report this parameter at all, answer NOT_FOUND.
8. If you are not certain the statement refers to this parameter, or the match is only partial,
   set "uncertain" to true and lower "confidence".
`;

const RESPONSE_FORMAT = `
Respond with exactly this JSON object:
{
  "status": "MATCH" | "MISMATCH" | "NOT_FOUND",
  "observed_value": "the value as written in the document, without its unit, or null",
  "observed_unit": "the unit as written in the document, or null",
  "rationale": "one sentence explaining the verdict",
  "confidence": 0.0 to 1.0,
  "uncertain": true | false
}
`;

function describeRow(row: SpecificationRow): string {
  const lines = [
    `Parameter: ${row.name}`,
    `Expected value: ${row.expectedValue ?? '(none)'}`,
    `Category: ${row.category}`,
  ];
  if (row.unit) {
    lines.push(`Unit: ${row.unit}`);
  }
  if (row.tolerance) {
    lines.push(`Tolerance: ${row.tolerance}`);
  }
  return lines.join('\n');
}

export function buildComparisonPrompt(row: SpecificationRow, documentId: string, context: string): string {
  return `Compare one master specification parameter against a source document.

--- MASTER SPECIFICATION ---
${describeRow(row)}
--- END MASTER SPECIFICATION ---

--- SOURCE DOCUMENT: ${documentId} ---
${context}
--- END SOURCE DOCUMENT ---
${RULES}${RESPONSE_FORMAT}`;
}
