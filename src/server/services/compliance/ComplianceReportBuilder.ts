/**
 * Compliance Report Builder
 *
 * Pure aggregation of an ordered verdict sequence: grouped by document,
 * then by category, with tallies at every level.
 */

import type {
  CategoryGroup,
  ComplianceReport,
  DocumentReport,
  ParameterCategory,
  StatusCounts,
  Verdict,
} from '../../types/compliance.js';

export function emptyCounts(): StatusCounts {
  return { total: 0, match: 0, mismatch: 0, notFound: 0, error: 0 };
}

export function countVerdicts(verdicts: readonly Verdict[]): StatusCounts {
  const counts = emptyCounts();
  for (const verdict of verdicts) {
    counts.total++;
    switch (verdict.status) {
      case 'MATCH':
        counts.match++;
        break;
      case 'MISMATCH':
        counts.mismatch++;
        break;
      case 'NOT_FOUND':
        counts.notFound++;
        break;
      case 'ERROR':
        counts.error++;
        break;
    }
  }
  return counts;
}

/** Groups keep first-appearance key order */
function groupBy<K, V>(items: readonly V[], key: (item: V) => K): Map<K, V[]> {
  const groups = new Map<K, V[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

function byRowOrder(a: Verdict, b: Verdict): number {
  return a.row.index - b.row.index;
}

function buildDocument(documentId: string, verdicts: readonly Verdict[]): DocumentReport {
  const categories: CategoryGroup[] = [...groupBy(verdicts, (verdict) => verdict.row.category)].map(
    ([category, group]) => {
      const ordered = [...group].sort(byRowOrder);
      return { category, counts: countVerdicts(ordered), verdicts: ordered };
    }
  );
  const counts = countVerdicts(verdicts);
  const fullyCompliant = counts.mismatch === 0 && counts.error === 0;
  return {
    documentId,
    counts,
    fullyCompliant,
    status: fullyCompliant ? 'Pass' : 'Needs Review',
    categories,
  };
}

/**
 * Build the report. Same input, same output; never throws.
 */
export function buildReport(verdicts: readonly Verdict[]): ComplianceReport {
  const documents = [...groupBy(verdicts, (verdict) => verdict.documentId)].map(([documentId, group]) =>
    buildDocument(documentId, group)
  );

  const byCategory: { category: ParameterCategory; counts: StatusCounts }[] = [
    ...groupBy(verdicts, (verdict) => verdict.row.category),
  ].map(([category, group]) => ({ category, counts: countVerdicts(group) }));

  return {
    documents,
    summary: {
      documentCount: documents.length,
      fullyCompliantCount: documents.filter((document) => document.fullyCompliant).length,
      counts: countVerdicts(verdicts),
      byCategory,
    },
  };
}

function serializeVerdict(verdict: Verdict) {
  return {
    parameter: verdict.row.name,
    expectedValue: verdict.row.expectedValue,
    ...(verdict.row.unit !== undefined && { unit: verdict.row.unit }),
    category: verdict.row.category,
    cell: `${verdict.row.sourceCell.sheet}!${verdict.row.sourceCell.address}`,
    status: verdict.status,
    observedValue: verdict.observedValue,
    rationale: verdict.rationale,
    ...(verdict.confidence !== undefined && { confidence: verdict.confidence }),
  };
}

/**
 * Plain JSON form of the report, with keys in a fixed order
 */
export function reportToJSON(report: ComplianceReport) {
  return {
    summary: report.summary,
    documents: report.documents.map((document) => ({
      documentId: document.documentId,
      status: document.status,
      fullyCompliant: document.fullyCompliant,
      counts: document.counts,
      categories: document.categories.map((group) => ({
        category: group.category,
        counts: group.counts,
        verdicts: group.verdicts.map(serializeVerdict),
      })),
    })),
  };
}

export function serializeReport(report: ComplianceReport): string {
  return JSON.stringify(reportToJSON(report), null, 2);
}
