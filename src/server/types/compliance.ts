/**
 * Domain types shared by the loader, comparator, report builder and corrector.
 */

export const PARAMETER_CATEGORIES = [
  'Nutrient',
  'Dietary',
  'Allergen',
  'GMO',
  'Safety',
  'Composition',
  'Microbiological',
  'Regulatory',
  'General',
] as const;

export type ParameterCategory = (typeof PARAMETER_CATEGORIES)[number];

export const VERDICT_STATUSES = ['MATCH', 'MISMATCH', 'NOT_FOUND', 'ERROR'] as const;

export type VerdictStatus = (typeof VERDICT_STATUSES)[number];

/** Statuses the reasoning service itself may answer with */
export type JudgedStatus = Exclude<VerdictStatus, 'ERROR'>;

/**
 * Location of a value cell in the master spreadsheet (1-based row and column)
 */
export interface CellRef {
  readonly sheet: string;
  readonly row: number;
  readonly column: number;
  /** A1-style address, e.g. "B7" */
  readonly address: string;
}

export interface SpecificationRow {
  /** Position in loader output, 0-based */
  readonly index: number;
  readonly name: string;
  /** Null when the cell is empty; such rows are informational and never compared */
  readonly expectedValue: string | null;
  readonly unit?: string;
  readonly tolerance?: string;
  readonly category: ParameterCategory;
  readonly sourceCell: CellRef;
}

export interface ExtractedTable {
  readonly title?: string;
  readonly rows: readonly (readonly string[])[];
}

export interface ExtractedDocument {
  /** Stable identifier, usually the uploaded filename */
  readonly documentId: string;
  readonly rawText: string;
  readonly tables: readonly ExtractedTable[];
}

export interface Verdict {
  readonly row: SpecificationRow;
  readonly documentId: string;
  readonly status: VerdictStatus;
  readonly observedValue: string | null;
  readonly rationale: string;
  readonly confidence?: number;
}

export interface DocumentComparison {
  readonly documentId: string;
  /** One per comparable row, in specification order */
  readonly verdicts: readonly Verdict[];
  readonly warnings: readonly string[];
  /** True when remaining rows were abandoned after repeated throttling */
  readonly aborted: boolean;
}

export interface StatusCounts {
  total: number;
  match: number;
  mismatch: number;
  notFound: number;
  error: number;
}

export interface CategoryGroup {
  readonly category: ParameterCategory;
  readonly counts: StatusCounts;
  readonly verdicts: readonly Verdict[];
}

export type DocumentStatus = 'Pass' | 'Needs Review';

export interface DocumentReport {
  readonly documentId: string;
  readonly counts: StatusCounts;
  readonly fullyCompliant: boolean;
  readonly status: DocumentStatus;
  readonly categories: readonly CategoryGroup[];
}

export interface ComplianceReport {
  readonly documents: readonly DocumentReport[];
  readonly summary: {
    readonly documentCount: number;
    readonly fullyCompliantCount: number;
    readonly counts: StatusCounts;
    readonly byCategory: readonly { readonly category: ParameterCategory; readonly counts: StatusCounts }[];
  };
}
