/**
 * Compliance Verification Service
 *
 * Runs one verification: load the master specification, compare it against
 * every document, then build the report and the per-document corrected
 * master files from the complete, ordered verdicts.
 */

import type {
  ComplianceReport,
  ExtractedDocument,
  SpecificationRow,
  Verdict,
} from '../../types/compliance.js';
import { BadRequestError } from '../../types/errors.js';
import type { LLMProvider } from '../llm/LLMProvider.js';
import { OpenAIProvider } from '../llm/OpenAIProvider.js';
import { ReasoningClient, type BackoffPolicy } from './ReasoningClient.js';
import { SemanticComparator } from './SemanticComparator.js';
import { loadSpecification, type LoadOptions } from './SpecificationLoader.js';
import { buildReport } from './ComplianceReportBuilder.js';
import { correctMasterFile } from './MasterFileCorrector.js';
import { createRunContext, type RunOptions } from './runContext.js';
import { COMPARISON_SYSTEM_PROMPT } from './prompts.js';

export interface VerificationRequest {
  /** Master spreadsheet (XLSX bytes) */
  specification: Buffer;
  documents: readonly ExtractedDocument[];
  load?: LoadOptions;
  run?: RunOptions;
}

export interface DocumentCorrection {
  documentId: string;
  /** Null when no cell needed correcting */
  correctedSpreadsheet: Buffer | null;
  correctedCells: number;
}

export interface VerificationResult {
  runId: string;
  rows: readonly SpecificationRow[];
  verdicts: readonly Verdict[];
  report: ComplianceReport;
  warnings: string[];
  corrections: DocumentCorrection[];
}

export interface ServiceOptions {
  provider?: LLMProvider;
  policy?: Partial<BackoffPolicy>;
}

function assertUniqueDocuments(documents: readonly ExtractedDocument[]): void {
  if (documents.length === 0) {
    throw new BadRequestError('At least one document is required', { field: 'documents' });
  }
  const seen = new Set<string>();
  for (const { documentId } of documents) {
    if (seen.has(documentId)) {
      throw new BadRequestError(`Duplicate documentId "${documentId}"`, { field: 'documents', documentId });
    }
    seen.add(documentId);
  }
}

export class ComplianceVerificationService {
  private readonly comparator: SemanticComparator;

  constructor(options: ServiceOptions = {}) {
    const client = new ReasoningClient(options.provider ?? new OpenAIProvider(), {
      policy: options.policy,
      systemPrompt: COMPARISON_SYSTEM_PROMPT,
    });
    this.comparator = new SemanticComparator(client);
  }

  async verify(request: VerificationRequest): Promise<VerificationResult> {
    assertUniqueDocuments(request.documents);
    const rows = await loadSpecification(request.specification, request.load);

    const ctx = createRunContext(request.run);
    const startTime = Date.now();
    try {
      ctx.logger.info({ rows: rows.length, documents: request.documents.length }, 'Verification run started');

      const comparisons = await this.comparator.compareAll(rows, request.documents, ctx);
      const verdicts = comparisons.flatMap((comparison) => comparison.verdicts);
      const warnings = comparisons.flatMap((comparison) => comparison.warnings);
      const report = buildReport(verdicts);

      const corrections: DocumentCorrection[] = [];
      for (const comparison of comparisons) {
        const corrected = await correctMasterFile(request.specification, comparison.verdicts);
        corrections.push({
          documentId: comparison.documentId,
          correctedSpreadsheet: corrected === request.specification ? null : corrected,
          correctedCells: comparison.verdicts.filter((v) => v.status === 'MISMATCH' && v.observedValue !== null).length,
        });
      }

      ctx.logger.info(
        {
          duration: Date.now() - startTime,
          fullyCompliant: report.summary.fullyCompliantCount,
          warnings: warnings.length,
        },
        'Verification run finished'
      );

      return { runId: ctx.runId, rows, verdicts, report, warnings, corrections };
    } finally {
      ctx.dispose();
    }
  }
}
