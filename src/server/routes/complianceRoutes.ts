import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../utils/errorHandling.js';
import { validate } from '../middleware/validation.js';
import { logger } from '../utils/logger.js';
import type { ComplianceVerificationService } from '../services/compliance/ComplianceVerificationService.js';
import { reportToJSON } from '../services/compliance/ComplianceReportBuilder.js';
import { exportReportWorkbook } from '../services/compliance/reportExport.js';

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

const tableSchema = z.object({
    title: z.string().optional(),
    rows: z.array(z.array(z.string())),
});

const documentSchema = z.object({
    documentId: z.string().trim().min(1, 'documentId cannot be empty'),
    rawText: z.string().default(''),
    tables: z.array(tableSchema).default([]),
});

export const verifyRequestSchema = z.object({
    specification: z.string().regex(BASE64, 'specification must be base64-encoded XLSX'),
    documents: z.array(documentSchema).min(1, 'At least one document is required'),
    options: z
        .object({
            sheetName: z.string().min(1).optional(),
            headerless: z.boolean().optional(),
            concurrency: z.number().int().min(1).max(32).optional(),
            timeoutMs: z.number().int().min(0).optional(),
            throttleAbortThreshold: z.number().int().min(1).optional(),
            contextCharLimit: z.number().int().min(500).optional(),
            minimumConfidence: z.number().min(0).max(1).optional(),
        })
        .default({}),
});

type VerifyRequestBody = z.output<typeof verifyRequestSchema>;

export function createComplianceRoutes(service: ComplianceVerificationService): Router {
    const router = Router();

    /**
     * POST /api/compliance/verify
     * Verify extracted documents against a master specification workbook.
     * Returns the report, warnings, the report workbook and one corrected
     * master file per document (base64, null when nothing changed).
     */
    router.post(
        '/verify',
        validate({ body: verifyRequestSchema }),
        asyncHandler(async (req: Request, res: Response) => {
            // Parsed and defaulted by validate() above
            const { specification, documents, options }: VerifyRequestBody = req.body;

            // Client went away: stop dispatching and drain
            const disconnect = new AbortController();
            res.on('close', () => {
                if (!res.writableFinished) {
                    disconnect.abort();
                }
            });

            const result = await service.verify({
                specification: Buffer.from(specification, 'base64'),
                documents,
                load: { sheetName: options.sheetName, headerless: options.headerless },
                run: {
                    concurrency: options.concurrency,
                    timeoutMs: options.timeoutMs,
                    throttleAbortThreshold: options.throttleAbortThreshold,
                    contextCharLimit: options.contextCharLimit,
                    minimumConfidence: options.minimumConfidence,
                    signal: disconnect.signal,
                },
            });

            const reportWorkbook = await exportReportWorkbook(result.report);
            logger.info(
                { runId: result.runId, verdicts: result.verdicts.length, warnings: result.warnings.length },
                'Compliance verification completed'
            );

            res.json({
                runId: result.runId,
                report: reportToJSON(result.report),
                warnings: result.warnings,
                corrections: result.corrections.map((correction) => ({
                    documentId: correction.documentId,
                    correctedCells: correction.correctedCells,
                    correctedSpreadsheet: correction.correctedSpreadsheet?.toString('base64') ?? null,
                })),
                reportWorkbook: reportWorkbook.toString('base64'),
            });
        })
    );

    return router;
}
