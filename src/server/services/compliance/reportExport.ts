/**
 * XLSX rendering of a ComplianceReport: a Summary sheet with per-document
 * and per-category tallies, and a Verdicts sheet with one row per verdict.
 */

import ExcelJS from 'exceljs';
import type { Fill } from 'exceljs';
import type { ComplianceReport, StatusCounts, VerdictStatus } from '../../types/compliance.js';

export interface ReportExportOptions {
  /** Written into the Summary sheet; defaults to now */
  generatedAt?: Date;
}

const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF4472C4' } };

const STATUS_FILLS: Record<VerdictStatus, Fill> = {
  MATCH: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFC6EFCE' } },
  MISMATCH: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFC7CE' } },
  NOT_FOUND: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFD9D9D9' } },
  ERROR: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFD9D9D9' } },
};

const COUNT_HEADERS = ['Total', 'Match', 'Mismatch', 'Not Found', 'Error'];

function countCells(counts: StatusCounts): number[] {
  return [counts.total, counts.match, counts.mismatch, counts.notFound, counts.error];
}

function styleHeader(row: ExcelJS.Row): void {
  row.font = { bold: true, color: { argb: 'FFFFFFFF' } };
  row.fill = HEADER_FILL;
  row.alignment = { horizontal: 'center', vertical: 'middle' };
  row.height = 20;
}

function createSummarySheet(workbook: ExcelJS.Workbook, report: ComplianceReport, generatedAt: Date): void {
  const sheet = workbook.addWorksheet('Summary');

  sheet.mergeCells('A1:G1');
  const titleCell = sheet.getCell('A1');
  titleCell.value = 'Compliance Verification Summary';
  titleCell.font = { size: 16, bold: true };
  titleCell.alignment = { horizontal: 'center', vertical: 'middle' };
  sheet.getRow(1).height = 25;

  sheet.addRow([]);
  sheet.addRow(['Generated', generatedAt.toISOString()]);
  sheet.addRow(['Documents', report.summary.documentCount]);
  sheet.addRow(['Fully compliant', report.summary.fullyCompliantCount]);
  sheet.addRow([]);

  styleHeader(sheet.addRow(['Document', 'Status', ...COUNT_HEADERS]));
  for (const document of report.documents) {
    const row = sheet.addRow([document.documentId, document.status, ...countCells(document.counts)]);
    row.getCell(2).fill = document.fullyCompliant ? STATUS_FILLS.MATCH : STATUS_FILLS.MISMATCH;
  }
  const totals = sheet.addRow(['All documents', '', ...countCells(report.summary.counts)]);
  totals.font = { bold: true };
  sheet.addRow([]);

  styleHeader(sheet.addRow(['Category', '', ...COUNT_HEADERS]));
  for (const { category, counts } of report.summary.byCategory) {
    sheet.addRow([category, '', ...countCells(counts)]);
  }

  sheet.columns = [{ width: 30 }, { width: 16 }, { width: 10 }, { width: 10 }, { width: 10 }, { width: 12 }, { width: 10 }];
}

function createVerdictsSheet(workbook: ExcelJS.Workbook, report: ComplianceReport): void {
  const sheet = workbook.addWorksheet('Verdicts');

  styleHeader(sheet.addRow(['Document', 'Category', 'Parameter', 'Expected', 'Observed', 'Status', 'Rationale']));

  let rowCount = 0;
  for (const document of report.documents) {
    for (const group of document.categories) {
      for (const verdict of group.verdicts) {
        const row = sheet.addRow([
          document.documentId,
          group.category,
          verdict.row.name,
          verdict.row.expectedValue ?? '',
          verdict.observedValue ?? '',
          verdict.status,
          verdict.rationale,
        ]);
        row.getCell(6).fill = STATUS_FILLS[verdict.status];
        row.getCell(7).alignment = { wrapText: true, vertical: 'top' };
        rowCount++;
      }
    }
  }

  sheet.columns = [
    { width: 30 }, // Document
    { width: 16 }, // Category
    { width: 30 }, // Parameter
    { width: 18 }, // Expected
    { width: 18 }, // Observed
    { width: 12 }, // Status
    { width: 60 }, // Rationale
  ];

  sheet.views = [{ state: 'frozen', ySplit: 1 }];
  sheet.autoFilter = { from: 'A1', to: `G${rowCount + 1}` };
}

export async function exportReportWorkbook(report: ComplianceReport, options: ReportExportOptions = {}): Promise<Buffer> {
  const generatedAt = options.generatedAt ?? new Date();
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'Compliance Verification';
  workbook.created = generatedAt;
  workbook.modified = generatedAt;

  createSummarySheet(workbook, report, generatedAt);
  createVerdictsSheet(workbook, report);

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
