/**
 * Master-File Corrector
 *
 * Writes observed values back into the master spreadsheet for every
 * MISMATCH verdict: the cell gets the observed value, a yellow fill and a
 * note with the rationale and the value it replaced. No other cell changes.
 */

import ExcelJS from 'exceljs';
import type { Cell, Comment, Fill } from 'exceljs';
import JSZip from 'jszip';
import type { Verdict } from '../../types/compliance.js';
import { DuplicateCellTargetError, MalformedSpecificationError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { cellValueToText } from './cellText.js';
import { WORKBOOK_EPOCH, readWorkbook } from './SpecificationLoader.js';

export const CORRECTION_AUTHOR = 'Compliance Verification';

export const CORRECTION_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFFF00' } };

const PLAIN_NUMBER = /^[+-]?\d+(?:\.\d+)?$/;

export interface Correction {
  sheet: string;
  address: string;
  parameter: string;
  previousValue: string;
  newValue: string | number;
}

function isWritable(verdict: Verdict): verdict is Verdict & { observedValue: string } {
  return verdict.status === 'MISMATCH' && verdict.observedValue !== null;
}

/**
 * Note text without the author line
 */
export function correctionNoteText(rationale: string, previousValue: string): string {
  return `${rationale}\n\nOriginal value: ${previousValue || '(empty)'}`;
}

function buildNote(rationale: string, previousValue: string): Comment {
  // Excel shows the author as a bold first line
  return {
    texts: [
      { font: { bold: true }, text: `${CORRECTION_AUTHOR}:\n` },
      { text: correctionNoteText(rationale, previousValue) },
    ],
  };
}

function newValueFor(cell: Cell, observed: string): string | number {
  if (typeof cell.value === 'number' && PLAIN_NUMBER.test(observed.trim())) {
    return Number(observed.trim());
  }
  return observed;
}

function assertDistinctTargets(verdicts: readonly Verdict[]): void {
  const targets = new Map<string, string[]>();
  for (const verdict of verdicts.filter((candidate) => candidate.status === 'MISMATCH')) {
    const { sheet, address } = verdict.row.sourceCell;
    const key = `${sheet}!${address}`;
    const parameters = targets.get(key) ?? [];
    parameters.push(verdict.row.name);
    targets.set(key, parameters);
    if (parameters.length > 1) {
      throw new DuplicateCellTargetError(sheet, address, parameters);
    }
  }
}

/**
 * Apply corrections to a loaded workbook in place.
 *
 * @throws DuplicateCellTargetError when two MISMATCH verdicts target one cell
 * @throws MalformedSpecificationError when a target sheet does not exist
 */
export function applyCorrections(workbook: ExcelJS.Workbook, verdicts: readonly Verdict[]): Correction[] {
  assertDistinctTargets(verdicts);

  const corrections: Correction[] = [];
  for (const verdict of verdicts.filter(isWritable)) {
    const { sheet: sheetName, address } = verdict.row.sourceCell;
    const sheet = workbook.getWorksheet(sheetName);
    if (!sheet) {
      throw new MalformedSpecificationError(`Worksheet "${sheetName}" not found in master file`, {
        sheetName,
        parameter: verdict.row.name,
      });
    }

    const cell = sheet.getCell(address);
    const previousValue = cellValueToText(cell.value);
    const newValue = newValueFor(cell, verdict.observedValue);

    cell.value = newValue;
    // Fresh style object: loaded cells may share one with their neighbours
    cell.style = { ...cell.style, fill: CORRECTION_FILL };
    cell.note = buildNote(verdict.rationale, previousValue);

    corrections.push({ sheet: sheetName, address, parameter: verdict.row.name, previousValue, newValue });
  }
  return corrections;
}

/**
 * Re-pack an XLSX archive with every entry dated WORKBOOK_EPOCH.
 * exceljs stamps entries with the time of writing.
 */
async function pinEntryDates(xlsx: Buffer): Promise<Buffer> {
  const zip = await JSZip.loadAsync(xlsx);
  const entries: Array<[string, JSZip.JSZipObject]> = [];
  zip.forEach((path, entry) => {
    if (!entry.dir) {
      entries.push([path, entry]);
    }
  });
  for (const [path, entry] of entries) {
    zip.file(path, await entry.async('nodebuffer'), { date: WORKBOOK_EPOCH });
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/**
 * Corrected copy of the master spreadsheet. The original bytes come back
 * untouched when no verdict writes a cell; otherwise equal inputs give
 * equal bytes.
 *
 * @throws DuplicateCellTargetError when two MISMATCH verdicts target one cell
 */
export async function correctMasterFile(originalBytes: Buffer, verdicts: readonly Verdict[]): Promise<Buffer> {
  assertDistinctTargets(verdicts);
  if (!verdicts.some(isWritable)) {
    return originalBytes;
  }

  const workbook = await readWorkbook(originalBytes);
  const corrections = applyCorrections(workbook, verdicts);

  logger.info({ corrections: corrections.length }, 'Corrected master file');
  const buffer = await workbook.xlsx.writeBuffer();
  return pinEntryDates(Buffer.from(buffer));
}
