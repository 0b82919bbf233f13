/**
 * Specification Loader
 *
 * Turns master spreadsheet bytes into an ordered list of SpecificationRow.
 * The header row is located by column aliases; `headerless` selects the
 * plain two-column layout (A = parameter, B = expected value).
 */

import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import type { ParameterCategory, SpecificationRow } from '../../types/compliance.js';
import { MalformedSpecificationError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import { cellValueToText } from './cellText.js';
import { inferCategory, parseCategory } from './categories.js';

export interface LoadOptions {
  /** Worksheet to read; defaults to the workbook's active sheet */
  sheetName?: string;
  /** No header row: column A holds names, column B expected values */
  headerless?: boolean;
}

const COLUMN_ROLES = ['name', 'expected', 'unit', 'category', 'tolerance'] as const;
type ColumnRole = (typeof COLUMN_ROLES)[number];

const HEADER_ALIASES: Record<ColumnRole, readonly string[]> = {
  name: [
    'parameter', 'parameters', 'parameter name', 'attribute', 'attribute name', 'name', 'field', 'field name',
    'test', 'test parameter', 'test item', 'characteristic', 'analyte', 'item',
  ],
  expected: [
    'expected', 'expected value', 'specification', 'specifications', 'spec', 'spec value', 'value', 'limit',
    'limits', 'acceptance criteria', 'requirement', 'target', 'master value',
  ],
  unit: ['unit', 'units', 'uom', 'unit of measure'],
  category: ['category', 'group', 'section', 'parameter category'],
  tolerance: ['tolerance', 'allowed deviation', 'deviation'],
};

/** The header must appear within this many rows of the top */
const HEADER_SEARCH_DEPTH = 10;

type ColumnMap = Partial<Record<ColumnRole, number>> & { name: number; expected: number };

function normalizeHeader(text: string): string {
  return text
    .toLowerCase()
    .replace(/\(.*?\)/g, '')
    .replace(/[:*]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function roleOf(header: string): ColumnRole | undefined {
  const normalized = normalizeHeader(header);
  if (!normalized) {
    return undefined;
  }
  return COLUMN_ROLES.find((role) => HEADER_ALIASES[role].includes(normalized));
}

function readHeader(sheet: Worksheet, rowNumber: number): Partial<Record<ColumnRole, number>> {
  const roles: Partial<Record<ColumnRole, number>> = {};
  const row = sheet.getRow(rowNumber);
  for (let column = 1; column <= sheet.columnCount; column++) {
    const role = roleOf(cellValueToText(row.getCell(column).value));
    if (role && roles[role] === undefined) {
      roles[role] = column;
    }
  }
  return roles;
}

function locateHeader(sheet: Worksheet): { headerRow: number; columns: ColumnMap } {
  const depth = Math.min(HEADER_SEARCH_DEPTH, sheet.rowCount);
  let partial: { row: number; found: ColumnRole[] } | undefined;

  for (let rowNumber = 1; rowNumber <= depth; rowNumber++) {
    const roles = readHeader(sheet, rowNumber);
    const { name, expected } = roles;
    if (name !== undefined && expected !== undefined) {
      return { headerRow: rowNumber, columns: { ...roles, name, expected } };
    }
    if (!partial && (name !== undefined || expected !== undefined)) {
      partial = { row: rowNumber, found: COLUMN_ROLES.filter((role) => roles[role] !== undefined) };
    }
  }

  if (partial) {
    const missing = partial.found.includes('name') ? 'expected value' : 'parameter name';
    throw new MalformedSpecificationError(`Master sheet "${sheet.name}" has no ${missing} column`, {
      sheet: sheet.name,
      headerRow: partial.row,
      found: partial.found,
    });
  }
  throw new MalformedSpecificationError(
    `Master sheet "${sheet.name}" has no header row with parameter name and expected value columns`,
    { sheet: sheet.name, searchedRows: depth }
  );
}

function selectSheet(workbook: ExcelJS.Workbook, sheetName?: string): Worksheet {
  if (sheetName) {
    const named = workbook.getWorksheet(sheetName);
    if (!named) {
      throw new MalformedSpecificationError(`Worksheet "${sheetName}" not found in master file`, { sheetName });
    }
    return named;
  }
  const activeTab = workbook.views?.[0]?.activeTab ?? 0;
  const sheet = workbook.worksheets[activeTab] ?? workbook.worksheets[0];
  if (!sheet) {
    throw new MalformedSpecificationError('Master file contains no worksheets');
  }
  return sheet;
}

/**
 * Stands in for document dates the file does not carry, instead of the load time
 */
export const WORKBOOK_EPOCH = new Date(Date.UTC(2000, 0, 1));

export async function readWorkbook(bytes: Buffer): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = WORKBOOK_EPOCH;
  workbook.modified = WORKBOOK_EPOCH;
  try {
    await workbook.xlsx.load(bytes);
  } catch (error) {
    throw new MalformedSpecificationError('Master file is not a readable XLSX workbook', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (!(workbook.created instanceof Date)) {
    workbook.created = WORKBOOK_EPOCH;
  }
  if (!(workbook.modified instanceof Date)) {
    workbook.modified = WORKBOOK_EPOCH;
  }
  return workbook;
}

function optionalText(sheet: Worksheet, rowNumber: number, column: number | undefined): string | undefined {
  if (column === undefined) {
    return undefined;
  }
  const text = cellValueToText(sheet.getRow(rowNumber).getCell(column).value);
  return text || undefined;
}

/**
 * Parse the master spreadsheet into specification rows, in sheet order.
 *
 * @throws MalformedSpecificationError when the workbook, sheet or required
 * columns are missing, or a row carries values without a parameter name
 */
export async function loadSpecification(bytes: Buffer, options: LoadOptions = {}): Promise<SpecificationRow[]> {
  const workbook = await readWorkbook(bytes);
  const sheet = selectSheet(workbook, options.sheetName);

  const { headerRow, columns }: { headerRow: number; columns: ColumnMap } = options.headerless
    ? { headerRow: 0, columns: { name: 1, expected: 2 } }
    : locateHeader(sheet);

  const rows: SpecificationRow[] = [];
  for (let rowNumber = headerRow + 1; rowNumber <= sheet.rowCount; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    const name = cellValueToText(row.getCell(columns.name).value);
    const expectedCell = row.getCell(columns.expected);
    const expectedText = cellValueToText(expectedCell.value);
    const unit = optionalText(sheet, rowNumber, columns.unit);
    const categoryText = optionalText(sheet, rowNumber, columns.category);
    const tolerance = optionalText(sheet, rowNumber, columns.tolerance);

    if (!name) {
      if (expectedText || unit || categoryText || tolerance) {
        throw new MalformedSpecificationError(`Row ${rowNumber} of "${sheet.name}" has values but no parameter name`, {
          sheet: sheet.name,
          row: rowNumber,
        });
      }
      continue;
    }

    const category: ParameterCategory = (categoryText && parseCategory(categoryText)) || inferCategory(name);
    rows.push({
      index: rows.length,
      name,
      expectedValue: expectedText || null,
      ...(unit && { unit }),
      ...(tolerance && { tolerance }),
      category,
      sourceCell: {
        sheet: sheet.name,
        row: rowNumber,
        column: columns.expected,
        address: expectedCell.address,
      },
    });
  }

  logger.debug(
    { sheet: sheet.name, headerRow, rows: rows.length, informational: rows.filter((r) => r.expectedValue === null).length },
    'Loaded master specification'
  );
  return rows;
}
