import type { CellValue } from 'exceljs';

function formatDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

/**
 * Plain-text rendering of an exceljs cell value: rich text is flattened,
 * formulas yield their cached result, dates become YYYY-MM-DD.
 */
export function cellValueToText(value: CellValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return formatDate(value);
  }
  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('').trim();
  }
  if ('hyperlink' in value) {
    return String(value.text).trim();
  }
  if ('formula' in value || 'sharedFormula' in value) {
    const result = value.result;
    if (result === undefined || result === null) {
      return '';
    }
    if (typeof result === 'object' && !(result instanceof Date)) {
      return result.error;
    }
    return cellValueToText(result);
  }
  if ('error' in value) {
    return value.error;
  }
  return '';
}
