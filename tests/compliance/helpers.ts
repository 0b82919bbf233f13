import ExcelJS from 'exceljs';
import type { Cell } from 'exceljs';
import type { LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse } from '../../src/server/services/llm/LLMProvider.js';
import type { BackoffPolicy } from '../../src/server/services/compliance/ReasoningClient.js';
import type { CellRef, ExtractedDocument, ParameterCategory, SpecificationRow } from '../../src/server/types/compliance.js';

export type Reply = (prompt: string, call: number, options?: LLMGenerateOptions) => Promise<string> | string;

/**
 * In-process stand-in for the reasoning service
 */
export class FakeProvider implements LLMProvider {
  calls = 0;
  readonly messages: LLMMessage[][] = [];

  constructor(private readonly reply: Reply) {}

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    this.calls++;
    this.messages.push(messages);
    const prompt = messages[messages.length - 1]?.content ?? '';
    const content = await this.reply(prompt, this.calls, options);
    return { content, model: 'fake-model' };
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  getName(): string {
    return 'fake';
  }
}

/** No waiting between attempts */
export const instantPolicy: BackoffPolicy = {
  maxAttempts: 1,
  baseDelayMs: 0,
  maxDelayMs: 0,
  multiplier: 2,
  jitterRatio: 0,
};

export function parameterOf(prompt: string): string {
  return prompt.match(/^Parameter: (.*)$/m)?.[1] ?? '';
}

export function judgment(fields: {
  status: string;
  observed_value?: string | null;
  observed_unit?: string | null;
  rationale?: string;
  confidence?: number;
  uncertain?: boolean;
}): string {
  return JSON.stringify({ confidence: 0.95, uncertain: false, rationale: '', ...fields });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function buildWorkbook(
  rows: (string | number | null)[][],
  sheetName = 'Spec'
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  for (const row of rows) {
    sheet.addRow(row);
  }
  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}

export async function loadWorkbook(bytes: Buffer): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(bytes);
  return workbook;
}

export function fillColor(cell: Cell): string | undefined {
  const fill = cell.fill;
  if (fill?.type !== 'pattern') {
    return undefined;
  }
  return fill.fgColor?.argb;
}

export function noteText(cell: Cell): string {
  const note = cell.note;
  if (note === undefined) {
    return '';
  }
  if (typeof note === 'string') {
    return note;
  }
  return (note.texts ?? []).map((part) => part.text).join('');
}

export function specRow(
  index: number,
  name: string,
  expectedValue: string | null,
  category: ParameterCategory = 'General',
  sourceCell?: Partial<CellRef>
): SpecificationRow {
  const row = index + 2;
  return {
    index,
    name,
    expectedValue,
    category,
    sourceCell: { sheet: 'Spec', row, column: 2, address: `B${row}`, ...sourceCell },
  };
}

export function document(documentId: string, rawText: string): ExtractedDocument {
  return { documentId, rawText, tables: [] };
}
