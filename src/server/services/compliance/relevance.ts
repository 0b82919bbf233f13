/**
 * Context selection for long documents.
 *
 * When the extracted text and tables do not fit the prompt budget, the
 * document is cut into fragments (paragraphs and whole tables), each scored
 * by how often it mentions the parameter, its unit and its category
 * keywords. The best fragments are kept and emitted in document order.
 */

import type { ExtractedDocument, ExtractedTable, SpecificationRow } from '../../types/compliance.js';
import { countKeywordHits, getCategoryKeywords } from './categories.js';

export const TRUNCATION_MARKER = '[... content truncated ...]';

const PHRASE_WEIGHT = 5;
const TOKEN_WEIGHT = 3;
const UNIT_WEIGHT = 1;
const CATEGORY_WEIGHT = 1;

const STOPWORDS = new Set(['of', 'the', 'and', 'or', 'in', 'per', 'for', 'as', 'by', 'on', 'to', 'total']);

export interface SelectedContext {
  text: string;
  truncated: boolean;
}

export function renderTable(table: ExtractedTable): string {
  const lines = table.rows.map((row) => row.map((cell) => cell.trim()).join(' | '));
  return table.title ? [`Table: ${table.title}`, ...lines].join('\n') : lines.join('\n');
}

export function renderDocument(document: ExtractedDocument): string {
  const parts = [document.rawText.trim(), ...document.tables.map(renderTable)].filter((part) => part.length > 0);
  return parts.join('\n\n');
}

function nameTokens(name: string): string[] {
  const tokens = name
    .toLowerCase()
    .split(/[^a-z0-9µμ%]+/)
    .filter((token) => token.length >= 2 && !STOPWORDS.has(token));
  return [...new Set(tokens)];
}

export function scoreFragment(fragment: string, row: SpecificationRow): number {
  const phrase = row.name.trim().toLowerCase();
  let score = countKeywordHits(fragment, [phrase]) * PHRASE_WEIGHT;
  score += countKeywordHits(fragment, nameTokens(row.name)) * TOKEN_WEIGHT;
  if (row.unit) {
    score += countKeywordHits(fragment, [row.unit.toLowerCase()]) * UNIT_WEIGHT;
  }
  const keywords = getCategoryKeywords().get(row.category) ?? [];
  score += countKeywordHits(fragment, keywords) * CATEGORY_WEIGHT;
  return score;
}

function fragmentsOf(document: ExtractedDocument): string[] {
  const paragraphs = document.rawText
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
  return [...paragraphs, ...document.tables.map(renderTable).filter((table) => table.length > 0)];
}

/**
 * Document text for one parameter's prompt, at most `charLimit` characters
 * plus the truncation marker.
 */
export function selectContext(document: ExtractedDocument, row: SpecificationRow, charLimit: number): SelectedContext {
  const full = renderDocument(document);
  if (full.length <= charLimit) {
    return { text: full, truncated: false };
  }

  const fragments = fragmentsOf(document);
  const ranked = fragments
    .map((fragment, index) => ({ fragment, index, score: scoreFragment(fragment, row) }))
    .sort((a, b) => b.score - a.score || a.index - b.index);

  const chosen = new Map<number, string>();
  let used = 0;
  for (const { fragment, index } of ranked) {
    const separator = chosen.size > 0 ? 2 : 0;
    if (used + separator + fragment.length <= charLimit) {
      chosen.set(index, fragment);
      used += separator + fragment.length;
      continue;
    }
    if (chosen.size === 0) {
      // Best fragment alone is too large: keep its head
      chosen.set(index, fragment.slice(0, charLimit));
      used = charLimit;
    }
    break;
  }

  const text = [...chosen.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, fragment]) => fragment)
    .join('\n\n');
  return { text: `${text}\n${TRUNCATION_MARKER}`, truncated: true };
}
