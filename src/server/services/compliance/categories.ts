/**
 * Parameter categories: parsing the master file's Category column and
 * inferring a category from the parameter name when the column is absent.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { PARAMETER_CATEGORIES, type ParameterCategory } from '../../types/compliance.js';

const keywordFileSchema = z.record(z.string(), z.array(z.string().min(1)));

const KEYWORD_FILE = new URL('../../../../data/category-keywords.json', import.meta.url);

let keywordCache: ReadonlyMap<ParameterCategory, readonly string[]> | null = null;

/**
 * Keyword lists per category, in PARAMETER_CATEGORIES order. General has none.
 */
export function getCategoryKeywords(): ReadonlyMap<ParameterCategory, readonly string[]> {
  if (keywordCache) {
    return keywordCache;
  }
  const parsed = keywordFileSchema.parse(JSON.parse(readFileSync(KEYWORD_FILE, 'utf8')));
  const map = new Map<ParameterCategory, readonly string[]>();
  for (const category of PARAMETER_CATEGORIES) {
    map.set(category, (parsed[category] ?? []).map((keyword) => keyword.toLowerCase()));
  }
  keywordCache = map;
  return map;
}

const CATEGORY_ALIASES: Record<string, ParameterCategory> = {
  nutrition: 'Nutrient',
  nutritional: 'Nutrient',
  nutrients: 'Nutrient',
  diet: 'Dietary',
  allergens: 'Allergen',
  allergy: 'Allergen',
  'genetically modified': 'GMO',
  contaminants: 'Safety',
  'heavy metals': 'Safety',
  'physical/chemical': 'Composition',
  'physico-chemical': 'Composition',
  physicochemical: 'Composition',
  chemical: 'Composition',
  physical: 'Composition',
  microbiology: 'Microbiological',
  micro: 'Microbiological',
  microbial: 'Microbiological',
  regulation: 'Regulatory',
  regulatory: 'Regulatory',
  other: 'General',
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Number of category keywords appearing as whole words or phrases in text
 */
export function countKeywordHits(text: string, keywords: readonly string[]): number {
  const haystack = text.toLowerCase();
  let hits = 0;
  for (const keyword of keywords) {
    const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword)}(?=[^a-z0-9]|$)`, 'g');
    hits += haystack.match(pattern)?.length ?? 0;
  }
  return hits;
}

/**
 * Map a free-text category cell onto a known category, or undefined
 */
export function parseCategory(value: string): ParameterCategory | undefined {
  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  const direct = PARAMETER_CATEGORIES.find((category) => category.toLowerCase() === normalized);
  return direct ?? CATEGORY_ALIASES[normalized];
}

/**
 * Category whose keywords hit the parameter name most often; ties go to the
 * earlier category, no hits means General.
 */
export function inferCategory(parameterName: string): ParameterCategory {
  let best: ParameterCategory = 'General';
  let bestHits = 0;
  for (const [category, keywords] of getCategoryKeywords()) {
    const hits = countKeywordHits(parameterName, keywords);
    if (hits > bestHits) {
      best = category;
      bestHits = hits;
    }
  }
  return best;
}
