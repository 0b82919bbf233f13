import { describe, it, expect } from 'vitest';
import {
  TRUNCATION_MARKER,
  renderDocument,
  scoreFragment,
  selectContext,
} from '../../src/server/services/compliance/relevance.js';
import type { ExtractedDocument } from '../../src/server/types/compliance.js';
import { specRow } from './helpers.js';

const lead = specRow(0, 'Lead', '<0.05', 'Safety');

describe('renderDocument', () => {
  it('appends tables after the text, one row per line', () => {
    const document: ExtractedDocument = {
      documentId: 'coa-1',
      rawText: 'Lead: 0.01',
      tables: [{ title: 'Metals', rows: [['Analyte', 'Result'], ['Lead', '0.01']] }],
    };

    expect(renderDocument(document)).toBe('Lead: 0.01\n\nTable: Metals\nAnalyte | Result\nLead | 0.01');
  });
});

describe('selectContext', () => {
  it('returns the whole document when it fits', () => {
    const document: ExtractedDocument = { documentId: 'coa-1', rawText: 'Lead (Pb): 0.08 mg/kg', tables: [] };

    expect(selectContext(document, lead, 1000)).toEqual({ text: 'Lead (Pb): 0.08 mg/kg', truncated: false });
  });

  it('keeps the most relevant fragment and marks the cut', () => {
    const document: ExtractedDocument = {
      documentId: 'coa-1',
      rawText: [
        'Product description paragraph about vanilla flavour.',
        'Heavy metals\nLead (Pb): 0.08 mg/kg',
        'Storage conditions: keep cool and dry.',
      ].join('\n\n'),
      tables: [],
    };

    expect(selectContext(document, lead, 40)).toEqual({
      text: `Heavy metals\nLead (Pb): 0.08 mg/kg\n${TRUNCATION_MARKER}`,
      truncated: true,
    });
  });

  it('emits kept fragments in document order', () => {
    const document: ExtractedDocument = {
      documentId: 'coa-1',
      rawText: [
        'Lead limit note.',
        'Packaging is a fibre drum with an inner liner and a tamper seal.',
        'Lead: 0.08, lead confirmed',
      ].join('\n\n'),
      tables: [],
    };

    expect(selectContext(document, lead, 50).text).toBe(
      `Lead limit note.\n\nLead: 0.08, lead confirmed\n${TRUNCATION_MARKER}`
    );
  });

  it('considers tables as whole fragments', () => {
    const document: ExtractedDocument = {
      documentId: 'coa-1',
      rawText: 'Packaging is a fibre drum with an inner liner and a tamper seal.',
      tables: [{ rows: [['Lead', '0.08']] }],
    };

    expect(selectContext(document, lead, 20).text).toBe(`Lead | 0.08\n${TRUNCATION_MARKER}`);
  });
});

describe('scoreFragment', () => {
  it('weights the full parameter name above single tokens', () => {
    const row = specRow(0, 'Total Plate Count', 'NMT 10000', 'Microbiological');

    expect(scoreFragment('Total plate count: 200 cfu/g', row)).toBeGreaterThan(scoreFragment('Count of pallets: 2', row));
  });
});
