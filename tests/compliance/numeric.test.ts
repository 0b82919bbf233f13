import { describe, it, expect } from 'vitest';
import { evaluateNumeric, parseConstraint, parseObservation } from '../../src/server/services/compliance/numeric.js';

describe('evaluateNumeric', () => {
  describe('strict upper bound <0.05', () => {
    it('accepts a reading below the limit', () => {
      expect(evaluateNumeric('<0.05', '0.04')).toEqual({
        satisfied: true,
        rationale: 'observed 0.04 is within limit 0.05',
      });
    });

    it('rejects a reading equal to the limit', () => {
      expect(evaluateNumeric('<0.05', '0.05')).toEqual({
        satisfied: false,
        rationale: 'observed 0.05 is not below limit 0.05',
      });
    });

    it('rejects a reading above the limit', () => {
      expect(evaluateNumeric('<0.05', '0.10')).toEqual({
        satisfied: false,
        rationale: 'observed 0.10 exceeds limit 0.05',
      });
      expect(evaluateNumeric('<0.05', '0.08')).toEqual({
        satisfied: false,
        rationale: 'observed 0.08 exceeds limit 0.05',
      });
    });
  });

  it('accepts a reading equal to an inclusive limit', () => {
    expect(evaluateNumeric('≤0.05', '0.05')?.satisfied).toBe(true);
    expect(evaluateNumeric('NMT 10', '10')?.satisfied).toBe(true);
    expect(evaluateNumeric('NMT 10', '12')).toEqual({ satisfied: false, rationale: 'observed 12 exceeds limit 10' });
  });

  it('checks lower bounds', () => {
    expect(evaluateNumeric('>= 95', '96')).toEqual({ satisfied: true, rationale: 'observed 96 meets minimum 95' });
    expect(evaluateNumeric('>95', '95')).toEqual({ satisfied: false, rationale: 'observed 95 is not above minimum 95' });
    expect(evaluateNumeric('98 min', '97.5')).toEqual({
      satisfied: false,
      rationale: 'observed 97.5 is below minimum 98',
    });
  });

  it('checks ranges', () => {
    expect(evaluateNumeric('5.0 - 7.5', '6')).toEqual({ satisfied: true, rationale: 'observed 6 is within range 5.0-7.5' });
    expect(evaluateNumeric('5.0 - 7.5', '8')).toEqual({ satisfied: false, rationale: 'observed 8 is outside range 5.0-7.5' });
    expect(evaluateNumeric('12 ± 2', '15')).toEqual({ satisfied: false, rationale: 'observed 15 is outside range 10-14' });
  });

  it('checks plain equality', () => {
    expect(evaluateNumeric('12.5', '12.50')).toEqual({ satisfied: true, rationale: 'observed 12.50 equals expected 12.5' });
    expect(evaluateNumeric('12.5', '13')).toEqual({ satisfied: false, rationale: 'observed 13 differs from expected 12.5' });
  });

  it('treats a below-detection reading as compliant with a higher upper bound', () => {
    expect(evaluateNumeric('<0.05', '<0.01')).toEqual({ satisfied: true, rationale: 'observed <0.01 is within limit 0.05' });
    expect(evaluateNumeric('<0.05', '<0.1')).toEqual({
      satisfied: false,
      rationale: 'observed <0.1 cannot confirm limit 0.05',
    });
    expect(evaluateNumeric('<0.05', 'ND')).toEqual({
      satisfied: true,
      rationale: 'observed not detected, within limit 0.05',
    });
  });

  it('appends a unit mismatch instead of converting', () => {
    expect(evaluateNumeric('<0.05 mg/kg', '0.04 ppm')).toEqual({
      satisfied: false,
      rationale: 'observed 0.04 is within limit 0.05; unit mismatch: expected mg/kg, observed ppm',
    });
  });

  it('uses the unit column and the separately reported unit', () => {
    expect(evaluateNumeric('<0.05', '0.04', 'mg/kg', 'mg/kg')?.satisfied).toBe(true);
    expect(evaluateNumeric('<10', '5', 'µg/kg', 'ug/kg')?.satisfied).toBe(true);
    expect(evaluateNumeric('<10', '5', 'mg/kg', 'g/kg')?.satisfied).toBe(false);
  });

  it('checks limits expressed per 100 g and per 10 g', () => {
    expect(evaluateNumeric('NMT 5 mg/100g', '6 mg/100g')).toEqual({
      satisfied: false,
      rationale: 'observed 6 exceeds limit 5',
    });
    expect(evaluateNumeric('<10 cfu/10g', '3 cfu/10g')).toEqual({
      satisfied: true,
      rationale: 'observed 3 is within limit 10',
    });
    expect(evaluateNumeric('NMT 5 mg/100g', '6', undefined, 'mg/100g')?.satisfied).toBe(false);
    expect(evaluateNumeric('NMT 5 mg/100g', '4 mg/10g')).toEqual({
      satisfied: false,
      rationale: 'observed 4 is within limit 5; unit mismatch: expected mg/100g, observed mg/10g',
    });
  });

  it('returns null for text values', () => {
    expect(evaluateNumeric('Vanilla Extract', 'Vanilla Extract')).toBeNull();
    expect(evaluateNumeric('<0.05', 'see attached')).toBeNull();
  });
});

describe('parseConstraint', () => {
  it('reads thousands separators and units', () => {
    expect(parseConstraint('NMT 10,000 cfu/g')).toEqual({
      kind: 'upper',
      limit: 10000,
      raw: '10000',
      inclusive: true,
      unit: 'cfu/g',
    });
  });

  it('keeps digits that belong to the unit', () => {
    expect(parseConstraint('Max 1,700 kJ/100 g')).toEqual({
      kind: 'upper',
      limit: 1700,
      raw: '1700',
      inclusive: true,
      unit: 'kj/100 g',
    });
  });
});

describe('parseObservation', () => {
  it('recognizes not-detected wordings', () => {
    expect(parseObservation('Not Detected')).toEqual({ kind: 'notDetected', raw: 'Not Detected' });
    expect(parseObservation('absent')?.kind).toBe('notDetected');
  });

  it('reads a unit with a per-quantity suffix', () => {
    expect(parseObservation('6 mg/100g')).toEqual({ kind: 'value', value: 6, raw: '6', unit: 'mg/100g' });
  });

  it('does not read a second number as a unit', () => {
    expect(parseObservation('5 to 10')).toBeNull();
  });
});
