/**
 * Inequality-aware comparison of numeric specification values.
 *
 * Expected values such as "<0.05", "NMT 10", "5.0 - 7.5", "12 ± 2" or "0.3"
 * become constraints; observed values such as "0.08", "<0.01" or
 * "not detected" are checked against them. Anything that does not parse as
 * one of these shapes returns null and the textual judgment stands.
 * Units are compared as written and never converted.
 */

export type Constraint =
  | { kind: 'upper'; limit: number; raw: string; inclusive: boolean; unit?: string }
  | { kind: 'lower'; limit: number; raw: string; inclusive: boolean; unit?: string }
  | { kind: 'range'; min: number; max: number; raw: string; unit?: string }
  | { kind: 'equal'; value: number; raw: string; unit?: string };

export type Observation =
  | { kind: 'value'; value: number; raw: string; unit?: string }
  | { kind: 'below'; value: number; raw: string; unit?: string }
  | { kind: 'notDetected'; raw: string };

export interface NumericOutcome {
  satisfied: boolean;
  rationale: string;
}

const NUMBER = '([+-]?\\d+(?:\\.\\d+)?)';
// Digits may appear inside a unit (mg/100g) but never as a separate token
const UNIT = '([^\\d\\s+\\-–—~±<>=](?:[^\\d]|(?<!\\s)\\d)*)?';

const UPPER_INCLUSIVE = ['<=', '=<', '≤', '⩽', 'max', 'max.', 'maximum', 'nmt', 'not more than', 'up to', 'less than or equal to'];
const UPPER_STRICT = ['<', 'less than', 'below'];
const LOWER_INCLUSIVE = ['>=', '=>', '≥', '⩾', 'min', 'min.', 'minimum', 'nlt', 'not less than', 'at least'];
const LOWER_STRICT = ['>', 'more than', 'greater than', 'above'];

const NOT_DETECTED = new Set(['nd', 'n.d.', 'not detected', 'none detected', 'absent', 'bdl', 'below detection limit', '<lod', '<loq']);

function escape(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function prefixPattern(prefixes: string[]): RegExp {
  // Longest first so "<=" wins over "<"
  const alternatives = [...prefixes].sort((a, b) => b.length - a.length).map(escape).join('|');
  return new RegExp(`^(?:${alternatives})\\s*${NUMBER}\\s*${UNIT}$`);
}

const UPPER_INCLUSIVE_RE = prefixPattern(UPPER_INCLUSIVE);
const UPPER_STRICT_RE = prefixPattern(UPPER_STRICT);
const LOWER_INCLUSIVE_RE = prefixPattern(LOWER_INCLUSIVE);
const LOWER_STRICT_RE = prefixPattern(LOWER_STRICT);
const SUFFIX_MAX_RE = new RegExp(`^${NUMBER}\\s*${UNIT}\\s+(?:max\\.?|maximum)$`);
const SUFFIX_MIN_RE = new RegExp(`^${NUMBER}\\s*${UNIT}\\s+(?:min\\.?|minimum)$`);
const RANGE_RE = new RegExp(`^${NUMBER}\\s*(?:-|–|—|to|~)\\s*${NUMBER}\\s*${UNIT}$`);
const PLUS_MINUS_RE = new RegExp(`^${NUMBER}\\s*(?:±|\\+/-|\\+-)\\s*${NUMBER}\\s*${UNIT}$`);
const PLAIN_RE = new RegExp(`^${NUMBER}\\s*${UNIT}$`);

function normalize(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/(\d),(\d{3})(?!\d)/g, '$1$2')
    .replace(/\s+/g, ' ');
}

function unitOf(match: string | undefined): string | undefined {
  const unit = match?.trim();
  return unit ? unit : undefined;
}

function formatNumber(value: number): string {
  return String(Number(value.toPrecision(12)));
}

/**
 * Parse an expected value into a numeric constraint, or null when it is not numeric
 */
export function parseConstraint(text: string): Constraint | null {
  const value = normalize(text);
  let match: RegExpMatchArray | null;

  if ((match = value.match(UPPER_INCLUSIVE_RE)) || (match = value.match(SUFFIX_MAX_RE))) {
    return { kind: 'upper', limit: Number(match[1]), raw: match[1], inclusive: true, unit: unitOf(match[2]) };
  }
  if ((match = value.match(UPPER_STRICT_RE))) {
    return { kind: 'upper', limit: Number(match[1]), raw: match[1], inclusive: false, unit: unitOf(match[2]) };
  }
  if ((match = value.match(LOWER_INCLUSIVE_RE)) || (match = value.match(SUFFIX_MIN_RE))) {
    return { kind: 'lower', limit: Number(match[1]), raw: match[1], inclusive: true, unit: unitOf(match[2]) };
  }
  if ((match = value.match(LOWER_STRICT_RE))) {
    return { kind: 'lower', limit: Number(match[1]), raw: match[1], inclusive: false, unit: unitOf(match[2]) };
  }
  if ((match = value.match(PLUS_MINUS_RE))) {
    const centre = Number(match[1]);
    const spread = Math.abs(Number(match[2]));
    return {
      kind: 'range',
      min: centre - spread,
      max: centre + spread,
      raw: `${formatNumber(centre - spread)}-${formatNumber(centre + spread)}`,
      unit: unitOf(match[3]),
    };
  }
  if ((match = value.match(RANGE_RE))) {
    const a = Number(match[1]);
    const b = Number(match[2]);
    return { kind: 'range', min: Math.min(a, b), max: Math.max(a, b), raw: `${match[1]}-${match[2]}`, unit: unitOf(match[3]) };
  }
  if ((match = value.match(PLAIN_RE))) {
    return { kind: 'equal', value: Number(match[1]), raw: match[1], unit: unitOf(match[2]) };
  }
  return null;
}

/**
 * Parse an observed value, or null when it is not a single numeric reading
 */
export function parseObservation(text: string): Observation | null {
  const value = normalize(text);
  if (NOT_DETECTED.has(value)) {
    return { kind: 'notDetected', raw: text.trim() };
  }
  let match: RegExpMatchArray | null;
  if ((match = value.match(UPPER_STRICT_RE)) || (match = value.match(UPPER_INCLUSIVE_RE))) {
    return { kind: 'below', value: Number(match[1]), raw: `<${match[1]}`, unit: unitOf(match[2]) };
  }
  if ((match = value.match(PLAIN_RE))) {
    return { kind: 'value', value: Number(match[1]), raw: match[1], unit: unitOf(match[2]) };
  }
  return null;
}

function canonicalUnit(unit: string): string {
  return unit.toLowerCase().replace(/\s+/g, '').replace(/[µμ]/g, 'u');
}

const EPSILON = 1e-9;

function judgeValue(constraint: Constraint, observed: number, raw: string): NumericOutcome {
  switch (constraint.kind) {
    case 'upper': {
      const limit = constraint.limit;
      if (observed > limit + EPSILON) {
        return { satisfied: false, rationale: `observed ${raw} exceeds limit ${constraint.raw}` };
      }
      if (!constraint.inclusive && Math.abs(observed - limit) <= EPSILON) {
        return { satisfied: false, rationale: `observed ${raw} is not below limit ${constraint.raw}` };
      }
      return { satisfied: true, rationale: `observed ${raw} is within limit ${constraint.raw}` };
    }
    case 'lower': {
      const limit = constraint.limit;
      if (observed < limit - EPSILON) {
        return { satisfied: false, rationale: `observed ${raw} is below minimum ${constraint.raw}` };
      }
      if (!constraint.inclusive && Math.abs(observed - limit) <= EPSILON) {
        return { satisfied: false, rationale: `observed ${raw} is not above minimum ${constraint.raw}` };
      }
      return { satisfied: true, rationale: `observed ${raw} meets minimum ${constraint.raw}` };
    }
    case 'range':
      if (observed < constraint.min - EPSILON || observed > constraint.max + EPSILON) {
        return { satisfied: false, rationale: `observed ${raw} is outside range ${constraint.raw}` };
      }
      return { satisfied: true, rationale: `observed ${raw} is within range ${constraint.raw}` };
    case 'equal':
      if (Math.abs(observed - constraint.value) > EPSILON) {
        return { satisfied: false, rationale: `observed ${raw} differs from expected ${constraint.raw}` };
      }
      return { satisfied: true, rationale: `observed ${raw} equals expected ${constraint.raw}` };
  }
}

function judge(constraint: Constraint, observation: Observation): NumericOutcome | null {
  switch (observation.kind) {
    case 'value':
      return judgeValue(constraint, observation.value, observation.raw);
    case 'below':
      // "<x" only proves compliance with an upper bound at or above x
      if (constraint.kind !== 'upper') {
        return null;
      }
      if (observation.value <= constraint.limit + EPSILON) {
        return { satisfied: true, rationale: `observed ${observation.raw} is within limit ${constraint.raw}` };
      }
      return { satisfied: false, rationale: `observed ${observation.raw} cannot confirm limit ${constraint.raw}` };
    case 'notDetected':
      if (constraint.kind !== 'upper') {
        return null;
      }
      return { satisfied: true, rationale: `observed not detected, within limit ${constraint.raw}` };
  }
}

/**
 * Compare an observed reading with an expected value.
 *
 * @param specUnit - unit column of the master row, used when the expected text carries none
 * @param observedUnit - unit reported next to the observed value, when given separately
 * @returns null when either side is not numeric
 */
export function evaluateNumeric(
  expected: string,
  observed: string,
  specUnit?: string,
  observedUnit?: string
): NumericOutcome | null {
  const constraint = parseConstraint(expected);
  const observation = parseObservation(observed);
  if (!constraint || !observation) {
    return null;
  }

  const outcome = judge(constraint, observation);
  if (!outcome) {
    return null;
  }

  const expectedUnit = constraint.unit ?? specUnit;
  const actualUnit = (observation.kind === 'notDetected' ? undefined : observation.unit) ?? observedUnit;
  if (expectedUnit && actualUnit && canonicalUnit(expectedUnit) !== canonicalUnit(actualUnit)) {
    return {
      satisfied: false,
      rationale: `${outcome.rationale}; unit mismatch: expected ${expectedUnit}, observed ${actualUnit}`,
    };
  }
  return outcome;
}
