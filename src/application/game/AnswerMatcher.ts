// Application layer: Free-text answer matching
// Pure functions; a malformed pattern or empty input never matches

import type { MatchType } from '@/domain/content/types.js';

export interface MatchOptions {
  caseSensitive?: boolean;
}

const RELATIVE_TOLERANCE = 0.01;
const ABSOLUTE_TOLERANCE = 0.001;

const COMPLEXITY_CLASSES: Record<string, string[]> = {
  constant: ['1', 'c', 'k', 'constant', 'const'],
  logarithmic: ['logn', 'log(n)', 'lgn', 'lg(n)', 'log2n', 'log2(n)', 'logarithmic'],
  linear: ['n', 'linear'],
  linearithmic: ['nlogn', 'nlog(n)', 'n*logn', 'n*log(n)', 'nlgn', 'linearithmic', 'loglinear', 'quasilinear'],
  quadratic: ['n^2', 'n2', 'n²', 'n*n', 'nn', 'quadratic'],
  cubic: ['n^3', 'n3', 'n³', 'n*n*n', 'nnn', 'cubic'],
  exponential: ['2^n', '2ⁿ', '2n', 'c^n', 'k^n', 'exponential'],
  factorial: ['n!', 'factorial'],
};

const COMPLEXITY_LOOKUP = new Map<string, string>(
  Object.entries(COMPLEXITY_CLASSES).flatMap(([canonical, synonyms]) =>
    synonyms.map((synonym): [string, string] => [synonym, canonical])
  )
);

export function splitAlternatives(pattern: string): string[] {
  return pattern
    .split('|')
    .map((alternative) => alternative.trim())
    .filter((alternative) => alternative.length > 0);
}

function normalizeText(value: string, caseSensitive: boolean): string {
  const collapsed = value.trim().replace(/\s+/g, ' ');
  return caseSensitive ? collapsed : collapsed.toLowerCase();
}

/**
 * First number in the text. Thousands separators and surrounding words or
 * units are ignored ("about 1,024 bytes" gives 1024).
 */
export function extractNumber(text: string): number | null {
  const withoutSeparators = text.replace(/(\d),(?=\d{3}(?!\d))/g, '$1');
  const match = withoutSeparators.match(/[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/);
  if (!match) return null;
  const value = parseFloat(match[0]);
  return Number.isFinite(value) ? value : null;
}

export function normalizeComplexity(value: string): string {
  let normalized = value.toLowerCase().replace(/\s+/g, '');
  normalized = normalized.replace(/time$/, '');

  const bigO = normalized.match(/^o\((.*)\)$/);
  if (bigO) {
    // Multiplication signs inside O(...) carry no meaning
    normalized = bigO[1].replace(/\*/g, '');
  }

  return COMPLEXITY_LOOKUP.get(normalized) ?? normalized;
}

function matchesExact(input: string, alternatives: string[], caseSensitive: boolean): boolean {
  const answer = normalizeText(input, caseSensitive);
  return alternatives.some((alternative) => normalizeText(alternative, caseSensitive) === answer);
}

function matchesNumeric(input: string, alternatives: string[]): boolean {
  const actual = extractNumber(input);
  if (actual === null) return false;

  return alternatives.some((alternative) => {
    const expected = extractNumber(alternative);
    if (expected === null) return false;
    const difference = Math.abs(actual - expected);
    if (difference < ABSOLUTE_TOLERANCE) return true;
    return expected !== 0 && difference / Math.abs(expected) <= RELATIVE_TOLERANCE;
  });
}

function matchesComplexity(input: string, alternatives: string[]): boolean {
  const answer = normalizeComplexity(input);
  if (answer.length === 0) return false;
  return alternatives.some((alternative) => normalizeComplexity(alternative) === answer);
}

export function matches(
  userInput: string,
  acceptedPattern: string,
  matchType: MatchType,
  options: MatchOptions = {}
): boolean {
  const alternatives = splitAlternatives(acceptedPattern);
  if (alternatives.length === 0 || userInput.trim().length === 0) {
    return false;
  }

  switch (matchType) {
    case 'exact':
      return matchesExact(userInput, alternatives, options.caseSensitive ?? false);
    case 'numeric':
      return matchesNumeric(userInput, alternatives);
    case 'complexity':
      return matchesComplexity(userInput, alternatives);
    default:
      return false;
  }
}
