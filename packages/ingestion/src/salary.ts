import { DEFAULT_JOB_CODE_CONFIG, DEFAULT_SALARY_CONFIG, type SalaryConfig } from './config.js';
import { emptyToNull } from './normalize.js';
import { WORD_START, wordAlternation } from './text-patterns.js';

export type SalaryKind = 'range' | 'point' | 'none' | 'ambiguous';

export interface SalaryParseResult {
  min: number | null;
  max: number | null;
  /** Whitespace-normalized input, kept even when no bounds are found. */
  text: string | null;
  kind: SalaryKind;
}

const SEPARATORS = ' \\u00A0\\u202F\\u2009.,';
// A thousands group never takes a number that a percentage follows ("700 000 100 %").
const AMOUNT = `\\d{1,3}(?:[${SEPARATORS}]\\d{3}(?!\\d|\\s*%))+(?!\\d)|\\d+`;
const RANGE_PATTERN = new RegExp(`(${AMOUNT})\\s*[-–—]\\s*(${AMOUNT})`, 'g');
const TIL_PATTERN = new RegExp(`(${AMOUNT})\\s+til\\s+(${AMOUNT})`, 'g');
const AMOUNT_PATTERN = new RegExp(AMOUNT, 'g');
const CURRENCY_PATTERN = /(?<![\p{L}\p{N}])(?:kr|nok)(?![\p{L}\p{N}])\.?|,-/giu;

function toAmount(raw: string): number {
  return Number.parseInt(raw.replace(/[^\d]/g, ''), 10);
}

function codeMarkerPattern(markers: readonly string[]): RegExp {
  return new RegExp(`${WORD_START}(?:${wordAlternation(markers)})\\s*[:.]?\\s*\\d{3,5}(?!\\d)`, 'giu');
}

function noBounds(text: string | null, kind: SalaryKind): SalaryParseResult {
  return { min: null, max: null, text, kind };
}

interface AnnualScale {
  floor: number;
  ceiling: number;
}

function isAnnual(amount: number, { floor, ceiling }: AnnualScale): boolean {
  return amount >= floor && amount <= ceiling;
}

function boundedPair(first: number, second: number, scale: AnnualScale): [number, number] | null {
  let lo = first;
  const hi = second;

  // "500 - 650 000": abbreviated lower bound
  while (lo > 0 && lo < 1000 && lo * 1000 <= hi) {
    lo *= 1000;
  }

  if (!isAnnual(lo, scale) || !isAnnual(hi, scale)) return null;
  return lo <= hi ? [lo, hi] : [hi, lo];
}

function firstPair(text: string, pattern: RegExp, scale: AnnualScale): [number, number] | null {
  for (const match of text.matchAll(pattern)) {
    const [, first, second] = match;
    if (first === undefined || second === undefined) continue;

    const pair = boundedPair(toAmount(first), toAmount(second), scale);
    if (pair) return pair;
  }

  return null;
}

/**
 * Parse a free-text salary into annual NOK bounds.
 * Never throws; unreadable or qualitative text yields null bounds with the text kept.
 */
export function parseSalaryText(
  text: string | null | undefined,
  config: SalaryConfig = DEFAULT_SALARY_CONFIG,
  codeMarkers: readonly string[] = DEFAULT_JOB_CODE_CONFIG.markers,
): SalaryParseResult {
  const original = emptyToNull(text);
  if (!original) return noBounds(null, 'none');

  const cleaned = original
    .toLowerCase()
    .replace(codeMarkerPattern(codeMarkers), ' ')
    .replace(CURRENCY_PATTERN, ' ');

  const scale: AnnualScale = { floor: config.minAnnualAmount, ceiling: config.maxAnnualAmount };

  const range = firstPair(cleaned, RANGE_PATTERN, scale) ?? firstPair(cleaned, TIL_PATTERN, scale);
  if (range) {
    return { min: range[0], max: range[1], text: original, kind: 'range' };
  }

  const amounts = [...new Set([...cleaned.matchAll(AMOUNT_PATTERN)].map((match) => toAmount(match[0])))].filter(
    (amount) => isAnnual(amount, scale),
  );

  const [only] = amounts;
  if (amounts.length === 1 && only !== undefined) {
    return { min: only, max: only, text: original, kind: 'point' };
  }

  return noBounds(original, amounts.length > 1 ? 'ambiguous' : 'none');
}

/**
 * True when a text block talks about salary: a salary keyword, a
 * qualitative salary phrase or an amount at annual-salary scale.
 */
export function isSalaryPhrase(
  block: string,
  config: SalaryConfig = DEFAULT_SALARY_CONFIG,
  codeMarkers: readonly string[] = DEFAULT_JOB_CODE_CONFIG.markers,
): boolean {
  const lower = block.toLowerCase();

  if (new RegExp(`${WORD_START}(?:${wordAlternation(config.keywords)})`, 'iu').test(lower)) {
    return true;
  }

  if (config.qualitativePhrases.some((phrase) => lower.includes(phrase))) {
    return true;
  }

  return parseSalaryText(block, config, codeMarkers).min !== null;
}
