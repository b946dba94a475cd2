import { DEFAULT_JOB_CODE_CONFIG, DEFAULT_SALARY_CONFIG, type JobCodeConfig, type SalaryConfig } from './config.js';
import { WORD_START, wordAlternation } from './text-patterns.js';

export interface ExtractedJobCode {
  code: string;
  title: string | null;
}

const LEADING_SEPARATOR = /^\s*[-–—:]\s*/;
const TITLE_END = /\s[-–—]|[–—:;,(]/;

function markerPattern(config: JobCodeConfig): RegExp {
  return new RegExp(`${WORD_START}(?:${wordAlternation(config.markers)})\\s*[:.]?\\s*(\\d{3,5})(?!\\d)`, 'giu');
}

function titleAfter(rest: string, markers: RegExp, keywords: RegExp): string | null {
  const separator = rest.match(LEADING_SEPARATOR);
  if (!separator) return null;

  const tail = rest.slice(separator[0].length);
  const cuts = [tail.search(TITLE_END), tail.search(keywords), tail.search(markers)].filter((index) => index >= 0);
  const end = cuts.length > 0 ? Math.min(...cuts) : tail.length;

  const title = tail.slice(0, end).replace(/[\s./]+$/, '').trim();
  return title.length > 0 ? title : null;
}

/**
 * Find job codes in one text block, in order of appearance.
 * A code is a configured marker followed by 3-5 digits; its title is the
 * text after a `-`, `–` or `:` separator up to the next separator or
 * salary keyword. Repeated codes are all returned.
 */
export function extractJobCodes(
  block: string,
  config: JobCodeConfig = DEFAULT_JOB_CODE_CONFIG,
  salary: SalaryConfig = DEFAULT_SALARY_CONFIG,
): ExtractedJobCode[] {
  const markers = markerPattern(config);
  const nextMarker = new RegExp(markers.source, 'iu');
  const keywords = new RegExp(`${WORD_START}(?:${wordAlternation(salary.keywords)})`, 'iu');

  const codes: ExtractedJobCode[] = [];
  for (const match of block.matchAll(markers)) {
    const [whole, code] = match;
    if (code === undefined) continue;

    const rest = block.slice((match.index ?? 0) + whole.length);
    codes.push({ code, title: titleAfter(rest, nextMarker, keywords) });
  }

  return codes;
}

export interface JobCodeSegments {
  /** Text before the first code marker. */
  head: string;
  /** One segment per code marker, running up to the next marker. */
  segments: string[];
}

const TRAILING_JOINERS = /[\s,;/.]+$/;

/**
 * Cut a block at its code markers, so that text can be attributed to the
 * code it follows. Segments line up with {@link extractJobCodes}.
 */
export function splitAtJobCodes(block: string, config: JobCodeConfig = DEFAULT_JOB_CODE_CONFIG): JobCodeSegments {
  const starts = [...block.matchAll(markerPattern(config))].map((match) => match.index ?? 0);
  const [first] = starts;
  if (first === undefined) {
    return { head: block, segments: [] };
  }

  return {
    head: block.slice(0, first),
    segments: starts.map((start, index) => block.slice(start, starts[index + 1] ?? block.length).replace(TRAILING_JOINERS, '')),
  };
}
