import { distance } from 'fastest-levenshtein';
import { DEFAULT_ORG_CONFIG, type OrgMatcherConfig, type OrgTagConfig } from './config.js';
import type { MatchStrategy, OrgMatch } from './types.js';

const TRANSLITERATIONS: ReadonlyArray<[RegExp, string]> = [
  [/ø/g, 'o'],
  [/æ/g, 'ae'],
  [/å/g, 'a'],
];

/**
 * Accent-insensitive, punctuation-free form of an organization name.
 * Hyphens survive only between letters or digits.
 */
export function normalizeOrgText(text: string | null | undefined): string {
  if (!text) return '';

  let normalized = text.normalize('NFKD').replace(/\p{M}/gu, '').toLowerCase();
  for (const [pattern, replacement] of TRANSLITERATIONS) {
    normalized = normalized.replace(pattern, replacement);
  }

  return normalized
    .replace(/[^\p{L}\p{N}\s-]+/gu, ' ')
    .replace(/-(?![\p{L}\p{N}])|(?<![\p{L}\p{N}])-/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function tokenize(normalized: string): string[] {
  return normalized ? normalized.split(' ') : [];
}

function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 1;
  return 1 - distance(a, b) / longest;
}

/**
 * Token-set similarity in [0, 1]. A token set contained in the other scores 1.
 */
export function tokenSetSimilarity(a: string, b: string): number {
  const tokensA = new Set(tokenize(a));
  const tokensB = new Set(tokenize(b));
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  const shared = [...tokensA].filter((token) => tokensB.has(token)).sort();
  const onlyA = [...tokensA].filter((token) => !tokensB.has(token)).sort();
  const onlyB = [...tokensB].filter((token) => !tokensA.has(token)).sort();

  if (shared.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) {
    return 1;
  }

  const base = shared.join(' ');
  const withA = [base, ...onlyA].filter(Boolean).join(' ');
  const withB = [base, ...onlyB].filter(Boolean).join(' ');

  const scores = [similarity(withA, withB)];
  if (base) {
    scores.push(similarity(base, withA), similarity(base, withB));
  }

  return Math.max(...scores);
}

interface MatchInput {
  employer: string;
  employerTokens: string[];
  titleTokens: string[];
  sectorFilterApplied: boolean;
  fuzzyThreshold: number | undefined;
}

/** Returns a confidence when the tag matches, otherwise null. */
type MatchRule = (input: MatchInput, tag: OrgTagConfig) => number | null;

function containsPhrase(haystack: string, phrase: string): boolean {
  return phrase.length > 0 && ` ${haystack} `.includes(` ${phrase} `);
}

function hasTokenPrefix(tokens: readonly string[], prefixes: readonly string[]): boolean {
  return tokens.some((token) => prefixes.some((prefix) => token.startsWith(prefix)));
}

const RULES: ReadonlyArray<{ strategy: MatchStrategy; rule: MatchRule }> = [
  {
    strategy: 'exact',
    rule: (input, tag) => (input.employer !== '' && input.employer === tag.primaryName ? 1 : null),
  },
  {
    strategy: 'synonym',
    rule: (input, tag) =>
      [tag.primaryName, ...tag.synonyms].some((phrase) => containsPhrase(input.employer, phrase)) ? 1 : null,
  },
  {
    strategy: 'prefix',
    rule: (input, tag) => (hasTokenPrefix(input.employerTokens, tag.tokenPrefixes) ? 1 : null),
  },
  {
    // Low trust: the title only says something about the employer when the search is sector-filtered.
    strategy: 'title_prefix',
    rule: (input, tag) =>
      input.sectorFilterApplied && tag.titleFallback && hasTokenPrefix(input.titleTokens, tag.tokenPrefixes) ? 1 : null,
  },
  {
    strategy: 'fuzzy',
    rule: (input, tag) => {
      if (input.fuzzyThreshold === undefined || input.employer === '') return null;

      const score = Math.max(
        ...[tag.primaryName, ...tag.synonyms].map((phrase) => tokenSetSimilarity(input.employer, phrase)),
      );
      return score >= input.fuzzyThreshold ? score : null;
    },
  },
];

export interface MatchOptions {
  sectorFilterApplied?: boolean;
  /** Enables fuzzy matching; similarity in [0, 1] required for a match. */
  fuzzyThreshold?: number;
}

export interface OrgMatcher {
  matchOrg(employerText: string | null | undefined, titleText: string | null | undefined, options?: MatchOptions): OrgMatch | null;
}

export function createOrgMatcher(config: OrgMatcherConfig = DEFAULT_ORG_CONFIG): OrgMatcher {
  return {
    matchOrg(employerText, titleText, options = {}) {
      const employer = normalizeOrgText(employerText);
      const input: MatchInput = {
        employer,
        employerTokens: tokenize(employer),
        titleTokens: tokenize(normalizeOrgText(titleText)),
        sectorFilterApplied: options.sectorFilterApplied ?? false,
        fuzzyThreshold: options.fuzzyThreshold,
      };

      for (const { strategy, rule } of RULES) {
        let best: OrgMatch | null = null;
        for (const tag of config.tags) {
          const confidence = rule(input, tag);
          if (confidence !== null && (best === null || confidence > best.confidence)) {
            best = { tag: tag.tag, confidence, strategy };
          }
        }
        if (best) return best;
      }

      return null;
    },
  };
}
