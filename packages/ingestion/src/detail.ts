import type { RawDetailFields } from '@statejobs/source-sdk';
import { DEFAULT_INGESTION_CONFIG, type IngestionConfig } from './config.js';
import { extractJobCodes, splitAtJobCodes } from './job-codes.js';
import { emptyToNull, normalizeTimestamp, normalizeWhitespace } from './normalize.js';
import { normalizeOrgText } from './org-match.js';
import { isSalaryPhrase, parseSalaryText, type SalaryParseResult } from './salary.js';
import type { DetailRecord, JobCodeEntry, ListingSalary, ListingSummary } from './types.js';

export interface DetailParser {
  parseDetail(rawDetailText: string | null | undefined): JobCodeEntry[];
  parseListingSalary(salaryText: string | null | undefined): ListingSalary;
}

function splitBlocks(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(normalizeWhitespace)
    .filter((block) => block.length > 0);
}

/**
 * Binds salary phrases to job codes.
 *
 * A salary phrase in the same block as code markers belongs to those codes.
 * When several codes in one block each carry their own phrase, every code
 * takes the phrase that follows its marker. Codes without one share the
 * single salary phrase found elsewhere; with several such phrases the
 * binding is ambiguous and the codes get null bounds with all phrases kept
 * as text.
 */
export function createDetailParser(config: IngestionConfig = DEFAULT_INGESTION_CONFIG): DetailParser {
  const { jobCodes, salary } = config;

  const salaryOf = (text: string): SalaryParseResult | null =>
    isSalaryPhrase(text, salary, jobCodes.markers) ? parseSalaryText(text, salary, jobCodes.markers) : null;

  // One parse result per code in the block, in code order.
  const blockSalaries = (block: string, codeCount: number): Array<SalaryParseResult | null> => {
    const { head, segments } = splitAtJobCodes(block, jobCodes);
    const phraseCount = [head, ...segments].filter((part) => isSalaryPhrase(part, salary, jobCodes.markers)).length;

    if (codeCount >= 2 && segments.length === codeCount && phraseCount >= 2) {
      return segments.map(salaryOf);
    }

    const whole = salaryOf(block);
    return Array.from({ length: codeCount }, () => whole);
  };

  return {
    parseDetail(rawDetailText) {
      if (!rawDetailText) return [];

      const entries: JobCodeEntry[] = [];
      const unbound: JobCodeEntry[] = [];
      const loosePhrases: string[] = [];

      for (const block of splitBlocks(rawDetailText)) {
        const codes = extractJobCodes(block, jobCodes, salary);

        if (codes.length === 0) {
          if (isSalaryPhrase(block, salary, jobCodes.markers) && !loosePhrases.includes(block)) {
            loosePhrases.push(block);
          }
          continue;
        }

        const salaries = blockSalaries(block, codes.length);
        for (const [index, { code, title }] of codes.entries()) {
          const parsed = salaries[index] ?? null;
          const entry: JobCodeEntry = {
            code,
            title,
            salaryMin: parsed?.min ?? null,
            salaryMax: parsed?.max ?? null,
            salaryText: parsed?.text ?? null,
            isSharedSalary: false,
          };
          entries.push(entry);
          if (!parsed) unbound.push(entry);
        }
      }

      const [onlyPhrase] = loosePhrases;
      if (loosePhrases.length === 1 && onlyPhrase !== undefined) {
        const parsed = parseSalaryText(onlyPhrase, salary, jobCodes.markers);
        for (const entry of unbound) {
          entry.salaryMin = parsed.min;
          entry.salaryMax = parsed.max;
          entry.salaryText = parsed.text;
          entry.isSharedSalary = unbound.length >= 2;
        }
      } else if (loosePhrases.length > 1) {
        const joined = loosePhrases.join('; ');
        for (const entry of unbound) {
          entry.salaryText = joined;
        }
      }

      return entries;
    },

    parseListingSalary(salaryText) {
      const { min, max, text } = parseSalaryText(salaryText, salary, jobCodes.markers);
      return { min, max, text };
    },
  };
}

/**
 * The text the job-code parser reads: the job-code section (or the
 * description when the page has none) followed by the salary field.
 */
export function detailText(fields: RawDetailFields): string {
  return [fields.jobCodeText ?? fields.description, fields.salaryText]
    .filter((part): part is string => part !== null && part.trim().length > 0)
    .join('\n');
}

export function buildDetailRecord(summary: ListingSummary, fields: RawDetailFields, parser: DetailParser): DetailRecord {
  const employerRaw = emptyToNull(fields.employer);

  return {
    listingId: summary.listingId,
    sourceUrl: summary.sourceUrl,
    title: emptyToNull(fields.title),
    jobTitle: emptyToNull(fields.jobTitle),
    employerRaw,
    employerNormalized: emptyToNull(normalizeOrgText(employerRaw)),
    locations: (fields.locations ?? []).map(normalizeWhitespace).filter((location) => location.length > 0),
    employmentType: emptyToNull(fields.employmentType),
    extent: emptyToNull(fields.extent),
    publishedAt: summary.publishedAt ?? normalizeTimestamp(fields.publishedAt),
    updatedAt: summary.updatedAt ?? normalizeTimestamp(fields.updatedAt),
    applyDeadline: normalizeTimestamp(fields.applyDeadline) ?? emptyToNull(fields.applyDeadline),
    listingSalary: parser.parseListingSalary(fields.salaryText),
    jobCodes: parser.parseDetail(detailText(fields)),
  };
}
