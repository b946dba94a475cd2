import { z } from 'zod';
import type { SiteProfile } from './types.js';

const nullableText = z.string().trim().min(1).nullable();

export const rawListItemSchema = z.object({
  sourceUrl: z.string().url(),
  idCandidates: z.array(z.string()),
  publishedAt: nullableText,
  updatedAt: nullableText,
});

export type ValidatedListItem = z.infer<typeof rawListItemSchema>;

export const rawDetailFieldsSchema = z.object({
  title: nullableText,
  jobTitle: nullableText,
  employer: nullableText,
  locations: z.array(z.string().min(1)).nullable(),
  employmentType: nullableText,
  extent: nullableText,
  salaryText: nullableText,
  jobCodeText: nullableText,
  description: nullableText,
  publishedAt: nullableText,
  updatedAt: nullableText,
  applyDeadline: nullableText,
});

const selector = z.string().min(1);

export const siteProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  search: z.object({
    baseUrl: z.string().url(),
    paramNames: z.object({
      sector: z.string().min(1),
      openOnly: z.string().min(1),
      page: z.string().min(1),
      query: z.string().min(1),
    }),
    sectorValue: z.string().min(1),
    openOnly: z.boolean(),
    query: z.string().optional(),
    extraParams: z.record(z.string(), z.string()).optional(),
  }),
  list: z.object({
    item: selector,
    link: selector,
    publishedAt: selector.optional(),
    updatedAt: selector.optional(),
    idAttributes: z.array(z.string().min(1)),
    nextPage: selector.optional(),
  }),
  detail: z.object({
    title: selector.optional(),
    jobTitle: selector.optional(),
    employer: selector.optional(),
    locations: selector.optional(),
    employmentType: selector.optional(),
    extent: selector.optional(),
    salaryText: selector.optional(),
    jobCodeBlocks: selector.optional(),
    description: selector.optional(),
    publishedAt: selector.optional(),
    updatedAt: selector.optional(),
    applyDeadline: selector.optional(),
  }),
}) satisfies z.ZodType<SiteProfile>;

export interface ValidateListItemsOptions {
  onInvalid?: (issues: z.ZodIssue[], item: unknown) => void;
}

export function validateListItems(items: unknown[], options?: ValidateListItemsOptions): ValidatedListItem[] {
  const valid: ValidatedListItem[] = [];

  for (const item of items) {
    const result = rawListItemSchema.safeParse(item);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, item);
    }
  }

  return valid;
}

/**
 * Parse an untrusted profile (e.g. loaded from JSON) into a SiteProfile.
 * Throws a ZodError describing every invalid field.
 */
export function parseSiteProfile(input: unknown): SiteProfile {
  return siteProfileSchema.parse(input);
}
