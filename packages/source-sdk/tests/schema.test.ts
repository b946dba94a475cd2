import { describe, expect, it, vi } from 'vitest';
import { ZodError } from 'zod';
import { parseSiteProfile, rawDetailFieldsSchema, validateListItems } from '../src/schema.js';

const profileJson = {
  id: 'custom',
  name: 'Custom index',
  search: {
    baseUrl: 'https://jobs.example.org/search',
    paramNames: { sector: 'sektor', openOnly: 'aktive', page: 'side', query: 'q' },
    sectorValue: 'stat',
    openOnly: true,
  },
  list: {
    item: 'article.job',
    link: 'a',
    idAttributes: ['data-id'],
  },
  detail: {
    title: 'h1',
    employer: '.employer',
  },
};

describe('validateListItems', () => {
  it('keeps valid items and reports invalid ones', () => {
    const onInvalid = vi.fn();
    const valid = validateListItems(
      [
        { sourceUrl: 'https://jobs.example.org/stilling/1', idCandidates: ['1'], publishedAt: null, updatedAt: null },
        { sourceUrl: 'not a url', idCandidates: [], publishedAt: null, updatedAt: null },
        { idCandidates: ['3'] },
      ],
      { onInvalid },
    );

    expect(valid).toEqual([
      { sourceUrl: 'https://jobs.example.org/stilling/1', idCandidates: ['1'], publishedAt: null, updatedAt: null },
    ]);
    expect(onInvalid).toHaveBeenCalledTimes(2);
  });

  it('trims date text', () => {
    const [item] = validateListItems([
      { sourceUrl: 'https://jobs.example.org/stilling/1', idCandidates: [], publishedAt: ' 2025-03-01 ', updatedAt: null },
    ]);
    expect(item?.publishedAt).toBe('2025-03-01');
  });
});

describe('rawDetailFieldsSchema', () => {
  it('rejects blank strings where null is expected', () => {
    const result = rawDetailFieldsSchema.safeParse({
      title: '   ',
      jobTitle: null,
      employer: null,
      locations: null,
      employmentType: null,
      extent: null,
      salaryText: null,
      jobCodeText: null,
      description: null,
      publishedAt: null,
      updatedAt: null,
      applyDeadline: null,
    });

    expect(result.success).toBe(false);
  });
});

describe('parseSiteProfile', () => {
  it('accepts a profile with optional selectors left out', () => {
    const profile = parseSiteProfile(profileJson);

    expect(profile.search.paramNames.page).toBe('side');
    expect(profile.list.nextPage).toBeUndefined();
    expect(profile.detail.jobCodeBlocks).toBeUndefined();
  });

  it('rejects a profile without an item selector', () => {
    expect(() => parseSiteProfile({ ...profileJson, list: { link: 'a', idAttributes: [] } })).toThrow(ZodError);
  });

  it('rejects a base URL that is not absolute', () => {
    expect(() => parseSiteProfile({ ...profileJson, search: { ...profileJson.search, baseUrl: '/search' } })).toThrow(ZodError);
  });
});
