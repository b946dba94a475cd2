import { defineSiteProfile, type SiteProfile } from '@statejobs/source-sdk';

/**
 * Selector table for the public job index. Markup changes on the site are
 * absorbed here (or in a JSON profile loaded at startup), not in the parsers.
 */
export function createDefaultSiteProfile(baseUrl: string): SiteProfile {
  return defineSiteProfile({
    id: 'public-index',
    name: 'Public sector job index',
    search: {
      baseUrl,
      paramNames: {
        sector: 'sector',
        openOnly: 'open',
        page: 'page',
        query: 'q',
      },
      sectorValue: 'state',
      openOnly: true,
    },
    list: {
      item: '.result-item',
      link: 'a.result-link',
      publishedAt: 'time.published',
      updatedAt: 'time.updated',
      idAttributes: ['data-listing-id', 'data-id', 'data-uuid'],
      nextPage: 'a[rel="next"]',
    },
    detail: {
      title: 'h1.job-title',
      jobTitle: '.position-title',
      employer: '.employer-name',
      locations: '.job-locations',
      employmentType: '.employment-type',
      extent: '.employment-extent',
      salaryText: '.salary',
      jobCodeBlocks: '.job-codes',
      description: '.job-description',
      publishedAt: 'time.published',
      updatedAt: 'time.updated',
      applyDeadline: 'time.deadline',
    },
  });
}
