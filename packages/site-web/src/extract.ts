import { load } from 'cheerio';
import type { DetailSelectors, Extractor, ListSelectors, RawDetailFields, RawListItem, SiteProfile } from '@statejobs/source-sdk';

type CheerioRoot = ReturnType<typeof load>;
type CheerioSelection = ReturnType<CheerioRoot>;

const BLOCK_CHILDREN = 'p, li, h1, h2, h3, h4, tr';

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function nonEmpty(text: string | undefined): string | null {
  if (text === undefined) return null;
  const collapsed = collapse(text);
  return collapsed.length > 0 ? collapsed : null;
}

function selectionText(selection: CheerioSelection): string | null {
  if (selection.length === 0) return null;
  return nonEmpty(selection.first().text());
}

/**
 * Dates prefer a machine-readable attribute (`<time datetime>`, `content`)
 * over the visible text.
 */
function selectionDate(selection: CheerioSelection): string | null {
  if (selection.length === 0) return null;
  const node = selection.first();
  return nonEmpty(node.attr('datetime')) ?? nonEmpty(node.attr('content')) ?? nonEmpty(node.text());
}

function pushLines(lines: string[], text: string): void {
  for (const line of text.split('\n')) {
    const collapsed = nonEmpty(line);
    if (collapsed) lines.push(collapsed);
  }
}

/**
 * Text of a container split into lines at block children and `<br>`, so
 * that each paragraph, list item or broken line stays one line.
 */
function selectionBlocks($: CheerioRoot, selection: CheerioSelection): string | null {
  if (selection.length === 0) return null;

  selection.find('br').replaceWith('\n');

  const lines: string[] = [];
  selection.each((_, container) => {
    const children = $(container).find(BLOCK_CHILDREN);
    if (children.length === 0) {
      pushLines(lines, $(container).text());
      return;
    }

    children.each((__, child) => {
      // Nested blocks (li > p) would otherwise be emitted twice.
      if ($(child).find(BLOCK_CHILDREN).length > 0) return;
      pushLines(lines, $(child).text());
    });
  });

  return lines.length > 0 ? lines.join('\n') : null;
}

export function splitLocations(text: string | null): string[] | null {
  if (!text) return null;
  const values = text
    .split(/[,/]/)
    .map((part) => part.trim())
    .filter(Boolean);

  return values.length > 0 ? values : null;
}

function toAbsoluteUrl(href: string, pageUrl: string): string | null {
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

export function extractListItems(html: string, pageUrl: string, selectors: ListSelectors): RawListItem[] {
  const $ = load(html);
  const items: RawListItem[] = [];

  $(selectors.item).each((_, node) => {
    const item = $(node);
    const link = item.is(selectors.link) ? item : item.find(selectors.link).first();
    const href = nonEmpty(link.attr('href'));
    if (!href) return;

    const sourceUrl = toAbsoluteUrl(href, pageUrl);
    if (!sourceUrl) return;

    const idCandidates: string[] = [];
    for (const attribute of selectors.idAttributes) {
      const value = nonEmpty(item.attr(attribute)) ?? nonEmpty(link.attr(attribute));
      if (value) idCandidates.push(value);
    }

    items.push({
      sourceUrl,
      idCandidates,
      publishedAt: selectors.publishedAt ? selectionDate(item.find(selectors.publishedAt)) : null,
      updatedAt: selectors.updatedAt ? selectionDate(item.find(selectors.updatedAt)) : null,
    });
  });

  return items;
}

export function extractDetailFields(html: string, selectors: DetailSelectors): RawDetailFields {
  const $ = load(html);
  const text = (selector: string | undefined): string | null => (selector ? selectionText($(selector)) : null);
  const date = (selector: string | undefined): string | null => (selector ? selectionDate($(selector)) : null);
  const blocks = (selector: string | undefined): string | null => (selector ? selectionBlocks($, $(selector)) : null);

  return {
    title: text(selectors.title),
    jobTitle: text(selectors.jobTitle),
    employer: text(selectors.employer),
    locations: splitLocations(text(selectors.locations)),
    employmentType: text(selectors.employmentType),
    extent: text(selectors.extent),
    salaryText: text(selectors.salaryText),
    jobCodeText: blocks(selectors.jobCodeBlocks),
    description: blocks(selectors.description),
    publishedAt: date(selectors.publishedAt),
    updatedAt: date(selectors.updatedAt),
    applyDeadline: date(selectors.applyDeadline),
  };
}

/**
 * Without a configured next-page selector pagination is bounded only by the
 * caller's page limit and empty pages.
 */
export function hasNextPage(html: string, selectors: ListSelectors): boolean {
  if (!selectors.nextPage) return true;
  const $ = load(html);
  return $(selectors.nextPage).length > 0;
}

export function createCheerioExtractor(profile: SiteProfile): Extractor {
  return {
    extractListItems: (html, pageUrl) => extractListItems(html, pageUrl, profile.list),
    extractDetailFields: (html) => extractDetailFields(html, profile.detail),
    hasNextPage: (html) => hasNextPage(html, profile.list),
  };
}
