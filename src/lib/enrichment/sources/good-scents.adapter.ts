/**
 * The Good Scents Company adapter
 *
 * Odor profile for an ingredient: POST the site's search form, follow the
 * first data/rw*.html link, then read the label/value rows of the detail
 * page's tables. No API exists; the label patterns below are the contract
 * with the page layout and need updating when the site changes.
 */

import * as cheerio from 'cheerio';
import { createLogger, type Logger } from '@/src/lib/logging/logger';
import type {
  EnrichmentFields,
  IngredientQuery,
  OdorStrength,
  PartialRecord,
} from '../enrichment.types';
import { extractCasNumber } from '../query';
import type { SourceHttp } from './sourceFetch';
import type { SourceAdapter, SourceFetchResult } from './source.types';

export const GOOD_SCENTS_BASE = 'http://www.thegoodscentscompany.com';

const DETAIL_LINK = /data\/rw\d+\.html/;
const MAX_SYNONYMS = 50;

type LabelField =
  | 'cas'
  | 'einecs'
  | 'odorStrength'
  | 'odorDescription'
  | 'formula'
  | 'molecularWeight'
  | 'flashPoint'
  | 'appearance'
  | 'logP'
  | 'solubility'
  | 'shelfLife'
  | 'synonyms';

/**
 * First matching rule wins, so specific labels come before generic ones
 * ("odor strength" before "odor", "formula" before "form").
 */
const LABEL_RULES: ReadonlyArray<{
  field: LabelField | null;
  patterns: string[];
}> = [
  { field: 'cas', patterns: ['cas number', 'cas no', 'cas#', 'cas'] },
  { field: 'einecs', patterns: ['einecs', 'ec number'] },
  { field: 'odorStrength', patterns: ['odor strength', 'strength', 'intensity'] },
  // odor family/type has no field; keep it from landing in the description
  { field: null, patterns: ['odor type', 'odor family'] },
  { field: 'odorDescription', patterns: ['odor description', 'odor', 'aroma', 'smell'] },
  { field: 'formula', patterns: ['molecular formula', 'formula'] },
  { field: 'molecularWeight', patterns: ['molecular weight', 'mol weight'] },
  { field: 'flashPoint', patterns: ['flash point', 'flashpoint'] },
  { field: 'appearance', patterns: ['appearance', 'physical form'] },
  { field: 'logP', patterns: ['logp', 'log p', 'octanol water'] },
  { field: 'solubility', patterns: ['soluble in', 'solubility'] },
  { field: 'shelfLife', patterns: ['shelf life', 'shelf-life', 'storage'] },
  { field: 'synonyms', patterns: ['synonyms', 'other names'] },
];

export type GoodScentsPage = EnrichmentFields & { synonyms: string[] };

export type GoodScentsAdapterOptions = {
  http: SourceHttp;
  baseUrl?: string;
  logger?: Logger;
};

function clean(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function normalizeOdorStrength(value: string): OdorStrength {
  const v = value.toLowerCase();
  if (v.includes('extreme') || v.includes('very high')) return 'Extreme';
  if (v.includes('high') || v.includes('strong')) return 'High';
  if (v.includes('low') || v.includes('weak')) return 'Low';
  return 'Medium';
}

function ruleFor(label: string): LabelField | null {
  for (const rule of LABEL_RULES) {
    if (rule.patterns.some((p) => label.includes(p))) return rule.field;
  }
  return null;
}

/** First search-result link to a detail page, as an absolute URL */
export function findDetailLink(html: string, baseUrl: string): string | null {
  const $ = cheerio.load(html);
  const base = `${baseUrl}/`;
  const links = $('a[href]')
    .toArray()
    .map((el) => $(el).attr('href'))
    .filter((value): value is string => !!value && DETAIL_LINK.test(value));
  // links are sometimes built in inline script
  const inline = DETAIL_LINK.exec(html)?.[0];
  if (inline) links.push(inline);
  const found = links.find((link) => URL.canParse(link, base));
  return found ? new URL(found, base).href : null;
}

/**
 * Read a detail page. Returns null when the page yields neither a CAS number
 * nor an odor description.
 */
export function parseGoodScentsPage(html: string): GoodScentsPage | null {
  const $ = cheerio.load(html);
  const page: GoodScentsPage = { synonyms: [] };

  $('tr').each((_, row) => {
    const cells = $(row).children('td, th');
    if (cells.length < 2) return;
    const label = clean(cells.eq(0).text()).toLowerCase();
    const value = clean(cells.eq(1).text());
    if (!label || !value) return;

    const field = ruleFor(label);
    switch (field) {
      case null:
        return;
      case 'cas': {
        const cas = extractCasNumber(value);
        if (cas) page.cas ??= cas;
        return;
      }
      case 'odorStrength':
        page.odorStrength ??= normalizeOdorStrength(value);
        return;
      case 'odorDescription':
        if (value.length > 3) page.odorDescription ??= value;
        return;
      case 'synonyms':
        for (const s of value.split(/[,;]/)) {
          const synonym = s.trim();
          if (synonym && page.synonyms.length < MAX_SYNONYMS) {
            page.synonyms.push(synonym);
          }
        }
        return;
      default:
        page[field] ??= value;
    }
  });

  const heading =
    clean($('h1').first().text()) ||
    clean($('title').first().text().split(',')[0] ?? '');
  if (heading) page.name = heading;

  if (!page.cas) {
    $('script, style').remove();
    // separate adjacent cells so the CAS pattern sees word boundaries
    $('*').prepend(' ').append(' ');
    const cas = extractCasNumber($.root().text());
    if (cas) page.cas = cas;
  }

  return page.cas || page.odorDescription ? page : null;
}

export function createGoodScentsAdapter(
  options: GoodScentsAdapterOptions,
): SourceAdapter {
  const { http } = options;
  const base = options.baseUrl ?? GOOD_SCENTS_BASE;
  const log = options.logger ?? createLogger('goodscents');

  return {
    id: 'goodscents',

    async fetch(
      query: IngredientQuery,
      signal?: AbortSignal,
    ): Promise<SourceFetchResult> {
      const search = await http.request(
        {
          url: `${base}/search.php`,
          form: { qName: query.raw, submit: 'Search' },
        },
        signal,
      );
      if (search.status !== 'ok') return search;

      const detailUrl = findDetailLink(search.value.body, base);
      if (!detailUrl) {
        log.debug('no detail link in search results', { query: query.raw });
        return { status: 'not_found' };
      }

      const detail = await http.request({ url: detailUrl }, signal);
      if (detail.status !== 'ok') return detail;

      const page = parseGoodScentsPage(detail.value.body);
      if (!page) {
        log.warn('detail page had no usable data', { query: query.raw, url: detailUrl });
        return { status: 'not_found' };
      }

      const record: PartialRecord = { ...page, provenance: 'goodscents', query };
      log.info('found profile', { query: query.raw, cas: page.cas ?? null });
      return { status: 'found', record };
    },
  };
}
