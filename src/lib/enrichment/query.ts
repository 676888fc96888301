/**
 * Query construction and name normalization.
 *
 * A query is built once per request and frozen; the normalized form is the
 * cache key and the input for name-based identity matching.
 */

import aliasTable from './data/ingredient-aliases.json';
import type { IngredientQuery } from './enrichment.types';

/** Chemical-registry (CAS) number anywhere in a text */
export const CAS_PATTERN = /\b(\d{2,7}-\d{2}-\d)\b/;

const CAS_EXACT = /^\d{2,7}-\d{2}-\d$/;

const MAX_SEARCH_VARIANTS = 5;

/** Product-form suffixes stripped before alias lookup */
const FORM_SUFFIXES = [
  ' essential oil',
  ' absolute',
  ' resinoid',
  ' concrete',
  ' co2 extract',
  ' oil',
];

const ALIASES: Record<string, string[]> = aliasTable;

export function isCasNumber(value: string | null | undefined): boolean {
  return value != null && CAS_EXACT.test(value.trim());
}

/** First CAS number in free text, or null */
export function extractCasNumber(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = CAS_PATTERN.exec(text);
  return match ? match[1] : null;
}

/**
 * Trim, case-fold, and collapse every run of punctuation/whitespace to a
 * single space. "Ylang-Ylang  Oil (III)" -> "ylang ylang oil iii".
 */
export function normalizeIngredientName(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function buildQuery(
  name: string,
  casHint?: string | null,
): IngredientQuery {
  const raw = name.trim().replace(/\s+/g, ' ');
  const hint = casHint?.trim();
  return Object.freeze({
    raw,
    normalized: normalizeIngredientName(raw),
    casHint: hint && isCasNumber(hint) ? hint : null,
  });
}

function stripFormSuffix(normalized: string): string {
  for (const suffix of FORM_SUFFIXES) {
    if (normalized.endsWith(suffix)) {
      return normalized.slice(0, -suffix.length).trim();
    }
  }
  return normalized;
}

function aliasesFor(normalized: string): string[] {
  const base = stripFormSuffix(normalized);
  for (const [primary, aliases] of Object.entries(ALIASES)) {
    if (
      primary === normalized ||
      primary === base ||
      aliases.some((a) => a === normalized)
    ) {
      return aliases;
    }
  }
  return [];
}

/**
 * Names to try against a source, in order: the user's input first, then
 * known aliases of the same material. Deduped case-insensitively.
 */
export function getSearchVariants(query: IngredientQuery): string[] {
  const seen = new Set<string>();
  const variants: string[] = [];
  for (const candidate of [query.raw, ...aliasesFor(query.normalized)]) {
    const key = normalizeIngredientName(candidate);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    variants.push(candidate);
    if (variants.length >= MAX_SEARCH_VARIANTS) break;
  }
  return variants;
}
