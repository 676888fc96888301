/**
 * Identity Matcher
 *
 * Decides whether two records describe the same substance. CAS numbers win
 * outright (equal → same, different → never the same). Without a CAS pair the
 * normalized names are scored; only a score strictly above the threshold is a
 * match. Everything else, including exact ties, fails closed.
 */

import { isCasNumber, normalizeIngredientName } from './query';

/** Anything with a name and optional registry number */
export type IdentityComparable = {
  name?: string | null;
  cas?: string | null;
};

export type IdentityReason =
  | 'cas_match'
  | 'cas_mismatch'
  | 'name_match'
  | 'name_ambiguous'
  | 'name_mismatch'
  | 'insufficient_data';

export type IdentityDecision = {
  same: boolean;
  reason: IdentityReason;
  /** Name similarity in [0, 1]; null when decided by CAS */
  score: number | null;
};

/** Name score must be strictly greater than this to count as identity */
export const IDENTITY_THRESHOLD = 0.85;

/** Scores from here up to the threshold are reported as ambiguous */
export const AMBIGUOUS_FLOOR = 0.6;

function tokens(normalized: string): string[] {
  return normalized.split(' ').filter(Boolean);
}

/** Jaccard overlap of the two token sets */
export function tokenSetOverlap(a: string, b: string): number {
  const setA = new Set(tokens(a));
  const setB = new Set(tokens(b));
  if (setA.size === 0 && setB.size === 0) return 0;
  let shared = 0;
  for (const t of setA) if (setB.has(t)) shared++;
  return shared / (setA.size + setB.size - shared);
}

/** Classic two-row Levenshtein distance */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

/**
 * 1 - distance / longer length, on token-sorted strings so word order does
 * not count ("alpha ionone" = "ionone alpha").
 */
export function editDistanceRatio(a: string, b: string): number {
  const sortedA = tokens(a).sort().join(' ');
  const sortedB = tokens(b).sort().join(' ');
  const longest = Math.max(sortedA.length, sortedB.length);
  if (longest === 0) return 0;
  return 1 - levenshtein(sortedA, sortedB) / longest;
}

/** Average of token-set overlap and edit-distance ratio on normalized names */
export function nameSimilarity(a: string, b: string): number {
  const na = normalizeIngredientName(a);
  const nb = normalizeIngredientName(b);
  if (!na || !nb) return 0;
  if (na === nb) return 1;
  return 0.5 * tokenSetOverlap(na, nb) + 0.5 * editDistanceRatio(na, nb);
}

function registryNumber(value: IdentityComparable): string | null {
  const cas = value.cas?.trim();
  return cas && isCasNumber(cas) ? cas : null;
}

export function compareIdentity(
  a: IdentityComparable,
  b: IdentityComparable,
): IdentityDecision {
  const casA = registryNumber(a);
  const casB = registryNumber(b);
  if (casA && casB) {
    return casA === casB
      ? { same: true, reason: 'cas_match', score: null }
      : { same: false, reason: 'cas_mismatch', score: null };
  }

  const nameA = a.name?.trim();
  const nameB = b.name?.trim();
  if (!nameA || !nameB) {
    return { same: false, reason: 'insufficient_data', score: null };
  }

  const score = nameSimilarity(nameA, nameB);
  if (score > IDENTITY_THRESHOLD) {
    return { same: true, reason: 'name_match', score };
  }
  return {
    same: false,
    reason: score >= AMBIGUOUS_FLOOR ? 'name_ambiguous' : 'name_mismatch',
    score,
  };
}

export function sameIdentity(
  a: IdentityComparable,
  b: IdentityComparable,
): boolean {
  return compareIdentity(a, b).same;
}
