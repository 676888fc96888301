/**
 * Merge Engine
 *
 * Groups the partial records of one request by identity and resolves each
 * group into a single candidate using a fixed per-field source priority.
 */

import {
  SOURCED_FIELDS,
  SOURCE_IDS,
  type EnrichmentFields,
  type IngredientQuery,
  type MergeOutcome,
  type MergedCandidate,
  type PartialRecord,
  type SourceId,
  type SourcedField,
} from './enrichment.types';
import { inferIngredientType, inferTenacity } from './inference';
import { isCasNumber, normalizeIngredientName } from './query';
import { nameSimilarity, sameIdentity } from './identityMatcher';

const MAX_SYNONYMS = 50;

/** Source whose value wins for each field; the other source fills gaps */
export const FIELD_PRIORITY: Record<SourcedField | 'name', SourceId> = {
  cas: 'pubchem',
  cid: 'pubchem',
  formula: 'pubchem',
  molecularWeight: 'pubchem',
  iupacName: 'pubchem',
  name: 'goodscents',
  odorDescription: 'goodscents',
  odorStrength: 'goodscents',
  appearance: 'goodscents',
  flashPoint: 'goodscents',
  einecs: 'goodscents',
  shelfLife: 'goodscents',
  solubility: 'goodscents',
  logP: 'goodscents',
};

/** null, undefined and blank strings count as "no value" */
export function isBlank(value: unknown): boolean {
  if (value == null) return true;
  return typeof value === 'string' && value.trim() === '';
}

function registryOf(record: PartialRecord): string | null {
  const cas = record.cas?.trim();
  return cas && isCasNumber(cas) ? cas : null;
}

/**
 * Union-find over all record pairs. Identity is transitive through the
 * union, but a union that would put two different CAS numbers in one group
 * is refused.
 */
export function groupByIdentity(records: PartialRecord[]): PartialRecord[][] {
  const parent = records.map((_, i) => i);
  const groupCas = records.map(registryOf);

  const find = (i: number): number => {
    let root = i;
    while (parent[root] !== root) root = parent[root];
    while (parent[i] !== root) {
      const next = parent[i];
      parent[i] = root;
      i = next;
    }
    return root;
  };

  for (let i = 0; i < records.length; i++) {
    for (let j = i + 1; j < records.length; j++) {
      if (!sameIdentity(records[i], records[j])) continue;
      const rootI = find(i);
      const rootJ = find(j);
      if (rootI === rootJ) continue;
      const casI = groupCas[rootI];
      const casJ = groupCas[rootJ];
      if (casI && casJ && casI !== casJ) continue;
      // keep the lower index as root so groups come out in input order
      const [root, child] = rootI < rootJ ? [rootI, rootJ] : [rootJ, rootI];
      parent[child] = root;
      groupCas[root] = casI ?? casJ;
    }
  }

  const groups = new Map<number, PartialRecord[]>();
  records.forEach((record, i) => {
    const root = find(i);
    const group = groups.get(root);
    if (group) group.push(record);
    else groups.set(root, [record]);
  });
  return [...groups.values()];
}

function byPriority(
  group: PartialRecord[],
  primary: SourceId,
): PartialRecord[] {
  return [
    ...group.filter((r) => r.provenance === primary),
    ...group.filter((r) => r.provenance !== primary),
  ];
}

function assignField<K extends SourcedField>(
  target: EnrichmentFields,
  group: PartialRecord[],
  field: K,
): void {
  for (const record of byPriority(group, FIELD_PRIORITY[field])) {
    const found: EnrichmentFields = record;
    const value = found[field];
    if (!isBlank(value)) {
      target[field] = value;
      return;
    }
  }
}

function mergeSynonyms(group: PartialRecord[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const record of group) {
    for (const synonym of record.synonyms) {
      const trimmed = synonym.trim();
      const key = normalizeIngredientName(trimmed);
      if (!key || seen.has(key)) continue;
      seen.add(key);
      out.push(trimmed);
      if (out.length >= MAX_SYNONYMS) return out;
    }
  }
  return out;
}

/**
 * Type and tenacity from the user's input, then from the resolved name.
 * Only keys that were inferred are returned.
 */
function inferFields(
  fallbackName: string,
  name: string,
  odorDescription: string | undefined,
): Pick<EnrichmentFields, 'ingredientType' | 'tenacity'> {
  const inferred: Pick<EnrichmentFields, 'ingredientType' | 'tenacity'> = {};
  const ingredientType =
    inferIngredientType(fallbackName, odorDescription) ??
    inferIngredientType(name, odorDescription);
  if (ingredientType) inferred.ingredientType = ingredientType;
  const tenacity = inferTenacity(fallbackName) ?? inferTenacity(name);
  if (tenacity) inferred.tenacity = tenacity;
  return inferred;
}

/** Resolve one identity group; the name falls back to the user's input */
export function resolveCandidate(
  group: PartialRecord[],
  fallbackName: string,
): MergedCandidate {
  const fields: EnrichmentFields = {};
  for (const field of SOURCED_FIELDS) {
    assignField(fields, group, field);
  }

  const name =
    byPriority(group, FIELD_PRIORITY.name)
      .map((r) => r.name?.trim())
      .find((n): n is string => Boolean(n)) ?? fallbackName;

  Object.assign(fields, inferFields(fallbackName, name, fields.odorDescription));

  return {
    ...fields,
    name,
    provenance: SOURCE_IDS.filter((s) =>
      group.some((r) => r.provenance === s),
    ),
    synonyms: mergeSynonyms(group),
  };
}

function rankCandidate(
  candidate: MergedCandidate,
  query: IngredientQuery,
): number {
  // a caller-supplied CAS outranks any name score
  if (query.casHint && candidate.cas === query.casHint) return 2;
  return nameSimilarity(candidate.name, query.raw);
}

/**
 * Merge all partial records for one request. The primary candidate is the
 * group most similar to the query; ties go to the group with the chemical
 * source, then to input order. Several groups make the outcome ambiguous.
 */
export function mergePartialRecords(
  records: PartialRecord[],
  query: IngredientQuery,
): MergeOutcome {
  if (records.length === 0) {
    return { candidate: null, alternates: [], ambiguous: false };
  }

  const candidates = groupByIdentity(records).map((group) =>
    resolveCandidate(group, query.raw),
  );

  let best = 0;
  let bestScore = rankCandidate(candidates[0], query);
  for (let i = 1; i < candidates.length; i++) {
    const score = rankCandidate(candidates[i], query);
    const beatsTie =
      score === bestScore &&
      candidates[i].provenance.includes('pubchem') &&
      !candidates[best].provenance.includes('pubchem');
    if (score > bestScore || beatsTie) {
      best = i;
      bestScore = score;
    }
  }

  return {
    candidate: candidates[best],
    alternates: candidates.filter((_, i) => i !== best),
    ambiguous: candidates.length > 1,
  };
}
