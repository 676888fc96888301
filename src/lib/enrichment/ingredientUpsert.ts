/**
 * Fill-missing upsert of a merged candidate into the ingredient store.
 *
 * Runs under a per-(name, owner) lock so two enrichments of the same
 * ingredient cannot interleave their read and write. Default mode only fills
 * empty fields; overwrite mode replaces every field the candidate has, except
 * identity (id, name, owner). A stored CAS number that disagrees with the
 * candidate blocks the write. The contributing sources are noted on the row
 * unless it already carries notes.
 */

import { AppError, isAppError } from '@/src/lib/errors/app-error';
import {
  ingredientNameKey,
  type IngredientStore,
} from '@/src/lib/ingredients/ingredientStore.types';
import { unrestrictedLimits } from '@/src/lib/regulatory/regulatory.types';
import {
  ENRICHABLE_FIELDS,
  type EnrichableField,
  type EnrichmentFields,
  type IngredientFieldset,
  type IngredientRecord,
  type MergedCandidate,
} from './enrichment.types';
import { KeyedMutex } from './keyedMutex';
import { isBlank } from './mergeEngine';
import { isCasNumber } from './query';

export const CONFLICT_REGISTRY_MISMATCH = 'registry number mismatch';
export const CONFLICT_DUPLICATE = 'duplicate ingredient';

export type UpsertOptions = {
  overwrite?: boolean;
  /** Shared across callers; defaults to a process-wide lock */
  lock?: KeyedMutex;
};

export type UpsertResult = {
  ingredientId: string;
  created: boolean;
  updated: boolean;
  changedFields: EnrichableField[];
  conflicts: string[];
  /** CAS number on the stored row after the write, if any */
  registryNumber: string | null;
};

const processLock = new KeyedMutex();

function copyField<K extends EnrichableField>(
  target: EnrichmentFields,
  source: EnrichmentFields,
  field: K,
): void {
  target[field] = source[field];
}

/** Wrap anything a store throws as PERSISTENCE_FAILURE */
export async function persist<T>(what: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    if (isAppError(err) && err.code === 'PERSISTENCE_FAILURE') throw err;
    throw new AppError('PERSISTENCE_FAILURE', `Could not ${what}`, err);
  }
}

/** Audit note naming the sources a candidate was built from */
export function provenanceNote(candidate: MergedCandidate): string {
  return `Enriched from ${candidate.provenance.join(', ')}`;
}

function validCas(value: string | undefined): string | null {
  const cas = value?.trim();
  return cas && isCasNumber(cas) ? cas : null;
}

/** Fields the candidate would write onto the existing row */
function planChanges(
  existing: IngredientRecord,
  candidate: MergedCandidate,
  overwrite: boolean,
): { patch: EnrichmentFields; changed: EnrichableField[] } {
  const patch: EnrichmentFields = {};
  const changed: EnrichableField[] = [];
  for (const field of ENRICHABLE_FIELDS) {
    const incoming = candidate[field];
    if (isBlank(incoming)) continue;
    const current = existing[field];
    const write = overwrite ? current !== incoming : isBlank(current);
    if (write) {
      copyField(patch, candidate, field);
      changed.push(field);
    }
  }
  return { patch, changed };
}

async function recordSynonyms(
  store: IngredientStore,
  ingredientId: string,
  candidate: MergedCandidate,
): Promise<void> {
  const nameKey = ingredientNameKey(candidate.name);
  const synonyms = candidate.synonyms.filter(
    (s) => ingredientNameKey(s) !== nameKey,
  );
  if (synonyms.length === 0) return;
  await persist('record synonyms', () =>
    store.addSynonyms(ingredientId, synonyms),
  );
}

export async function upsertCandidate(
  store: IngredientStore,
  candidate: MergedCandidate,
  ownerId: string,
  options: UpsertOptions = {},
): Promise<UpsertResult> {
  const overwrite = options.overwrite ?? false;
  const lock = options.lock ?? processLock;
  const key = `${ownerId}|${ingredientNameKey(candidate.name)}`;

  return lock.runExclusive(key, async () => {
    const existing = await persist('load ingredient', () =>
      store.findByNameOwner(candidate.name, ownerId),
    );

    if (!existing) {
      const fields: EnrichmentFields = {};
      const changedFields: EnrichableField[] = [];
      for (const field of ENRICHABLE_FIELDS) {
        if (isBlank(candidate[field])) continue;
        copyField(fields, candidate, field);
        changedFields.push(field);
      }
      const inserted = await persist('save ingredient', () =>
        store.insert({
          ...fields,
          name: candidate.name,
          ownerId,
          limits: unrestrictedLimits(),
          allergen: false,
          notes: provenanceNote(candidate),
        }),
      );
      await recordSynonyms(store, inserted.id, candidate);
      return {
        ingredientId: inserted.id,
        created: true,
        updated: false,
        changedFields,
        conflicts: [],
        registryNumber: validCas(inserted.cas),
      };
    }

    const storedCas = validCas(existing.cas);
    const incomingCas = validCas(candidate.cas);
    if (storedCas && incomingCas && storedCas !== incomingCas) {
      return {
        ingredientId: existing.id,
        created: false,
        updated: false,
        changedFields: [],
        conflicts: [CONFLICT_REGISTRY_MISMATCH],
        registryNumber: storedCas,
      };
    }

    const { patch, changed } = planChanges(existing, candidate, overwrite);
    if (changed.length > 0) {
      const update: IngredientFieldset = { ...patch };
      if (isBlank(existing.notes)) update.notes = provenanceNote(candidate);
      await persist('save ingredient', () =>
        store.updateFields(existing.id, update),
      );
    }
    await recordSynonyms(store, existing.id, candidate);

    return {
      ingredientId: existing.id,
      created: false,
      updated: changed.length > 0,
      changedFields: changed,
      conflicts: changed.length === 0 && !overwrite ? [CONFLICT_DUPLICATE] : [],
      registryNumber: validCas(patch.cas) ?? storedCas,
    };
  });
}
