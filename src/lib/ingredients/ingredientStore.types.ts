/**
 * Ingredient Store boundary
 *
 * Persistence contract consumed by the enrichment pipeline and the
 * regulatory cross-sync. Implementations: SupabaseIngredientStore (service
 * role client) and InMemoryIngredientStore (tests, --dry-run).
 */

import {
  ENRICHABLE_FIELDS,
  type IngredientFieldset,
  type IngredientRecord,
  type NewIngredient,
} from '@/src/lib/enrichment/enrichment.types';
import type { RegulatoryRecord } from '@/src/lib/regulatory/regulatory.types';

export interface IngredientStore {
  /** Case-insensitive name lookup within one owner */
  findByNameOwner(name: string, ownerId: string): Promise<IngredientRecord | null>;
  findById(id: string, ownerId: string): Promise<IngredientRecord | null>;
  insert(row: NewIngredient): Promise<IngredientRecord>;
  /** Only the given keys are written */
  updateFields(id: string, fields: IngredientFieldset): Promise<void>;
  listByOwner(ownerId: string): Promise<IngredientRecord[]>;
  /** Ingredients with every enrichable field empty, by name */
  listMissingEnrichment(ownerId: string, limit?: number): Promise<IngredientRecord[]>;
  /** Idempotent; returns how many synonyms were new */
  addSynonyms(ingredientId: string, synonyms: string[]): Promise<number>;
  findRegulatoryByRegistry(cas: string, ownerId: string): Promise<RegulatoryRecord | null>;
  /** Insert or replace the row for (cas, owner) */
  upsertRegulatory(record: RegulatoryRecord): Promise<void>;
}

/** Uniqueness key for (name, owner) */
export function ingredientNameKey(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function isMissingEnrichment(record: IngredientRecord): boolean {
  return ENRICHABLE_FIELDS.every((field) => {
    const value = record[field];
    return value == null || value === '';
  });
}
