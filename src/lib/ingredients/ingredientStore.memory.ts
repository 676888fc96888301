/**
 * Process-local IngredientStore used by tests and the CLI's --dry-run.
 * Rows are copied on the way in and out so callers never share state.
 */

import { AppError } from '@/src/lib/errors/app-error';
import type {
  IngredientFieldset,
  IngredientRecord,
  NewIngredient,
} from '@/src/lib/enrichment/enrichment.types';
import type { RegulatoryRecord } from '@/src/lib/regulatory/regulatory.types';
import {
  ingredientNameKey,
  isMissingEnrichment,
  type IngredientStore,
} from './ingredientStore.types';

function copyIngredient(row: IngredientRecord): IngredientRecord {
  return { ...row, limits: { ...row.limits } };
}

function copyRegulatory(row: RegulatoryRecord): RegulatoryRecord {
  return { ...row, limits: { ...row.limits } };
}

function byName(a: IngredientRecord, b: IngredientRecord): number {
  return a.name.localeCompare(b.name);
}

export class InMemoryIngredientStore implements IngredientStore {
  private readonly ingredients = new Map<string, IngredientRecord>();
  private readonly synonyms = new Map<string, Map<string, string>>();
  private readonly regulatory = new Map<string, RegulatoryRecord>();
  private nextId = 1;

  async findByNameOwner(
    name: string,
    ownerId: string,
  ): Promise<IngredientRecord | null> {
    const key = ingredientNameKey(name);
    for (const row of this.ingredients.values()) {
      if (row.ownerId === ownerId && ingredientNameKey(row.name) === key) {
        return copyIngredient(row);
      }
    }
    return null;
  }

  async findById(id: string, ownerId: string): Promise<IngredientRecord | null> {
    const row = this.ingredients.get(id);
    return row && row.ownerId === ownerId ? copyIngredient(row) : null;
  }

  async insert(row: NewIngredient): Promise<IngredientRecord> {
    if (await this.findByNameOwner(row.name, row.ownerId)) {
      throw new AppError('PERSISTENCE_FAILURE', 'Ingredient already exists', {
        name: row.name,
        ownerId: row.ownerId,
      });
    }
    const stored: IngredientRecord = copyIngredient({
      ...row,
      id: `ing-${this.nextId++}`,
    });
    this.ingredients.set(stored.id, stored);
    return copyIngredient(stored);
  }

  async updateFields(id: string, fields: IngredientFieldset): Promise<void> {
    const row = this.ingredients.get(id);
    if (!row) {
      throw new AppError('PERSISTENCE_FAILURE', 'Ingredient not found', { id });
    }
    this.ingredients.set(
      id,
      copyIngredient({
        ...row,
        ...fields,
        limits: fields.limits ?? row.limits,
      }),
    );
  }

  async listByOwner(ownerId: string): Promise<IngredientRecord[]> {
    return [...this.ingredients.values()]
      .filter((row) => row.ownerId === ownerId)
      .sort(byName)
      .map(copyIngredient);
  }

  async listMissingEnrichment(
    ownerId: string,
    limit?: number,
  ): Promise<IngredientRecord[]> {
    const rows = (await this.listByOwner(ownerId)).filter(isMissingEnrichment);
    return limit != null ? rows.slice(0, limit) : rows;
  }

  async addSynonyms(ingredientId: string, synonyms: string[]): Promise<number> {
    if (!this.ingredients.has(ingredientId)) {
      throw new AppError('PERSISTENCE_FAILURE', 'Ingredient not found', {
        id: ingredientId,
      });
    }
    let known = this.synonyms.get(ingredientId);
    if (!known) {
      known = new Map();
      this.synonyms.set(ingredientId, known);
    }
    let added = 0;
    for (const synonym of synonyms) {
      const key = ingredientNameKey(synonym);
      if (!key || known.has(key)) continue;
      known.set(key, synonym.trim());
      added++;
    }
    return added;
  }

  async findRegulatoryByRegistry(
    cas: string,
    ownerId: string,
  ): Promise<RegulatoryRecord | null> {
    const row = this.regulatory.get(`${ownerId}|${cas.trim()}`);
    return row ? copyRegulatory(row) : null;
  }

  async upsertRegulatory(record: RegulatoryRecord): Promise<void> {
    this.regulatory.set(
      `${record.ownerId}|${record.cas.trim()}`,
      copyRegulatory(record),
    );
  }

  /** Recorded synonyms for one ingredient, in insertion order */
  synonymsOf(ingredientId: string): string[] {
    return [...(this.synonyms.get(ingredientId)?.values() ?? [])];
  }

  get ingredientCount(): number {
    return this.ingredients.size;
  }

  get regulatoryCount(): number {
    return this.regulatory.size;
  }
}
