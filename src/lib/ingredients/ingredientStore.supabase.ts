/**
 * Supabase Ingredient Store
 *
 * IngredientStore over the ingredients, ingredient_synonyms and
 * regulatory_standards tables (see supabase/migrations). Query builder only,
 * explicit column lists, rows validated with zod on the way out.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import {
  ENRICHABLE_FIELDS,
  INGREDIENT_TYPES,
  type EnrichableField,
  type IngredientFieldset,
  type IngredientRecord,
  type NewIngredient,
} from '@/src/lib/enrichment/enrichment.types';
import {
  CATEGORY_KEYS,
  PROHIBITED,
  unrestrictedLimits,
  type CategoryLimits,
  type RegulatoryRecord,
} from '@/src/lib/regulatory/regulatory.types';
import {
  ingredientNameKey,
  isMissingEnrichment,
  type IngredientStore,
} from './ingredientStore.types';

const INGREDIENTS_TABLE = 'ingredients';
const SYNONYMS_TABLE = 'ingredient_synonyms';
const REGULATORY_TABLE = 'regulatory_standards';

/** Column per enrichable field */
export const FIELD_COLUMNS: Record<EnrichableField, string> = {
  cas: 'cas',
  cid: 'cid',
  formula: 'formula',
  molecularWeight: 'molecular_weight',
  iupacName: 'iupac_name',
  odorDescription: 'odor_description',
  odorStrength: 'odor_strength',
  flashPoint: 'flash_point',
  appearance: 'appearance',
  solubility: 'solubility',
  logP: 'log_p',
  shelfLife: 'shelf_life',
  einecs: 'einecs',
  ingredientType: 'ingredient_type',
  tenacity: 'tenacity',
};

const INGREDIENT_COLUMNS = [
  'id',
  'owner_id',
  'name',
  ...Object.values(FIELD_COLUMNS),
  'limits',
  'allergen',
  'notes',
].join(', ');

const REGULATORY_COLUMNS =
  'cas, owner_id, name, amendment, restriction_type, risk_class, limits';

const limitSchema = z.union([
  z.number().min(0).max(100),
  z.literal(PROHIBITED),
]);

const limitsSchema = z.record(z.enum(CATEGORY_KEYS), limitSchema);

const text = z.string().nullable();

const ingredientRowSchema = z.object({
  id: z.string(),
  owner_id: z.string(),
  name: z.string(),
  cas: text,
  cid: z.number().int().nullable(),
  formula: text,
  molecular_weight: text,
  iupac_name: text,
  odor_description: text,
  odor_strength: z.enum(['Low', 'Medium', 'High', 'Extreme']).nullable(),
  flash_point: text,
  appearance: text,
  solubility: text,
  log_p: text,
  shelf_life: text,
  einecs: text,
  ingredient_type: z.enum(INGREDIENT_TYPES).nullable(),
  tenacity: text,
  limits: limitsSchema.nullable(),
  allergen: z.boolean(),
  notes: text,
});

export type IngredientRow = z.infer<typeof ingredientRowSchema>;

const regulatoryRowSchema = z.object({
  cas: z.string(),
  owner_id: z.string(),
  name: z.string(),
  amendment: text,
  restriction_type: text,
  risk_class: text,
  limits: limitsSchema,
});

function completeLimits(
  parsed: Partial<CategoryLimits> | null,
): CategoryLimits {
  return { ...unrestrictedLimits(), ...(parsed ?? {}) };
}

function parseRow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  table: string,
): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new AppError('DB_ERROR', `Unexpected row shape in ${table}`, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data;
}

/** Map a database row to an IngredientRecord; nulls become absent fields */
export function fromIngredientRow(data: unknown): IngredientRecord {
  const row = parseRow(ingredientRowSchema, data, INGREDIENTS_TABLE);
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    cas: row.cas ?? undefined,
    cid: row.cid ?? undefined,
    formula: row.formula ?? undefined,
    molecularWeight: row.molecular_weight ?? undefined,
    iupacName: row.iupac_name ?? undefined,
    odorDescription: row.odor_description ?? undefined,
    odorStrength: row.odor_strength ?? undefined,
    flashPoint: row.flash_point ?? undefined,
    appearance: row.appearance ?? undefined,
    solubility: row.solubility ?? undefined,
    logP: row.log_p ?? undefined,
    shelfLife: row.shelf_life ?? undefined,
    einecs: row.einecs ?? undefined,
    ingredientType: row.ingredient_type ?? undefined,
    tenacity: row.tenacity ?? undefined,
    limits: completeLimits(row.limits),
    allergen: row.allergen,
    notes: row.notes,
  };
}

/** Column/value pairs for the keys present in a fieldset */
export function toIngredientColumns(
  fields: IngredientFieldset,
): Record<string, unknown> {
  const columns: Record<string, unknown> = {};
  for (const field of ENRICHABLE_FIELDS) {
    const value = fields[field];
    if (value !== undefined) columns[FIELD_COLUMNS[field]] = value;
  }
  if (fields.limits !== undefined) columns.limits = fields.limits;
  if (fields.allergen !== undefined) columns.allergen = fields.allergen;
  if (fields.notes !== undefined) columns.notes = fields.notes;
  return columns;
}

export function fromRegulatoryRow(data: unknown): RegulatoryRecord {
  const row = parseRow(regulatoryRowSchema, data, REGULATORY_TABLE);
  return {
    cas: row.cas,
    ownerId: row.owner_id,
    name: row.name,
    amendment: row.amendment,
    restrictionType: row.restriction_type,
    riskClass: row.risk_class,
    limits: completeLimits(row.limits),
  };
}

function readFailure(what: string, message: string): AppError {
  return new AppError('DB_ERROR', `Could not load ${what}`, { message });
}

function writeFailure(what: string, message: string): AppError {
  return new AppError('PERSISTENCE_FAILURE', `Could not save ${what}`, {
    message,
  });
}

export class SupabaseIngredientStore implements IngredientStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async findByNameOwner(
    name: string,
    ownerId: string,
  ): Promise<IngredientRecord | null> {
    const { data, error } = await this.supabase
      .from(INGREDIENTS_TABLE)
      .select(INGREDIENT_COLUMNS)
      .eq('owner_id', ownerId)
      .eq('name_key', ingredientNameKey(name))
      .maybeSingle();
    if (error) throw readFailure('ingredient', error.message);
    return data ? fromIngredientRow(data) : null;
  }

  async findById(id: string, ownerId: string): Promise<IngredientRecord | null> {
    const { data, error } = await this.supabase
      .from(INGREDIENTS_TABLE)
      .select(INGREDIENT_COLUMNS)
      .eq('id', id)
      .eq('owner_id', ownerId)
      .maybeSingle();
    if (error) throw readFailure('ingredient', error.message);
    return data ? fromIngredientRow(data) : null;
  }

  async insert(row: NewIngredient): Promise<IngredientRecord> {
    const { data, error } = await this.supabase
      .from(INGREDIENTS_TABLE)
      .insert({
        owner_id: row.ownerId,
        name: row.name,
        name_key: ingredientNameKey(row.name),
        ...toIngredientColumns(row),
      })
      .select(INGREDIENT_COLUMNS)
      .single();
    if (error) throw writeFailure('ingredient', error.message);
    return fromIngredientRow(data);
  }

  async updateFields(id: string, fields: IngredientFieldset): Promise<void> {
    const columns = toIngredientColumns(fields);
    if (Object.keys(columns).length === 0) return;
    const { error } = await this.supabase
      .from(INGREDIENTS_TABLE)
      .update({ ...columns, updated_at: new Date().toISOString() })
      .eq('id', id);
    if (error) throw writeFailure('ingredient', error.message);
  }

  async listByOwner(ownerId: string): Promise<IngredientRecord[]> {
    const { data, error } = await this.supabase
      .from(INGREDIENTS_TABLE)
      .select(INGREDIENT_COLUMNS)
      .eq('owner_id', ownerId)
      .order('name', { ascending: true });
    if (error) throw readFailure('ingredients', error.message);
    return (data ?? []).map(fromIngredientRow);
  }

  async listMissingEnrichment(
    ownerId: string,
    limit?: number,
  ): Promise<IngredientRecord[]> {
    // "all empty" spans thirteen nullable columns; filtering here keeps the
    // query simple and treats '' the same as null
    const rows = (await this.listByOwner(ownerId)).filter(isMissingEnrichment);
    return limit != null ? rows.slice(0, limit) : rows;
  }

  async addSynonyms(ingredientId: string, synonyms: string[]): Promise<number> {
    const byKey = new Map<string, string>();
    for (const synonym of synonyms) {
      const key = ingredientNameKey(synonym);
      if (key && !byKey.has(key)) byKey.set(key, synonym.trim());
    }
    if (byKey.size === 0) return 0;

    const { data, error } = await this.supabase
      .from(SYNONYMS_TABLE)
      .upsert(
        [...byKey].map(([key, synonym]) => ({
          ingredient_id: ingredientId,
          synonym,
          synonym_key: key,
        })),
        { onConflict: 'ingredient_id,synonym_key', ignoreDuplicates: true },
      )
      .select('id');
    if (error) throw writeFailure('synonyms', error.message);
    return data?.length ?? 0;
  }

  async findRegulatoryByRegistry(
    cas: string,
    ownerId: string,
  ): Promise<RegulatoryRecord | null> {
    const { data, error } = await this.supabase
      .from(REGULATORY_TABLE)
      .select(REGULATORY_COLUMNS)
      .eq('cas', cas.trim())
      .eq('owner_id', ownerId)
      .maybeSingle();
    if (error) throw readFailure('regulatory standard', error.message);
    return data ? fromRegulatoryRow(data) : null;
  }

  async upsertRegulatory(record: RegulatoryRecord): Promise<void> {
    const { error } = await this.supabase.from(REGULATORY_TABLE).upsert(
      {
        cas: record.cas.trim(),
        owner_id: record.ownerId,
        name: record.name,
        amendment: record.amendment,
        restriction_type: record.restrictionType,
        risk_class: record.riskClass,
        limits: record.limits,
        updated_at: new Date().toISOString(),
      },
      { onConflict: 'cas,owner_id' },
    );
    if (error) throw writeFailure('regulatory standard', error.message);
  }
}
