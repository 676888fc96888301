import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  fromIngredientRow,
  fromRegulatoryRow,
  toIngredientColumns,
} from './ingredientStore.supabase';
import { AppError } from '@/src/lib/errors/app-error';

function ingredientRow(overrides: Record<string, unknown> = {}) {
  return {
    id: '5b0c1c4e-0000-4000-8000-000000000001',
    owner_id: '1',
    name: 'Linalool',
    cas: '78-70-6',
    cid: 6549,
    formula: 'C10H18O',
    molecular_weight: '154.25',
    iupac_name: null,
    odor_description: 'floral woody citrus',
    odor_strength: 'Medium',
    flash_point: null,
    appearance: null,
    solubility: null,
    log_p: null,
    shelf_life: null,
    einecs: null,
    ingredient_type: 'AC',
    tenacity: null,
    limits: { cat1: 'prohibited', cat4: 2.5 },
    allergen: true,
    notes: null,
    ...overrides,
  };
}

describe('fromIngredientRow', () => {
  it('maps columns to record fields', () => {
    const record = fromIngredientRow(ingredientRow());

    assert.strictEqual(record.ownerId, '1');
    assert.strictEqual(record.cid, 6549);
    assert.strictEqual(record.molecularWeight, '154.25');
    assert.strictEqual(record.odorStrength, 'Medium');
    assert.strictEqual(record.iupacName, undefined);
    assert.strictEqual(record.ingredientType, 'AC');
    assert.strictEqual(record.tenacity, undefined);
    assert.strictEqual(record.allergen, true);
  });

  it('fills absent categories with the unrestricted limit', () => {
    const { limits } = fromIngredientRow(ingredientRow());
    assert.strictEqual(limits.cat1, 'prohibited');
    assert.strictEqual(limits.cat4, 2.5);
    assert.strictEqual(limits.cat12, 100);

    assert.strictEqual(fromIngredientRow(ingredientRow({ limits: null })).limits.cat1, 100);
  });

  it('rejects rows with an unexpected shape', () => {
    assert.throws(
      () => fromIngredientRow(ingredientRow({ limits: { cat1: 140 } })),
      (err: unknown) => err instanceof AppError && err.code === 'DB_ERROR',
    );
    assert.throws(() => fromIngredientRow(ingredientRow({ odor_strength: 'Loud' })), AppError);
  });
});

describe('toIngredientColumns', () => {
  it('writes only the keys present, under their column names', () => {
    assert.deepStrictEqual(
      toIngredientColumns({ odorDescription: 'sweet', logP: '2.97', allergen: false }),
      { odor_description: 'sweet', log_p: '2.97', allergen: false },
    );
  });

  it('maps the inferred fields', () => {
    assert.deepStrictEqual(
      toIngredientColumns({ ingredientType: 'EO', tenacity: '24+ hours' }),
      { ingredient_type: 'EO', tenacity: '24+ hours' },
    );
  });

  it('keeps explicit nulls', () => {
    assert.deepStrictEqual(toIngredientColumns({ notes: null }), { notes: null });
  });
});

describe('fromRegulatoryRow', () => {
  it('maps a regulatory standard row', () => {
    const record = fromRegulatoryRow({
      cas: '31906-04-4',
      owner_id: '1',
      name: 'Hydroxyisohexyl 3-cyclohexene carboxaldehyde',
      amendment: '49',
      restriction_type: 'Prohibition',
      risk_class: 'Dermal sensitization',
      limits: { cat1: 'prohibited', cat2: 'prohibited' },
    });

    assert.strictEqual(record.restrictionType, 'Prohibition');
    assert.strictEqual(record.limits.cat2, 'prohibited');
    assert.strictEqual(record.limits.cat3, 100);
  });
});
