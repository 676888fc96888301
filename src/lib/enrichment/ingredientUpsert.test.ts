import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  CONFLICT_DUPLICATE,
  CONFLICT_REGISTRY_MISMATCH,
  upsertCandidate,
} from './ingredientUpsert';
import { KeyedMutex } from './keyedMutex';
import type { MergedCandidate, NewIngredient } from './enrichment.types';
import { AppError } from '@/src/lib/errors/app-error';
import { InMemoryIngredientStore } from '@/src/lib/ingredients/ingredientStore.memory';
import { unrestrictedLimits } from '@/src/lib/regulatory/regulatory.types';

function candidate(overrides: Partial<MergedCandidate> = {}): MergedCandidate {
  return {
    name: 'Linalool',
    cas: '78-70-6',
    formula: 'C10H18O',
    odorDescription: 'floral woody citrus',
    provenance: ['pubchem', 'goodscents'],
    synonyms: [],
    ...overrides,
  };
}

function existing(overrides: Partial<NewIngredient> = {}): NewIngredient {
  return {
    name: 'Linalool',
    ownerId: '1',
    limits: unrestrictedLimits(),
    allergen: false,
    notes: 'kept by hand',
    ...overrides,
  };
}

describe('upsertCandidate', () => {
  it('inserts a new ingredient with default limits', async () => {
    const store = new InMemoryIngredientStore();
    const result = await upsertCandidate(store, candidate(), '1', {
      lock: new KeyedMutex(),
    });

    assert.deepStrictEqual(result, {
      ingredientId: 'ing-1',
      created: true,
      updated: false,
      changedFields: ['cas', 'formula', 'odorDescription'],
      conflicts: [],
      registryNumber: '78-70-6',
    });
    const row = await store.findById('ing-1', '1');
    assert.strictEqual(row?.limits.cat5, 100);
    assert.strictEqual(row?.allergen, false);
    assert.strictEqual(row?.notes, 'Enriched from pubchem, goodscents');
  });

  it('notes the sources on an updated row that has no notes yet', async () => {
    const store = new InMemoryIngredientStore();
    const { id } = await store.insert(existing({ cas: '78-70-6', notes: '  ' }));

    await upsertCandidate(store, candidate({ provenance: ['goodscents'] }), '1');

    const row = await store.findById(id, '1');
    assert.strictEqual(row?.formula, 'C10H18O');
    assert.strictEqual(row?.notes, 'Enriched from goodscents');
  });

  it('fills only empty fields by default', async () => {
    const store = new InMemoryIngredientStore();
    const { id } = await store.insert(
      existing({ cas: '78-70-6', odorDescription: 'sweet', formula: '' }),
    );

    const result = await upsertCandidate(store, candidate(), '1');

    assert.strictEqual(result.updated, true);
    assert.deepStrictEqual(result.changedFields, ['formula']);
    const row = await store.findById(id, '1');
    assert.strictEqual(row?.odorDescription, 'sweet');
    assert.strictEqual(row?.formula, 'C10H18O');
    assert.strictEqual(row?.notes, 'kept by hand');
  });

  it('reports a complete row as a duplicate without writing', async () => {
    const store = new InMemoryIngredientStore();
    await upsertCandidate(store, candidate(), '1');

    const again = await upsertCandidate(store, candidate(), '1');

    assert.strictEqual(again.created, false);
    assert.strictEqual(again.updated, false);
    assert.deepStrictEqual(again.conflicts, [CONFLICT_DUPLICATE]);
    assert.strictEqual(store.ingredientCount, 1);
  });

  it('replaces differing fields in overwrite mode but keeps identity and notes', async () => {
    const store = new InMemoryIngredientStore();
    const { id } = await store.insert(
      existing({ name: 'linalool', odorDescription: 'sweet', formula: 'C10H18O' }),
    );

    const result = await upsertCandidate(store, candidate(), '1', {
      overwrite: true,
    });

    assert.deepStrictEqual(result.changedFields, ['cas', 'odorDescription']);
    assert.deepStrictEqual(result.conflicts, []);
    const row = await store.findById(id, '1');
    assert.strictEqual(row?.name, 'linalool');
    assert.strictEqual(row?.odorDescription, 'floral woody citrus');
    assert.strictEqual(row?.notes, 'kept by hand');
  });

  it('refuses to write when the stored CAS number differs', async () => {
    const store = new InMemoryIngredientStore();
    const { id } = await store.insert(existing({ cas: '126-91-0' }));

    const result = await upsertCandidate(store, candidate(), '1', {
      overwrite: true,
    });

    assert.deepStrictEqual(result.conflicts, [CONFLICT_REGISTRY_MISMATCH]);
    assert.strictEqual(result.updated, false);
    const row = await store.findById(id, '1');
    assert.strictEqual(row?.formula, undefined);
  });

  it('records synonyms other than the name', async () => {
    const store = new InMemoryIngredientStore();
    const result = await upsertCandidate(
      store,
      candidate({ synonyms: ['LINALOOL', 'Linalol', 'beta-Linalool'] }),
      '1',
    );
    assert.deepStrictEqual(store.synonymsOf(result.ingredientId), [
      'Linalol',
      'beta-Linalool',
    ]);
  });

  it('creates exactly one row under concurrent upserts of the same name', async () => {
    const store = new InMemoryIngredientStore();
    const lock = new KeyedMutex();

    const results = await Promise.all([
      upsertCandidate(store, candidate(), '1', { lock }),
      upsertCandidate(store, candidate({ name: 'LINALOOL' }), '1', { lock }),
    ]);

    assert.strictEqual(store.ingredientCount, 1);
    assert.deepStrictEqual(
      results.map((r) => r.created),
      [true, false],
    );
  });

  it('reports store failures as PERSISTENCE_FAILURE', async () => {
    class FailingStore extends InMemoryIngredientStore {
      override async findByNameOwner(): Promise<null> {
        throw new Error('connection reset');
      }
    }

    await assert.rejects(
      upsertCandidate(new FailingStore(), candidate(), '1'),
      (err: unknown) =>
        err instanceof AppError &&
        err.code === 'PERSISTENCE_FAILURE' &&
        err.cause instanceof Error &&
        err.cause.message === 'connection reset',
    );
  });
});
