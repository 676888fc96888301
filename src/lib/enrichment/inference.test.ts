import { describe, it } from 'node:test';
import assert from 'node:assert';
import { inferIngredientType, inferTenacity } from './inference';

describe('inferIngredientType', () => {
  it('reads natural extracts from the name', () => {
    assert.strictEqual(inferIngredientType('Lavender essential oil'), 'EO');
    assert.strictEqual(inferIngredientType('Lavender EO'), 'EO');
    assert.strictEqual(inferIngredientType('Orris absolute'), 'EO');
  });

  it('reads solvents, carriers and aroma chemicals from the name', () => {
    assert.strictEqual(inferIngredientType('Benzyl alcohol'), 'Solvent');
    assert.strictEqual(inferIngredientType('DPG'), 'Solvent');
    assert.strictEqual(inferIngredientType('Jojoba'), 'Carrier');
    assert.strictEqual(inferIngredientType('Linalyl acetate'), 'AC');
  });

  it('falls back to the odor profile', () => {
    assert.strictEqual(inferIngredientType('Galaxolide', 'clean synthetic musk'), 'AC');
    assert.strictEqual(inferIngredientType('Cistus', 'natural ambery resin'), 'EO');
  });

  it('lets a name match outrank the profile', () => {
    assert.strictEqual(inferIngredientType('Oakmoss absolute', 'synthetic-smelling'), 'EO');
  });

  it('leaves unknown names unset', () => {
    assert.strictEqual(inferIngredientType('Hedione', 'jasmine, airy'), null);
  });
});

describe('inferTenacity', () => {
  it('maps base, top and heart notes', () => {
    assert.strictEqual(inferTenacity('Vetiver'), '24+ hours');
    assert.strictEqual(inferTenacity('Bergamot'), '2-4 hours');
    assert.strictEqual(inferTenacity('Rose'), '6-12 hours');
  });

  it('checks base notes first', () => {
    assert.strictEqual(inferTenacity('Rose musk'), '24+ hours');
  });

  it('leaves unknown names unset', () => {
    assert.strictEqual(inferTenacity('Hedione'), null);
  });
});
