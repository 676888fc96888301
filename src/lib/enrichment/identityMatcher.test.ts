import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  compareIdentity,
  editDistanceRatio,
  levenshtein,
  nameSimilarity,
  sameIdentity,
  tokenSetOverlap,
} from './identityMatcher';

describe('compareIdentity', () => {
  describe('CAS numbers take precedence', () => {
    it('treats equal CAS numbers as the same substance regardless of name', () => {
      assert.deepStrictEqual(
        compareIdentity(
          { name: 'Linalool', cas: '78-70-6' },
          { name: 'Linalyl alcohol', cas: '78-70-6' },
        ),
        { same: true, reason: 'cas_match', score: null },
      );
    });

    it('never merges differing CAS numbers, even with identical names', () => {
      const decision = compareIdentity(
        { name: 'Linalool', cas: '78-70-6' },
        { name: 'Linalool', cas: '126-91-0' },
      );
      assert.strictEqual(decision.same, false);
      assert.strictEqual(decision.reason, 'cas_mismatch');
    });

    it('ignores values that are not CAS numbers', () => {
      const decision = compareIdentity(
        { name: 'Linalool', cas: 'n/a' },
        { name: 'linalool', cas: '78-70-6' },
      );
      assert.deepStrictEqual(decision, {
        same: true,
        reason: 'name_match',
        score: 1,
      });
    });
  });

  describe('name similarity', () => {
    it('matches names that normalize to the same string', () => {
      assert.strictEqual(sameIdentity({ name: 'Galaxolide 50%' }, { name: 'galaxolide 50' }), true);
    });

    it('ignores word order', () => {
      const decision = compareIdentity({ name: 'Alpha Ionone' }, { name: 'ionone, alpha' });
      assert.strictEqual(decision.same, true);
      assert.strictEqual(decision.score, 1);
    });

    it('reports close but distinct names as ambiguous and declines', () => {
      const decision = compareIdentity(
        { name: 'Methyl Ionone' },
        { name: 'Methyl Ionone Gamma' },
      );
      assert.strictEqual(decision.same, false);
      assert.strictEqual(decision.reason, 'name_ambiguous');
    });

    it('rejects a related but different material', () => {
      const decision = compareIdentity({ name: 'Ethyl Vanillin' }, { name: 'Vanillin' });
      assert.strictEqual(decision.same, false);
      assert.strictEqual(decision.reason, 'name_mismatch');
    });

    it('fails closed on a single-word misspelling', () => {
      assert.strictEqual(sameIdentity({ name: 'Linalool' }, { name: 'Linalol' }), false);
    });

    it('needs a name on both sides when CAS cannot decide', () => {
      assert.deepStrictEqual(
        compareIdentity({ cas: '78-70-6' }, { name: 'Linalool' }),
        { same: false, reason: 'insufficient_data', score: null },
      );
    });
  });
});

describe('scoring helpers', () => {
  it('computes Levenshtein distance', () => {
    assert.strictEqual(levenshtein('kitten', 'sitting'), 3);
    assert.strictEqual(levenshtein('', 'abc'), 3);
  });

  it('computes token-set overlap', () => {
    assert.strictEqual(tokenSetOverlap('ethyl vanillin', 'vanillin'), 0.5);
    assert.strictEqual(tokenSetOverlap('rose oxide', 'rose oxide'), 1);
  });

  it('computes edit ratio on token-sorted strings', () => {
    assert.strictEqual(editDistanceRatio('alpha ionone', 'ionone alpha'), 1);
  });

  it('returns 0 when one name normalizes to nothing', () => {
    assert.strictEqual(nameSimilarity('---', 'Linalool'), 0);
  });
});
