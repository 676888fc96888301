import { describe, it } from 'node:test';
import assert from 'node:assert';
import { runWithConcurrency } from './concurrency';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('runWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runWithConcurrency([3, 1, 2, 5, 4], 2, async (n, i) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      for (let k = 0; k < n; k++) await tick();
      inFlight--;
      return `${i}:${n * 10}`;
    });

    assert.deepStrictEqual(results, ['0:30', '1:10', '2:20', '3:50', '4:40']);
    assert.strictEqual(peak, 2);
  });

  it('returns an empty list for no items', async () => {
    let calls = 0;
    const results = await runWithConcurrency([], 4, async () => {
      calls++;
      return 1;
    });
    assert.deepStrictEqual(results, []);
    assert.strictEqual(calls, 0);
  });

  it('treats a concurrency below one as one', async () => {
    let inFlight = 0;
    let peak = 0;
    await runWithConcurrency(['a', 'b', 'c'], 0, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
    });
    assert.strictEqual(peak, 1);
  });
});
