import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseEnrichmentConfig } from './enrichment.config';
import { AppError } from '@/src/lib/errors/app-error';

describe('parseEnrichmentConfig', () => {
  it('applies defaults for an empty environment', () => {
    assert.deepStrictEqual(parseEnrichmentConfig({}), {
      minIntervalMs: { pubchem: 250, goodscents: 10_000 },
      maxBackoffMultiplier: 16,
      maxAttempts: 3,
      cacheTtlMs: 24 * 60 * 60 * 1000,
      requestTimeoutMs: 60_000,
      defaultOwnerId: '1',
      overwrite: false,
      bulkConcurrency: 2,
      logLevel: 'info',
    });
  });

  it('reads and coerces overrides', () => {
    const config = parseEnrichmentConfig({
      ENRICH_GOODSCENTS_MIN_INTERVAL_MS: '2000',
      ENRICH_MAX_ATTEMPTS: '5',
      ENRICH_CACHE_TTL_HOURS: '0.5',
      ENRICH_OWNER_ID: ' studio-7 ',
      ENRICH_OVERWRITE: 'yes',
      ENRICH_LOG_LEVEL: 'DEBUG',
    });

    assert.strictEqual(config.minIntervalMs.goodscents, 2000);
    assert.strictEqual(config.maxAttempts, 5);
    assert.strictEqual(config.cacheTtlMs, 30 * 60 * 1000);
    assert.strictEqual(config.defaultOwnerId, 'studio-7');
    assert.strictEqual(config.overwrite, true);
    assert.strictEqual(config.logLevel, 'debug');
  });

  it('treats blank values as unset', () => {
    const config = parseEnrichmentConfig({
      ENRICH_MAX_ATTEMPTS: '',
      ENRICH_OVERWRITE: ' ',
    });
    assert.strictEqual(config.maxAttempts, 3);
    assert.strictEqual(config.overwrite, false);
  });

  it('rejects invalid values with CONFIG_INVALID naming the variables', () => {
    assert.throws(
      () =>
        parseEnrichmentConfig({
          ENRICH_MAX_ATTEMPTS: '0',
          ENRICH_OVERWRITE: 'maybe',
          ENRICH_REQUEST_TIMEOUT_MS: 'soon',
        }),
      (err: unknown) => {
        assert.ok(err instanceof AppError);
        assert.strictEqual(err.code, 'CONFIG_INVALID');
        assert.match(err.message, /ENRICH_MAX_ATTEMPTS/);
        assert.match(err.message, /ENRICH_OVERWRITE/);
        assert.match(err.message, /ENRICH_REQUEST_TIMEOUT_MS/);
        return true;
      },
    );
  });
});
