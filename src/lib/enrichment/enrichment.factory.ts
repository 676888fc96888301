import type { IngredientStore } from '@/src/lib/ingredients/ingredientStore.types';
import { createLogger, type LogLevel } from '@/src/lib/logging/logger';
import type { EnrichmentConfig } from './enrichment.config';
import type { SourceId } from './enrichment.types';
import { createEnrichmentService, type EnrichmentService } from './enrichment.service';
import { KeyedMutex } from './keyedMutex';
import { RateLimiter } from './rateLimiter';
import { ResponseCache } from './responseCache';
import { createGoodScentsAdapter } from './sources/good-scents.adapter';
import { createPubChemAdapter } from './sources/pubchem.adapter';
import type { FetchFn } from './sources/source.types';
import { createSourceHttp } from './sources/sourceFetch';

export type BuildEnrichmentOptions = {
  /** Replaces global fetch for every source */
  fetchFn?: FetchFn;
};

/**
 * Wire the process-scoped pieces (limiter, cache, lock) and both source
 * adapters from configuration.
 */
export function buildEnrichmentService(
  config: EnrichmentConfig,
  store: IngredientStore,
  options: BuildEnrichmentOptions = {},
): EnrichmentService {
  const level: LogLevel = config.logLevel;
  const limiter = new RateLimiter({
    minIntervalMs: config.minIntervalMs,
    maxBackoffMultiplier: config.maxBackoffMultiplier,
  });
  const http = (source: SourceId) =>
    createSourceHttp({
      source,
      limiter,
      timeoutMs: config.requestTimeoutMs,
      maxAttempts: config.maxAttempts,
      fetchFn: options.fetchFn,
      logger: createLogger(source, { level }),
    });

  return createEnrichmentService({
    store,
    adapters: [
      createPubChemAdapter({
        http: http('pubchem'),
        logger: createLogger('pubchem', { level }),
      }),
      createGoodScentsAdapter({
        http: http('goodscents'),
        logger: createLogger('goodscents', { level }),
      }),
    ],
    cache: new ResponseCache({ defaultTtlMs: config.cacheTtlMs }),
    limiter,
    config,
    lock: new KeyedMutex(),
    logger: createLogger('enrichment', { level }),
  });
}
