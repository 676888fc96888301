/**
 * Enrichment Orchestrator
 *
 * Drives one request through the pipeline:
 * Start → CacheLookup → (UseCache | FetchAllSources) → Merged →
 * (ReturnPreview | Upsert → CrossSync? → Done) | Failed.
 *
 * Sources are queried concurrently, one lane each; a source that is down
 * only removes its own fields from the result. Every entry point returns a
 * structured result and never throws past its boundary.
 */

import {
  AppError,
  toErrorSummary,
  type AppErrorCode,
} from '@/src/lib/errors/app-error';
import type { IngredientStore } from '@/src/lib/ingredients/ingredientStore.types';
import { createLogger, type Logger } from '@/src/lib/logging/logger';
import { syncIngredient } from '@/src/lib/regulatory/regulatorySync.service';
import { runWithConcurrency } from './concurrency';
import type { EnrichmentConfig } from './enrichment.config';
import {
  SOURCE_IDS,
  type IngredientQuery,
  type MergedCandidate,
  type PartialRecord,
  type SourceId,
} from './enrichment.types';
import { upsertCandidate, type UpsertResult } from './ingredientUpsert';
import type { KeyedMutex } from './keyedMutex';
import { mergePartialRecords } from './mergeEngine';
import { buildQuery, getSearchVariants } from './query';
import type { RateLimiter } from './rateLimiter';
import type { ResponseCache } from './responseCache';
import type { SourceAdapter } from './sources/source.types';

export const CONFLICT_AMBIGUOUS = 'ambiguous identity';

export type PipelineState =
  | 'Start'
  | 'CacheLookup'
  | 'UseCache'
  | 'FetchAllSources'
  | 'Merged'
  | 'ReturnPreview'
  | 'Upsert'
  | 'CrossSync'
  | 'Done'
  | 'Failed';

export type TraceStep = {
  state: PipelineState;
  detail?: string;
};

export type UnavailableSource = {
  source: SourceId;
  reason: string;
  retryable: boolean;
};

export type SearchResult = {
  query: IngredientQuery;
  found: boolean;
  candidate: MergedCandidate | null;
  alternates: MergedCandidate[];
  ambiguous: boolean;
  /** Whether each source contributed data */
  sources: Record<SourceId, boolean>;
  unavailable: UnavailableSource[];
  conflicts: string[];
  /** Set when the search failed outright */
  error?: EnrichError;
  trace: TraceStep[];
};

export type EnrichError = {
  code: AppErrorCode;
  message: string;
};

export type EnrichResult = {
  name: string;
  ok: boolean;
  created: boolean;
  updated: boolean;
  ingredientId: string | null;
  conflicts: string[];
  sources: Record<SourceId, boolean>;
  regulatoryApplied: boolean;
  error?: EnrichError;
  trace: TraceStep[];
};

export type BulkTarget = string[] | 'all-missing';

export type BulkSummary = {
  total: number;
  succeeded: number;
  failed: number;
  created: number;
  updated: number;
};

export type BulkEnrichResult = {
  results: EnrichResult[];
  summary: BulkSummary;
  /** Set when the target list itself could not be loaded */
  error?: EnrichError;
};

export type SearchOptions = {
  casHint?: string | null;
  signal?: AbortSignal;
};

export type EnrichOptions = SearchOptions & {
  overwrite?: boolean;
};

export type BulkEnrichOptions = {
  limit?: number;
  overwrite?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
};

export type EnrichmentServiceDeps = {
  store: IngredientStore;
  adapters: SourceAdapter[];
  cache: ResponseCache;
  limiter: RateLimiter;
  config: EnrichmentConfig;
  lock: KeyedMutex;
  logger?: Logger;
};

export type EnrichmentService = {
  search(name: string, options?: SearchOptions): Promise<SearchResult>;
  enrich(name: string, ownerId: string, options?: EnrichOptions): Promise<EnrichResult>;
  bulkEnrich(
    target: BulkTarget,
    ownerId: string,
    options?: BulkEnrichOptions,
  ): Promise<BulkEnrichResult>;
};

type SourceLaneResult =
  | { status: 'found'; record: PartialRecord; cached: boolean }
  | { status: 'not_found'; cached: boolean }
  | { status: 'unavailable'; reason: string; retryable: boolean };

function noSources(): Record<SourceId, boolean> {
  return { pubchem: false, goodscents: false };
}

/**
 * Run fn with a signal that aborts after timeoutMs or when the caller's
 * signal aborts, whichever comes first.
 */
async function withRequestTimeout<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(
    () =>
      controller.abort(
        new AppError('REQUEST_TIMEOUT', `Request timed out after ${timeoutMs}ms`),
      ),
    Math.max(1, timeoutMs),
  );
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }
  try {
    return await fn(controller.signal);
  } finally {
    clearTimeout(timeoutId);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

function timedOut(signal: AbortSignal): AppError | null {
  const { reason } = signal;
  return signal.aborted &&
    reason instanceof AppError &&
    reason.code === 'REQUEST_TIMEOUT'
    ? reason
    : null;
}

/** Result for a request that failed before reaching the sources */
function earlyFailure(name: string, error: EnrichError): EnrichResult {
  return {
    name,
    ok: false,
    created: false,
    updated: false,
    ingredientId: null,
    conflicts: [],
    sources: noSources(),
    regulatoryApplied: false,
    error,
    trace: [{ state: 'Start' }, { state: 'Failed', detail: error.code }],
  };
}

export function createEnrichmentService(
  deps: EnrichmentServiceDeps,
): EnrichmentService {
  const { store, adapters, cache, limiter, config, lock } = deps;
  const log = deps.logger ?? createLogger('enrichment');

  /** Try each search variant against one source until one is found */
  async function querySource(
    adapter: SourceAdapter,
    query: IngredientQuery,
    signal: AbortSignal,
  ): Promise<SourceLaneResult> {
    let fetched = false;
    for (const variant of getSearchVariants(query)) {
      const variantQuery =
        variant === query.raw ? query : buildQuery(variant, query.casHint);

      const cached = cache.get(variantQuery, adapter.id);
      if (cached.hit) {
        if (cached.record) {
          return { status: 'found', record: cached.record, cached: !fetched };
        }
        continue;
      }

      fetched = true;
      const result = await adapter.fetch(variantQuery, signal);
      switch (result.status) {
        case 'found':
          cache.put(variantQuery, adapter.id, result.record);
          return { status: 'found', record: result.record, cached: false };
        case 'not_found':
          cache.put(variantQuery, adapter.id, null);
          break;
        case 'unavailable':
          log.warn('source unavailable', {
            source: adapter.id,
            query: variantQuery.raw,
            reason: result.reason,
            nextIntervalMs: limiter.currentIntervalMs(adapter.id),
          });
          return result;
      }
    }
    return { status: 'not_found', cached: !fetched };
  }

  async function runSearch(
    name: string,
    options: SearchOptions,
    signal: AbortSignal,
  ): Promise<SearchResult> {
    const query = buildQuery(name, options.casHint);
    const trace: TraceStep[] = [
      { state: 'Start', detail: query.normalized },
      { state: 'CacheLookup' },
    ];

    const lanes = await Promise.all(
      adapters.map(async (adapter) => {
        try {
          return {
            source: adapter.id,
            result: await querySource(adapter, query, signal),
          };
        } catch (err) {
          // a throwing adapter counts as down; the other lanes still merge
          const reason = err instanceof Error ? err.message : String(err);
          log.warn('source lane failed', { source: adapter.id, query: query.raw, reason });
          const result: SourceLaneResult = { status: 'unavailable', reason, retryable: false };
          return { source: adapter.id, result };
        }
      }),
    );

    const allCached = lanes.every(
      ({ result }) => result.status !== 'unavailable' && result.cached,
    );
    trace.push(
      allCached
        ? { state: 'UseCache' }
        : {
            state: 'FetchAllSources',
            detail: lanes
              .filter(({ result }) => result.status === 'unavailable' || !result.cached)
              .map(({ source }) => source)
              .join(','),
          },
    );

    const sources = noSources();
    const records: PartialRecord[] = [];
    const unavailable: UnavailableSource[] = [];
    // merge in fixed source order whatever order the adapters were given in
    for (const source of SOURCE_IDS) {
      for (const lane of lanes) {
        if (lane.source !== source) continue;
        const { result } = lane;
        if (result.status === 'found') {
          sources[source] = true;
          records.push(result.record);
        } else if (result.status === 'unavailable') {
          unavailable.push({
            source,
            reason: result.reason,
            retryable: result.retryable,
          });
        }
      }
    }

    const outcome = mergePartialRecords(records, query);
    trace.push({
      state: 'Merged',
      detail: `${records.length} record(s), ${outcome.alternates.length + (outcome.candidate ? 1 : 0)} group(s)`,
    });

    return {
      query,
      found: outcome.candidate !== null,
      candidate: outcome.candidate,
      alternates: outcome.alternates,
      ambiguous: outcome.ambiguous,
      sources,
      unavailable,
      conflicts: outcome.ambiguous ? [CONFLICT_AMBIGUOUS] : [],
      trace,
    };
  }

  async function search(
    name: string,
    options: SearchOptions = {},
  ): Promise<SearchResult> {
    try {
      const result = await withRequestTimeout(
        config.requestTimeoutMs,
        options.signal,
        (signal) => runSearch(name, options, signal),
      );
      result.trace.push({ state: 'ReturnPreview' });
      return result;
    } catch (err) {
      const error = toErrorSummary(err, 'SOURCE_UNAVAILABLE');
      log.error('unexpected search error', { name, ...error });
      const query = buildQuery(name, options.casHint);
      return {
        query,
        found: false,
        candidate: null,
        alternates: [],
        ambiguous: false,
        sources: noSources(),
        unavailable: [],
        conflicts: [],
        error,
        trace: [
          { state: 'Start', detail: query.normalized },
          { state: 'Failed', detail: error.code },
        ],
      };
    }
  }

  function failed(
    base: Omit<EnrichResult, 'ok' | 'error'>,
    error: EnrichError,
  ): EnrichResult {
    base.trace.push({ state: 'Failed', detail: error.code });
    log.warn('enrichment failed', { name: base.name, ...error });
    return { ...base, ok: false, error };
  }

  async function runEnrich(
    name: string,
    ownerId: string,
    options: EnrichOptions,
    signal: AbortSignal,
  ): Promise<EnrichResult> {
    const found = await runSearch(name, options, signal);
    const base: Omit<EnrichResult, 'ok' | 'error'> = {
      name,
      created: false,
      updated: false,
      ingredientId: null,
      conflicts: [...found.conflicts],
      sources: found.sources,
      regulatoryApplied: false,
      trace: found.trace,
    };

    if (!found.candidate) {
      const timeout = timedOut(signal);
      if (timeout) {
        return failed(base, { code: timeout.code, message: timeout.safeMessage });
      }
      const allDown =
        found.unavailable.length > 0 && found.unavailable.length === adapters.length;
      return failed(
        base,
        allDown
          ? {
              code: 'SOURCE_UNAVAILABLE',
              message: `No source reachable for '${found.query.raw}' (${found.unavailable
                .map((u) => `${u.source}: ${u.reason}`)
                .join(', ')})`,
            }
          : {
              code: 'NOT_FOUND_AT_SOURCE',
              message: `No data found for '${found.query.raw}' in any source`,
            },
      );
    }

    // the caller's name stays the identity; a differing source name is a synonym
    const discovered = found.candidate;
    const candidate: MergedCandidate = {
      ...discovered,
      name: found.query.raw,
      synonyms:
        discovered.name !== found.query.raw
          ? [discovered.name, ...discovered.synonyms]
          : discovered.synonyms,
    };

    base.trace.push({ state: 'Upsert' });
    let upsert: UpsertResult;
    try {
      upsert = await upsertCandidate(store, candidate, ownerId, {
        overwrite: options.overwrite ?? config.overwrite,
        lock,
      });
    } catch (err) {
      return failed(base, toErrorSummary(err, 'PERSISTENCE_FAILURE'));
    }

    base.ingredientId = upsert.ingredientId;
    base.created = upsert.created;
    base.updated = upsert.updated;
    base.conflicts.push(...upsert.conflicts);

    if ((upsert.created || upsert.updated) && upsert.registryNumber) {
      base.trace.push({ state: 'CrossSync', detail: upsert.registryNumber });
      try {
        const sync = await syncIngredient(
          store,
          upsert.ingredientId,
          upsert.registryNumber,
          ownerId,
        );
        base.regulatoryApplied = sync.applied;
      } catch (err) {
        return failed(base, toErrorSummary(err, 'PERSISTENCE_FAILURE'));
      }
    }

    base.trace.push({ state: 'Done' });
    log.info('enriched', {
      name,
      ingredientId: upsert.ingredientId,
      created: upsert.created,
      updated: upsert.updated,
      fields: upsert.changedFields,
      regulatoryApplied: base.regulatoryApplied,
    });
    return { ...base, ok: true };
  }

  async function enrich(
    name: string,
    ownerId: string,
    options: EnrichOptions = {},
  ): Promise<EnrichResult> {
    if (!name.trim()) {
      return earlyFailure(name, {
        code: 'VALIDATION_ERROR',
        message: 'Ingredient name is required',
      });
    }
    try {
      return await withRequestTimeout(
        config.requestTimeoutMs,
        options.signal,
        (signal) => runEnrich(name, ownerId, options, signal),
      );
    } catch (err) {
      const error = toErrorSummary(err, 'PERSISTENCE_FAILURE');
      log.error('unexpected enrichment error', { name, ...error });
      return earlyFailure(name, error);
    }
  }

  async function resolveTargets(
    target: BulkTarget,
    ownerId: string,
    limit: number | undefined,
  ): Promise<string[]> {
    if (target === 'all-missing') {
      const rows = await store.listMissingEnrichment(ownerId, limit);
      return rows.map((row) => row.name);
    }
    const names = target.map((n) => n.trim()).filter((n) => n.length > 0);
    return limit != null ? names.slice(0, limit) : names;
  }

  async function bulkEnrich(
    target: BulkTarget,
    ownerId: string,
    options: BulkEnrichOptions = {},
  ): Promise<BulkEnrichResult> {
    let names: string[];
    try {
      names = await resolveTargets(target, ownerId, options.limit);
    } catch (err) {
      const error = toErrorSummary(err, 'DB_ERROR');
      log.error('could not list ingredients for bulk enrichment', { ownerId, ...error });
      return {
        results: [],
        summary: { total: 0, succeeded: 0, failed: 0, created: 0, updated: 0 },
        error,
      };
    }

    const concurrency = options.concurrency ?? config.bulkConcurrency;
    log.info('bulk enrichment started', { total: names.length, concurrency });

    const results = await runWithConcurrency(names, concurrency, (name) =>
      enrich(name, ownerId, {
        overwrite: options.overwrite,
        signal: options.signal,
      }),
    );

    const summary: BulkSummary = {
      total: results.length,
      succeeded: results.filter((r) => r.ok).length,
      failed: results.filter((r) => !r.ok).length,
      created: results.filter((r) => r.created).length,
      updated: results.filter((r) => r.updated).length,
    };
    log.info('bulk enrichment complete', summary);
    return { results, summary };
  }

  return { search, enrich, bulkEnrich };
}
