/**
 * Source adapter types
 *
 * Each adapter turns one external data provider into PartialRecords for a
 * query. Outcomes are values: adapters never throw past fetch().
 */

import type {
  IngredientQuery,
  PartialRecord,
  SourceId,
} from '../enrichment.types';

export type SourceFetchResult =
  | { status: 'found'; record: PartialRecord }
  | { status: 'not_found' }
  | {
      status: 'unavailable';
      /** Short machine-friendly cause, e.g. 'timeout', 'HTTP 503' */
      reason: string;
      /** True when retries were exhausted on a transient failure */
      retryable: boolean;
    };

export type SourceUnavailable = Extract<
  SourceFetchResult,
  { status: 'unavailable' }
>;

export interface SourceAdapter {
  readonly id: SourceId;
  fetch(query: IngredientQuery, signal?: AbortSignal): Promise<SourceFetchResult>;
}

/** Subset of global fetch used by adapters; stubbed in tests */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;
