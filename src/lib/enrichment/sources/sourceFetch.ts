/**
 * Rate-limited HTTP with timeout and retry for source adapters.
 *
 * Every attempt first acquires the source's rate-limiter lane. Transient
 * failures (timeout, network, HTTP 429, HTTP 5xx) are retried up to
 * maxAttempts and widen the source's backoff; anything else stops at once.
 * A 404 is a definitive "not found".
 */

import type { Logger } from '@/src/lib/logging/logger';
import type { SourceId } from '../enrichment.types';
import type { RateLimiter } from '../rateLimiter';
import type { FetchFn, SourceFetchResult, SourceUnavailable } from './source.types';

export const FETCH_USER_AGENT =
  'Mozilla/5.0 (compatible; ScentVaultEnrichment/0.1; +ingredient-enrichment)';

/** Outcome of a single attempt */
export type AttemptResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'not_found' }
  | { kind: 'transient'; reason: string }
  | { kind: 'fatal'; reason: string };

export type RetryResult<T> =
  | { status: 'ok'; value: T }
  | Exclude<SourceFetchResult, { status: 'found' }>;

export type RetryOptions = {
  source: SourceId;
  limiter: RateLimiter;
  maxAttempts: number;
  signal?: AbortSignal;
  logger?: Logger;
};

function unavailable(reason: string, retryable: boolean): SourceUnavailable {
  return { status: 'unavailable', reason, retryable };
}

/**
 * Run `attempt` until it succeeds, is definitive, or transient failures
 * exhaust maxAttempts.
 */
export async function withRetry<T>(
  options: RetryOptions,
  attempt: (attemptNo: number) => Promise<AttemptResult<T>>,
): Promise<RetryResult<T>> {
  const { source, limiter, signal, logger } = options;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastReason = 'unavailable';

  for (let attemptNo = 1; attemptNo <= maxAttempts; attemptNo++) {
    try {
      await limiter.acquire(source, signal);
    } catch {
      return unavailable('aborted', false);
    }

    const result = await attempt(attemptNo);
    switch (result.kind) {
      case 'ok':
        limiter.reportSuccess(source);
        return { status: 'ok', value: result.value };
      case 'not_found':
        limiter.reportSuccess(source);
        return { status: 'not_found' };
      case 'fatal':
        logger?.warn('request failed', { source, reason: result.reason });
        return unavailable(result.reason, false);
      case 'transient':
        limiter.reportFailure(source);
        lastReason = result.reason;
        logger?.warn('transient failure', {
          source,
          attempt: attemptNo,
          maxAttempts,
          reason: result.reason,
          nextIntervalMs: limiter.currentIntervalMs(source),
        });
        break;
    }
  }

  return unavailable(lastReason, true);
}

export type HttpRequest = {
  url: string;
  method?: 'GET' | 'POST';
  /** Sent as application/x-www-form-urlencoded when present */
  form?: Record<string, string>;
  accept?: string;
};

export type HttpResponse = {
  status: number;
  body: string;
  /** Final URL after redirects */
  url: string;
};

export type SourceHttpOptions = {
  source: SourceId;
  limiter: RateLimiter;
  timeoutMs: number;
  maxAttempts: number;
  fetchFn?: FetchFn;
  logger?: Logger;
};

export type SourceHttp = {
  request(
    req: HttpRequest,
    signal?: AbortSignal,
  ): Promise<RetryResult<HttpResponse>>;
};

function classifyThrown(err: unknown): AttemptResult<never> {
  const msg = err instanceof Error ? err.message : String(err);
  if (/abort|timeout|ETIMEDOUT|timed out/i.test(msg)) {
    return { kind: 'transient', reason: 'timeout' };
  }
  if (
    /fetch failed|ECONNREFUSED|ENOTFOUND|ECONNRESET|EAI_AGAIN|socket hang up|connection reset|network/i.test(
      msg,
    )
  ) {
    return { kind: 'transient', reason: 'network' };
  }
  const sanitized = msg
    .replace(/https?:\/\/[^\s]+/g, '[url]')
    .slice(0, 50)
    .trim();
  return { kind: 'fatal', reason: sanitized ? `err:${sanitized}` : 'error' };
}

function classifyStatus(status: number): AttemptResult<never> | null {
  if (status === 404) return { kind: 'not_found' };
  if (status === 429) return { kind: 'transient', reason: 'HTTP 429' };
  if (status >= 500) return { kind: 'transient', reason: `HTTP ${status}` };
  if (status >= 400) return { kind: 'fatal', reason: `HTTP ${status}` };
  return null;
}

/**
 * One HTTP attempt bounded by timeoutMs. The caller's signal aborts it too,
 * but is reported as 'aborted' instead of a retryable timeout.
 */
async function attemptOnce(
  fetchFn: FetchFn,
  req: HttpRequest,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<AttemptResult<HttpResponse>> {
  if (signal?.aborted) return { kind: 'fatal', reason: 'aborted' };

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const forwardAbort = () => controller.abort();
  signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    const headers: Record<string, string> = {
      Accept: req.accept ?? 'text/html, application/json;q=0.9, */*;q=0.8',
      'User-Agent': FETCH_USER_AGENT,
    };
    let body: string | undefined;
    if (req.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(req.form).toString();
    }
    const res = await fetchFn(req.url, {
      method: req.method ?? (req.form ? 'POST' : 'GET'),
      headers,
      body,
      signal: controller.signal,
    });
    const byStatus = classifyStatus(res.status);
    if (byStatus) {
      // unread bodies hold the connection open
      await res.body?.cancel();
      return byStatus;
    }
    const text = await res.text();
    return {
      kind: 'ok',
      value: { status: res.status, body: text, url: res.url || req.url },
    };
  } catch (err) {
    if (signal?.aborted) return { kind: 'fatal', reason: 'aborted' };
    return classifyThrown(err);
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', forwardAbort);
  }
}

export function createSourceHttp(options: SourceHttpOptions): SourceHttp {
  const fetchFn: FetchFn = options.fetchFn ?? fetch;
  return {
    request(req, signal) {
      return withRetry(
        {
          source: options.source,
          limiter: options.limiter,
          maxAttempts: options.maxAttempts,
          signal,
          logger: options.logger,
        },
        () => attemptOnce(fetchFn, req, options.timeoutMs, signal),
      );
    },
  };
}
