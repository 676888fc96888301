/**
 * Enrichment configuration
 *
 * Environment variables (optionally from .env / .env.local via dotenv),
 * validated with zod. Every value has a default; an invalid value fails
 * start-up with CONFIG_INVALID listing each offending variable.
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import type { LogLevel } from '@/src/lib/logging/logger';
import type { SourceId } from './enrichment.types';

export type EnrichmentConfig = {
  /** Minimum spacing between requests per source */
  minIntervalMs: Record<SourceId, number>;
  maxBackoffMultiplier: number;
  maxAttempts: number;
  cacheTtlMs: number;
  requestTimeoutMs: number;
  defaultOwnerId: string;
  overwrite: boolean;
  bulkConcurrency: number;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function parseBoolean(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const v = value.trim().toLowerCase();
  if (v === '') return undefined;
  if (['true', '1', 'yes', 'on'].includes(v)) return true;
  if (['false', '0', 'no', 'off'].includes(v)) return false;
  return value;
}

const int = (defaultValue: number, min: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(min).default(defaultValue),
  );

const envSchema = z.object({
  ENRICH_PUBCHEM_MIN_INTERVAL_MS: int(250, 0),
  ENRICH_GOODSCENTS_MIN_INTERVAL_MS: int(10_000, 0),
  ENRICH_MAX_BACKOFF_MULTIPLIER: int(16, 1),
  ENRICH_MAX_ATTEMPTS: int(3, 1),
  ENRICH_CACHE_TTL_HOURS: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).default(24),
  ),
  ENRICH_REQUEST_TIMEOUT_MS: int(60_000, 1),
  ENRICH_OWNER_ID: z.preprocess(
    blankToUndefined,
    z.string().trim().min(1).default('1'),
  ),
  ENRICH_OVERWRITE: z.preprocess(parseBoolean, z.boolean().default(false)),
  ENRICH_BULK_CONCURRENCY: int(2, 1),
  ENRICH_LOG_LEVEL: z.preprocess(
    (v) => (typeof v === 'string' ? blankToUndefined(v.trim().toLowerCase()) : v),
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  ),
});

const HOUR_MS = 60 * 60 * 1000;

/** Validate configuration from an environment map; no file access */
export function parseEnrichmentConfig(env: Env): EnrichmentConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join('.')}: ${i.message}`,
    );
    throw new AppError(
      'CONFIG_INVALID',
      `Invalid enrichment configuration (${issues.join('; ')})`,
      { issues },
    );
  }
  const e = parsed.data;
  return {
    minIntervalMs: {
      pubchem: e.ENRICH_PUBCHEM_MIN_INTERVAL_MS,
      goodscents: e.ENRICH_GOODSCENTS_MIN_INTERVAL_MS,
    },
    maxBackoffMultiplier: e.ENRICH_MAX_BACKOFF_MULTIPLIER,
    maxAttempts: e.ENRICH_MAX_ATTEMPTS,
    cacheTtlMs: Math.round(e.ENRICH_CACHE_TTL_HOURS * HOUR_MS),
    requestTimeoutMs: e.ENRICH_REQUEST_TIMEOUT_MS,
    defaultOwnerId: e.ENRICH_OWNER_ID,
    overwrite: e.ENRICH_OVERWRITE,
    bulkConcurrency: e.ENRICH_BULK_CONCURRENCY,
    logLevel: e.ENRICH_LOG_LEVEL,
  };
}

/** Load .env, then .env.local on top of it, into process.env */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  loadDotenv({ path: path.join(cwd, '.env') });
  loadDotenv({ path: path.join(cwd, '.env.local'), override: true });
}

export function loadEnrichmentConfig(
  env: Env = process.env,
  cwd?: string,
): EnrichmentConfig {
  loadEnvFiles(cwd);
  return parseEnrichmentConfig(env);
}
