/**
 * Regulatory Cross-Sync
 *
 * Imports restriction standards keyed by CAS number and copies their
 * category limits onto ingredient records. A matched ingredient is also
 * flagged as an allergen. An ingredient without a matching standard keeps
 * its limits.
 */

import { readFile } from 'fs/promises';
import { toErrorSummary } from '@/src/lib/errors/app-error';
import { persist } from '@/src/lib/enrichment/ingredientUpsert';
import { isCasNumber } from '@/src/lib/enrichment/query';
import type { IngredientRecord } from '@/src/lib/enrichment/enrichment.types';
import type { IngredientStore } from '@/src/lib/ingredients/ingredientStore.types';
import { createLogger, type Logger } from '@/src/lib/logging/logger';
import type {
  ImportStandardsResult,
  RowError,
  SyncAllResult,
  SyncIngredientResult,
} from './regulatory.types';
import { parseStandardsFeed } from './standardsFeed.parser';

export type RegulatorySyncOptions = {
  logger?: Logger;
};

function loggerFor(options: RegulatorySyncOptions): Logger {
  return options.logger ?? createLogger('regulatory');
}

/**
 * Upsert one standard per (cas, owner). Rows that fail to parse or to save
 * are returned as row errors; the rest of the feed still imports.
 */
export async function importStandards(
  store: IngredientStore,
  feedText: string,
  ownerId: string,
  options: RegulatorySyncOptions = {},
): Promise<ImportStandardsResult> {
  const log = loggerFor(options);
  const { rows, errors } = parseStandardsFeed(feedText);
  const rowErrors: RowError[] = [...errors];
  let count = 0;

  for (const { line, ...standard } of rows) {
    try {
      await persist('save regulatory standard', () =>
        store.upsertRegulatory({ ...standard, ownerId }),
      );
      count++;
    } catch (err) {
      const { message } = toErrorSummary(err, 'PERSISTENCE_FAILURE');
      rowErrors.push({ line, reason: message });
    }
  }

  rowErrors.sort((a, b) => a.line - b.line);
  for (const e of rowErrors) {
    log.warn('skipped feed row', { line: e.line, reason: e.reason });
  }
  log.info('imported standards', { count, errors: rowErrors.length, ownerId });
  return { count, errors: rowErrors };
}

export async function importStandardsFromFile(
  feedPath: string,
  store: IngredientStore,
  ownerId: string,
  options: RegulatorySyncOptions = {},
): Promise<ImportStandardsResult> {
  let text: string;
  try {
    text = await readFile(feedPath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    loggerFor(options).error('could not read standards feed', { feedPath, reason });
    return { count: 0, errors: [{ line: 0, reason: `cannot read feed: ${reason}` }] };
  }
  return importStandards(store, text, ownerId, options);
}

/**
 * Copy the standard for `cas` onto the ingredient. Store failures propagate
 * as PERSISTENCE_FAILURE.
 */
export async function syncIngredient(
  store: IngredientStore,
  ingredientId: string,
  cas: string,
  ownerId: string,
  options: RegulatorySyncOptions = {},
): Promise<SyncIngredientResult> {
  const registry = cas.trim();
  if (!isCasNumber(registry)) {
    return { applied: false, reason: 'no_registry_number' };
  }

  const standard = await persist('load regulatory standard', () =>
    store.findRegulatoryByRegistry(registry, ownerId),
  );
  if (!standard) {
    return { applied: false, reason: 'no_standard' };
  }

  await persist('save ingredient limits', () =>
    store.updateFields(ingredientId, {
      limits: { ...standard.limits },
      allergen: true,
    }),
  );
  loggerFor(options).debug('applied limits', { ingredientId, cas: registry });
  return { applied: true };
}

/**
 * Sync by ingredient id, reading the CAS number from the stored row. Store
 * failures come back as `error` instead of being thrown.
 */
export async function syncIngredientLimits(
  store: IngredientStore,
  ingredientId: string,
  ownerId: string,
  options: RegulatorySyncOptions = {},
): Promise<SyncIngredientResult> {
  try {
    const ingredient = await persist('load ingredient', () =>
      store.findById(ingredientId, ownerId),
    );
    if (!ingredient) {
      return { applied: false, reason: 'ingredient_not_found' };
    }
    if (!ingredient.cas) {
      return { applied: false, reason: 'no_registry_number' };
    }
    return await syncIngredient(store, ingredient.id, ingredient.cas, ownerId, options);
  } catch (err) {
    const error = toErrorSummary(err, 'PERSISTENCE_FAILURE');
    loggerFor(options).error('limits sync failed', { ingredientId, ...error });
    return { applied: false, error };
  }
}

/**
 * Bulk pass over every ingredient of the owner. Ingredients without a CAS
 * number or without a standard count as skipped; a failed write is counted
 * and the pass continues.
 */
export async function syncAllIngredients(
  store: IngredientStore,
  ownerId: string,
  options: RegulatorySyncOptions = {},
): Promise<SyncAllResult> {
  const log = loggerFor(options);
  const counts: SyncAllResult = { matched: 0, updated: 0, skipped: 0, failed: 0 };
  let ingredients: IngredientRecord[];
  try {
    ingredients = await persist('list ingredients', () => store.listByOwner(ownerId));
  } catch (err) {
    const error = toErrorSummary(err, 'PERSISTENCE_FAILURE');
    log.error('could not list ingredients for limits sync', { ownerId, ...error });
    return { ...counts, error };
  }

  for (const ingredient of ingredients) {
    const cas = ingredient.cas?.trim();
    if (!cas || !isCasNumber(cas)) {
      counts.skipped++;
      continue;
    }
    try {
      const standard = await persist('load regulatory standard', () =>
        store.findRegulatoryByRegistry(cas, ownerId),
      );
      if (!standard) {
        counts.skipped++;
        continue;
      }
      counts.matched++;
      await persist('save ingredient limits', () =>
        store.updateFields(ingredient.id, {
          limits: { ...standard.limits },
          allergen: true,
        }),
      );
      counts.updated++;
    } catch (err) {
      counts.failed++;
      const { message } = toErrorSummary(err, 'PERSISTENCE_FAILURE');
      log.warn('failed to update limits', { name: ingredient.name, message });
    }
  }

  log.info('limits sync complete', { ...counts, ownerId });
  return counts;
}
