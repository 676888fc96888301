/**
 * Regulatory (IFRA-style) restriction types.
 *
 * Twelve product categories, each holding a maximum usage percentage or the
 * prohibition sentinel. 100 means unrestricted.
 */

import type { AppErrorCode } from '@/src/lib/errors/app-error';

export const CATEGORY_KEYS = [
  'cat1',
  'cat2',
  'cat3',
  'cat4',
  'cat5',
  'cat6',
  'cat7',
  'cat8',
  'cat9',
  'cat10',
  'cat11',
  'cat12',
] as const;

export type CategoryKey = (typeof CATEGORY_KEYS)[number];

export const PROHIBITED = 'prohibited';

/** Percentage limit, or the prohibition sentinel */
export type CategoryLimit = number | typeof PROHIBITED;

export type CategoryLimits = Record<CategoryKey, CategoryLimit>;

export const UNRESTRICTED_LIMIT = 100;

export function unrestrictedLimits(): CategoryLimits {
  return {
    cat1: UNRESTRICTED_LIMIT,
    cat2: UNRESTRICTED_LIMIT,
    cat3: UNRESTRICTED_LIMIT,
    cat4: UNRESTRICTED_LIMIT,
    cat5: UNRESTRICTED_LIMIT,
    cat6: UNRESTRICTED_LIMIT,
    cat7: UNRESTRICTED_LIMIT,
    cat8: UNRESTRICTED_LIMIT,
    cat9: UNRESTRICTED_LIMIT,
    cat10: UNRESTRICTED_LIMIT,
    cat11: UNRESTRICTED_LIMIT,
    cat12: UNRESTRICTED_LIMIT,
  };
}

/** One restriction row per (cas, owner); replaced only by re-import */
export type RegulatoryRecord = {
  cas: string;
  ownerId: string;
  name: string;
  amendment: string | null;
  /** e.g. Prohibition, Restriction, Specification */
  restrictionType: string | null;
  /** e.g. Dermal sensitization, Phototoxicity */
  riskClass: string | null;
  limits: CategoryLimits;
};

/** A feed row that was skipped during import */
export type RowError = {
  /** 1-based line number in the feed */
  line: number;
  reason: string;
};

export type ImportStandardsResult = {
  count: number;
  errors: RowError[];
};

export type SyncSkipReason =
  | 'ingredient_not_found'
  | 'no_registry_number'
  | 'no_standard';

export type SyncError = {
  code: AppErrorCode;
  message: string;
};

export type SyncIngredientResult = {
  applied: boolean;
  /** Set when nothing was applied */
  reason?: SyncSkipReason;
  /** Set when the store failed */
  error?: SyncError;
};

export type SyncAllResult = {
  matched: number;
  updated: number;
  skipped: number;
  failed: number;
  /** Set when the ingredient list could not be loaded */
  error?: SyncError;
};
