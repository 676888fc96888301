/**
 * Coverage counts for one owner's ingredients: how many carry a CAS number
 * and how many an odor profile.
 */

import { isBlank } from '@/src/lib/enrichment/mergeEngine';
import type { IngredientStore } from './ingredientStore.types';

export type IngredientStatus = {
  total: number;
  withCas: number;
  withOdorProfile: number;
  missingEnrichment: number;
  /** Whole percentages, rounded down */
  casPercent: number;
  odorProfilePercent: number;
};

function percent(part: number, total: number): number {
  return Math.floor((100 * part) / Math.max(total, 1));
}

export async function getIngredientStatus(
  store: IngredientStore,
  ownerId: string,
): Promise<IngredientStatus> {
  const ingredients = await store.listByOwner(ownerId);
  const total = ingredients.length;
  const withCas = ingredients.filter((i) => !isBlank(i.cas)).length;
  const withOdorProfile = ingredients.filter((i) => !isBlank(i.odorDescription)).length;
  const missingEnrichment = (await store.listMissingEnrichment(ownerId)).length;
  return {
    total,
    withCas,
    withOdorProfile,
    missingEnrichment,
    casPercent: percent(withCas, total),
    odorProfilePercent: percent(withOdorProfile, total),
  };
}
