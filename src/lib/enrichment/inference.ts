/**
 * Keyword inference of ingredient type and tenacity
 *
 * Neither source reports these, so they are guessed from the ingredient name
 * (and, for the type, the odor description). Rules are tried in file order;
 * the first matching rule wins and no match leaves the field unset.
 */

import { z } from 'zod';
import inferenceTable from './data/ingredient-inference.json';
import { INGREDIENT_TYPES, type IngredientType } from './enrichment.types';

const keywords = z.array(z.string().min(1)).default([]);

const inferenceSchema = z.object({
  types: z.array(
    z.object({
      type: z.enum(INGREDIENT_TYPES),
      nameKeywords: keywords,
      profileKeywords: keywords,
    }),
  ),
  tenacity: z.array(
    z.object({
      tenacity: z.string().min(1),
      nameKeywords: keywords,
    }),
  ),
});

const RULES = inferenceSchema.parse(inferenceTable);

/** Lowercased and space-padded so " eo " also matches at either end */
function haystack(text: string | null | undefined): string {
  return ` ${(text ?? '').toLowerCase().replace(/\s+/g, ' ').trim()} `;
}

function mentions(text: string, words: string[]): boolean {
  return words.some((word) => text.includes(word));
}

export function inferIngredientType(
  name: string,
  odorDescription?: string | null,
): IngredientType | null {
  const n = haystack(name);
  const p = haystack(odorDescription);
  // name rules outrank profile rules wherever they sit in the table
  const byName = RULES.types.find((rule) => mentions(n, rule.nameKeywords));
  if (byName) return byName.type;
  const byProfile = RULES.types.find((rule) => mentions(p, rule.profileKeywords));
  return byProfile?.type ?? null;
}

export function inferTenacity(name: string): string | null {
  const n = haystack(name);
  return RULES.tenacity.find((rule) => mentions(n, rule.nameKeywords))?.tenacity ?? null;
}
