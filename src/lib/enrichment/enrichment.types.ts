/**
 * Ingredient enrichment types
 *
 * Shapes shared by the source adapters, identity matcher, merge engine and
 * orchestrator. Every discovered field is optional: sources are partial and
 * disagree, and a missing field is never an error.
 */

import type { CategoryLimits } from '@/src/lib/regulatory/regulatory.types';

/** External data providers queried by the adapters */
export type SourceId = 'pubchem' | 'goodscents';

/** Fixed query order; also the tie-break order when picking a primary group */
export const SOURCE_IDS: readonly SourceId[] = ['pubchem', 'goodscents'];

/** Normalized request, built once per call by buildQuery() */
export type IngredientQuery = Readonly<{
  /** Trimmed user input, used as display name fallback */
  raw: string;
  /** Case-folded, punctuation collapsed; cache and identity key */
  normalized: string;
  /** Optional CAS number supplied by the caller */
  casHint: string | null;
}>;

export type OdorStrength = 'Low' | 'Medium' | 'High' | 'Extreme';

/** Aroma chemical, essential oil or other natural extract, carrier, solvent */
export const INGREDIENT_TYPES = ['AC', 'EO', 'Carrier', 'Solvent'] as const;

export type IngredientType = (typeof INGREDIENT_TYPES)[number];

/** Fields a source may discover; all optional */
export type EnrichmentFields = {
  name?: string;
  /** Chemical-registry (CAS) number, `\d{2,7}-\d{2}-\d` */
  cas?: string;
  /** Source-assigned numeric identifier (PubChem CID) */
  cid?: number;
  formula?: string;
  molecularWeight?: string;
  /** Structural / IUPAC name */
  iupacName?: string;
  odorDescription?: string;
  odorStrength?: OdorStrength;
  flashPoint?: string;
  appearance?: string;
  solubility?: string;
  logP?: string;
  shelfLife?: string;
  /** EINECS registry cross-reference number */
  einecs?: string;
  /** Inferred from the name and odor profile, never from a source */
  ingredientType?: IngredientType;
  /** Inferred longevity on a strip, e.g. "24+ hours" */
  tenacity?: string;
};

export type EnrichmentFieldKey = keyof EnrichmentFields;

/** Fields written to the store; `name` is identity and handled separately */
export const ENRICHABLE_FIELDS = [
  'cas',
  'cid',
  'formula',
  'molecularWeight',
  'iupacName',
  'odorDescription',
  'odorStrength',
  'flashPoint',
  'appearance',
  'solubility',
  'logP',
  'shelfLife',
  'einecs',
  'ingredientType',
  'tenacity',
] as const satisfies readonly EnrichmentFieldKey[];

export type EnrichableField = (typeof ENRICHABLE_FIELDS)[number];

export type InferredField = 'ingredientType' | 'tenacity';

/** Fields that come from the sources, as opposed to being inferred */
export type SourcedField = Exclude<EnrichableField, InferredField>;

export const SOURCED_FIELDS: readonly SourcedField[] = ENRICHABLE_FIELDS.filter(
  (field): field is SourcedField =>
    field !== 'ingredientType' && field !== 'tenacity',
);

/** Fields discovered by one source for one query */
export type PartialRecord = EnrichmentFields & {
  provenance: SourceId;
  query: IngredientQuery;
  synonyms: string[];
};

/** Union of same-identity partial records with per-field priority applied */
export type MergedCandidate = EnrichmentFields & {
  name: string;
  /** Contributing sources, in SOURCE_IDS order */
  provenance: SourceId[];
  synonyms: string[];
};

/** Result of grouping + resolving the partial records of one request */
export type MergeOutcome = {
  candidate: MergedCandidate | null;
  /** Other identity groups that were not merged into the candidate */
  alternates: MergedCandidate[];
  /** True when the identity matcher split the records into several groups */
  ambiguous: boolean;
};

/** Persistent ingredient row (store boundary shape) */
export type IngredientRecord = Omit<EnrichmentFields, 'name'> & {
  id: string;
  name: string;
  ownerId: string;
  limits: CategoryLimits;
  allergen: boolean;
  notes: string | null;
};

/** Values accepted by store.updateFields() */
export type IngredientFieldset = Partial<
  Pick<IngredientRecord, EnrichableField | 'limits' | 'allergen' | 'notes'>
>;

export type NewIngredient = Omit<IngredientRecord, 'id'>;
