/**
 * PubChem PUG REST adapter
 *
 * Chemical properties for an ingredient: name → CID, then formula, weight and
 * IUPAC name, then synonyms (CAS number is picked from the synonym list).
 * Payloads are validated with zod; a missing or renamed field is simply left
 * out of the record.
 *
 * @see https://pubchem.ncbi.nlm.nih.gov/docs/pug-rest
 */

import { z } from 'zod';
import { createLogger, type Logger } from '@/src/lib/logging/logger';
import type { IngredientQuery, PartialRecord } from '../enrichment.types';
import { isCasNumber } from '../query';
import type { SourceHttp } from './sourceFetch';
import type { SourceAdapter, SourceFetchResult } from './source.types';

export const PUBCHEM_BASE = 'https://pubchem.ncbi.nlm.nih.gov/rest/pug';

const PROPERTIES = ['MolecularFormula', 'MolecularWeight', 'IUPACName'];
/** CAS numbers appear early in PubChem's synonym list */
const CAS_SCAN_LIMIT = 20;
const MAX_SYNONYMS = 50;

const cidListSchema = z.object({
  IdentifierList: z.object({
    CID: z.array(z.number().int().positive()),
  }),
});

const propertiesSchema = z.object({
  PropertyTable: z.object({
    Properties: z.array(
      z.object({
        MolecularFormula: z.string().optional(),
        MolecularWeight: z.union([z.string(), z.number()]).optional(),
        IUPACName: z.string().optional(),
      }),
    ),
  }),
});

const synonymsSchema = z.object({
  InformationList: z.object({
    Information: z.array(
      z.object({
        Synonym: z.array(z.string()).optional(),
      }),
    ),
  }),
});

export type PubChemAdapterOptions = {
  http: SourceHttp;
  baseUrl?: string;
  logger?: Logger;
};

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

const malformed = {
  status: 'unavailable',
  reason: 'malformed response',
  retryable: false,
} as const;

export function createPubChemAdapter(
  options: PubChemAdapterOptions,
): SourceAdapter {
  const { http } = options;
  const base = options.baseUrl ?? PUBCHEM_BASE;
  const log = options.logger ?? createLogger('pubchem');

  async function lookupCid(
    term: string,
    signal?: AbortSignal,
  ): Promise<{ cid: number } | Exclude<SourceFetchResult, { status: 'found' }>> {
    const res = await http.request(
      {
        url: `${base}/compound/name/${encodeURIComponent(term)}/cids/JSON`,
        accept: 'application/json',
      },
      signal,
    );
    if (res.status !== 'ok') return res;
    const parsed = cidListSchema.safeParse(parseJson(res.value.body));
    if (!parsed.success) return malformed;
    const [cid] = parsed.data.IdentifierList.CID;
    return cid != null ? { cid } : { status: 'not_found' };
  }

  /** GET a JSON document; 404 and unavailable both yield null */
  async function getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const res = await http.request({ url, accept: 'application/json' }, signal);
    if (res.status !== 'ok') {
      if (res.status === 'unavailable') {
        log.warn('optional lookup failed', { url, reason: res.reason });
      }
      return null;
    }
    return parseJson(res.value.body);
  }

  return {
    id: 'pubchem',

    async fetch(
      query: IngredientQuery,
      signal?: AbortSignal,
    ): Promise<SourceFetchResult> {
      let lookup = await lookupCid(query.raw, signal);
      if ('status' in lookup && lookup.status === 'not_found' && query.casHint) {
        lookup = await lookupCid(query.casHint, signal);
      }
      if ('status' in lookup) {
        log.debug('no compound', { query: query.raw, status: lookup.status });
        return lookup;
      }
      const { cid } = lookup;

      const [propsBody, synonymsBody] = await Promise.all([
        getJson(
          `${base}/compound/cid/${cid}/property/${PROPERTIES.join(',')}/JSON`,
          signal,
        ),
        getJson(`${base}/compound/cid/${cid}/synonyms/JSON`, signal),
      ]);

      const props = propertiesSchema.safeParse(propsBody);
      const properties = props.success
        ? props.data.PropertyTable.Properties[0]
        : undefined;

      const syn = synonymsSchema.safeParse(synonymsBody);
      const synonyms = syn.success
        ? (syn.data.InformationList.Information[0]?.Synonym ?? [])
        : [];

      const cas = synonyms
        .slice(0, CAS_SCAN_LIMIT)
        .find((s) => isCasNumber(s))
        ?.trim();

      const record: PartialRecord = {
        provenance: 'pubchem',
        query,
        name: synonyms[0] ?? query.raw,
        cid,
        cas,
        formula: properties?.MolecularFormula,
        molecularWeight:
          properties?.MolecularWeight != null
            ? String(properties.MolecularWeight)
            : undefined,
        iupacName: properties?.IUPACName,
        synonyms: synonyms.slice(0, MAX_SYNONYMS),
      };
      log.info('found compound', { query: query.raw, cid });
      return { status: 'found', record };
    },
  };
}
