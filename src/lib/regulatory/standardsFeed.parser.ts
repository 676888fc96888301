/**
 * Regulatory standards feed parser
 *
 * Delimited text with a header row: Name, CAS, Amendment, Type, Risk,
 * Cat1..Cat12. Headers match case-insensitively with spaces ignored
 * ("Cat 1" = "cat1"). The delimiter is the most frequent of `,` `;` and tab
 * on the header line. Lines starting with `#` are comments.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { isCasNumber } from '@/src/lib/enrichment/query';
import {
  CATEGORY_KEYS,
  PROHIBITED,
  UNRESTRICTED_LIMIT,
  unrestrictedLimits,
  type CategoryKey,
  type CategoryLimit,
  type RegulatoryRecord,
  type RowError,
} from './regulatory.types';

/** One accepted feed row, before an owner is attached */
export type StandardsRow = Omit<RegulatoryRecord, 'ownerId'> & {
  line: number;
};

export type ParsedStandardsFeed = {
  rows: StandardsRow[];
  errors: RowError[];
};

type Column = 'name' | 'cas' | 'amendment' | 'type' | 'risk' | CategoryKey;

const DELIMITERS = [',', ';', '\t'] as const;

/** Cell values that mean "no restriction" besides an empty cell */
const UNRESTRICTED_MARKERS = new Set(['-', 'n/a', 'na', 'nr']);

const NUMERIC = /^-?\d+(?:[.,]\d+)?$/;

const recordsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() }),
  }),
);

function headerKey(value: string): string {
  return value.replace(/^\uFEFF/, '').replace(/\s+/g, '').toLowerCase();
}

const KNOWN_COLUMNS = new Set<string>([
  'name',
  'cas',
  'amendment',
  'type',
  'risk',
  ...CATEGORY_KEYS,
]);

function isColumn(key: string): key is Column {
  return KNOWN_COLUMNS.has(key);
}

export function detectDelimiter(text: string): string {
  const header =
    text
      .split(/\r?\n/)
      .find((line) => line.trim() !== '' && !line.trimStart().startsWith('#')) ??
    '';
  let best: string = ',';
  let bestCount = 0;
  for (const delimiter of DELIMITERS) {
    const count = header.split(delimiter).length - 1;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Blank (or a "no restriction" marker) is 100; a number with optional `%`
 * must lie in [0, 100]; any other text is a prohibition.
 */
export function parseLimitCell(
  value: string,
): { ok: true; limit: CategoryLimit } | { ok: false; reason: string } {
  const v = value.trim();
  if (v === '' || UNRESTRICTED_MARKERS.has(v.toLowerCase())) {
    return { ok: true, limit: UNRESTRICTED_LIMIT };
  }
  const numeric = v.replace(/%$/, '').trim();
  if (NUMERIC.test(numeric)) {
    const limit = Number(numeric.replace(',', '.'));
    if (limit < 0 || limit > 100) {
      return { ok: false, reason: `limit out of range: ${v}` };
    }
    return { ok: true, limit };
  }
  return { ok: true, limit: PROHIBITED };
}

function cellOrNull(value: string | undefined): string | null {
  const v = value?.trim();
  return v ? v : null;
}

function csvErrorLine(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'lines' in err) {
    const { lines } = err;
    if (typeof lines === 'number') return lines;
  }
  return 0;
}

export function parseStandardsFeed(text: string): ParsedStandardsFeed {
  // records csv-parse cannot read (a stray quote, say) are skipped one by one
  const skipped: RowError[] = [];
  let parsed: z.infer<typeof recordsSchema>;
  try {
    parsed = recordsSchema.parse(
      parse(text, {
        delimiter: detectDelimiter(text),
        bom: true,
        comment: '#',
        comment_no_infix: true,
        skip_empty_lines: true,
        relax_column_count: true,
        info: true,
        skip_records_with_error: true,
        on_skip: (err: unknown) => {
          skipped.push({
            line: csvErrorLine(err),
            reason: err instanceof Error ? err.message : 'unreadable record',
          });
          return undefined;
        },
      }),
    );
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { rows: [], errors: [{ line: csvErrorLine(err), reason }] };
  }

  const [header, ...body] = parsed;
  if (!header) {
    return {
      rows: [],
      errors: skipped.length > 0 ? skipped : [{ line: 0, reason: 'feed is empty' }],
    };
  }
  if (skipped.some((e) => e.line <= header.info.lines)) {
    return { rows: [], errors: skipped };
  }

  const columns = new Map<Column, number>();
  header.record.forEach((cell, index) => {
    const key = headerKey(cell);
    if (isColumn(key) && !columns.has(key)) columns.set(key, index);
  });
  const nameIdx = columns.get('name');
  const casIdx = columns.get('cas');
  if (nameIdx === undefined || casIdx === undefined) {
    return {
      rows: [],
      errors: [
        { line: header.info.lines, reason: 'header must name Name and CAS columns' },
      ],
    };
  }

  const width = header.record.length;
  const rows: StandardsRow[] = [];
  const errors: RowError[] = [...skipped];

  for (const { record, info } of body) {
    const line = info.lines;
    if (record.length !== width) {
      errors.push({
        line,
        reason: `expected ${width} columns, got ${record.length}`,
      });
      continue;
    }

    const name = cellOrNull(record[nameIdx]);
    const cas = cellOrNull(record[casIdx]);
    if (!name) {
      errors.push({ line, reason: 'missing name' });
      continue;
    }
    if (!cas || !isCasNumber(cas)) {
      errors.push({ line, reason: cas ? `invalid CAS number: ${cas}` : 'missing CAS number' });
      continue;
    }

    const limits = unrestrictedLimits();
    let rowError: string | null = null;
    for (const key of CATEGORY_KEYS) {
      const idx = columns.get(key);
      if (idx === undefined) continue;
      const cell = parseLimitCell(record[idx] ?? '');
      if (!cell.ok) {
        rowError = `${key}: ${cell.reason}`;
        break;
      }
      limits[key] = cell.limit;
    }
    if (rowError) {
      errors.push({ line, reason: rowError });
      continue;
    }

    const field = (column: Column) => {
      const idx = columns.get(column);
      return idx === undefined ? null : cellOrNull(record[idx]);
    };

    rows.push({
      line,
      cas,
      name,
      amendment: field('amendment'),
      restrictionType: field('type'),
      riskClass: field('risk'),
      limits,
    });
  }

  errors.sort((a, b) => a.line - b.line);
  return { rows, errors };
}
