import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseIngestArgs, parseNamesList } from './ingest.args';
import { AppError } from '@/src/lib/errors/app-error';

function rejects(argv: string[], message: string): void {
  assert.throws(
    () => parseIngestArgs(argv),
    (err: unknown) => {
      assert.ok(err instanceof AppError);
      assert.strictEqual(err.code, 'VALIDATION_ERROR');
      assert.strictEqual(err.message, message);
      return true;
    },
  );
}

describe('parseIngestArgs', () => {
  it('joins an unquoted multi-word name', () => {
    assert.deepStrictEqual(
      parseIngestArgs(['enrich', 'Iso', 'E', 'Super', '--owner', '7', '--overwrite']),
      {
        command: 'enrich',
        positional: ['Iso E Super'],
        owner: '7',
        overwrite: true,
        dryRun: false,
      },
    );
  });

  it('reads search with a registry hint', () => {
    const args = parseIngestArgs(['search', 'Linalool', '--cas', '78-70-6']);
    assert.strictEqual(args.cas, '78-70-6');
    assert.deepStrictEqual(args.positional, ['Linalool']);
  });

  it('takes the feed path positionally or from --file', () => {
    assert.strictEqual(
      parseIngestArgs(['import-standards', 'feed.csv']).file,
      'feed.csv',
    );
    assert.strictEqual(
      parseIngestArgs(['import-standards', '--file', 'other.csv', '--dry-run']).file,
      'other.csv',
    );
  });

  it('parses bulk limits and the dry-run flag', () => {
    assert.deepStrictEqual(
      parseIngestArgs(['all-missing', '--limit', '25', '--dry-run']),
      { command: 'all-missing', positional: [], limit: 25, dryRun: true },
    );
  });

  it('takes status with an owner', () => {
    assert.deepStrictEqual(parseIngestArgs(['status', '--owner', '3']), {
      command: 'status',
      positional: [],
      owner: '3',
      dryRun: false,
    });
  });

  it('rejects bad input', () => {
    rejects([], 'Missing command');
    rejects(['crawl'], 'Unknown command: crawl');
    rejects(['enrich'], 'enrich needs an ingredient name');
    rejects(['bulk'], 'bulk needs names or --file');
    rejects(['sync-limits'], 'sync-limits needs exactly one ingredient id');
    rejects(['all-missing', '--limit', '0'], '--limit must be a positive integer, got 0');
    rejects(['enrich', 'Linalool', '--owner'], '--owner needs a value');
    rejects(['enrich', 'Linalool', '--verbose'], 'Unknown option: --verbose');
  });
});

describe('parseNamesList', () => {
  it('skips blank lines and comments', () => {
    assert.deepStrictEqual(
      parseNamesList('# florals\nLinalool\r\n\n  Hedione  \n# woods\nIso E Super\n'),
      ['Linalool', 'Hedione', 'Iso E Super'],
    );
  });
});
