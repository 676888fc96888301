import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  detectDelimiter,
  parseLimitCell,
  parseStandardsFeed,
} from './standardsFeed.parser';
import { unrestrictedLimits } from './regulatory.types';

const HEADER =
  'Name,CAS,Amendment,Type,Risk,Cat 1,Cat 2,Cat 3,Cat 4,Cat 5,Cat 6,Cat 7,Cat 8,Cat 9,Cat 10,Cat 11,Cat 12';

describe('parseLimitCell', () => {
  it('treats blank and no-restriction markers as 100', () => {
    assert.deepStrictEqual(parseLimitCell(''), { ok: true, limit: 100 });
    assert.deepStrictEqual(parseLimitCell('  '), { ok: true, limit: 100 });
    assert.deepStrictEqual(parseLimitCell('N/A'), { ok: true, limit: 100 });
  });

  it('reads numbers with an optional percent sign', () => {
    assert.deepStrictEqual(parseLimitCell('0.5'), { ok: true, limit: 0.5 });
    assert.deepStrictEqual(parseLimitCell('1.2 %'), { ok: true, limit: 1.2 });
    assert.deepStrictEqual(parseLimitCell('0,02%'), { ok: true, limit: 0.02 });
    assert.deepStrictEqual(parseLimitCell('0'), { ok: true, limit: 0 });
  });

  it('maps any other text to prohibited', () => {
    assert.deepStrictEqual(parseLimitCell('Prohibited'), {
      ok: true,
      limit: 'prohibited',
    });
    assert.deepStrictEqual(parseLimitCell('P'), { ok: true, limit: 'prohibited' });
  });

  it('rejects numbers outside 0..100', () => {
    assert.deepStrictEqual(parseLimitCell('150'), {
      ok: false,
      reason: 'limit out of range: 150',
    });
    assert.strictEqual(parseLimitCell('-1').ok, false);
  });
});

describe('detectDelimiter', () => {
  it('picks the most frequent candidate on the header line', () => {
    assert.strictEqual(detectDelimiter('# note, with, commas\nName;CAS;Cat1\n'), ';');
    assert.strictEqual(detectDelimiter('Name\tCAS\tCat1'), '\t');
    assert.strictEqual(detectDelimiter('Name,CAS,Cat1'), ',');
    assert.strictEqual(detectDelimiter('Name'), ',');
  });
});

describe('parseStandardsFeed', () => {
  it('parses a full row with every category', () => {
    const feed = [
      HEADER,
      'Hydroxyisohexyl 3-cyclohexene carboxaldehyde,31906-04-4,49th,Prohibition,Dermal sensitization,P,P,P,P,P,P,P,P,P,P,P,P',
    ].join('\n');

    const { rows, errors } = parseStandardsFeed(feed);

    assert.deepStrictEqual(errors, []);
    assert.strictEqual(rows.length, 1);
    assert.strictEqual(rows[0].cas, '31906-04-4');
    assert.strictEqual(rows[0].amendment, '49th');
    assert.strictEqual(rows[0].restrictionType, 'Prohibition');
    assert.strictEqual(rows[0].riskClass, 'Dermal sensitization');
    assert.strictEqual(rows[0].line, 2);
    for (const limit of Object.values(rows[0].limits)) {
      assert.strictEqual(limit, 'prohibited');
    }
  });

  it('reads semicolon feeds with comments and partial category columns', () => {
    const feed = [
      '# sample feed',
      'name;cas;cat1;CAT 4;Cat12',
      'Citral;5392-40-5;0.11%;;2.5',
    ].join('\n');

    const { rows, errors } = parseStandardsFeed(feed);

    assert.deepStrictEqual(errors, []);
    assert.deepStrictEqual(rows, [
      {
        line: 3,
        cas: '5392-40-5',
        name: 'Citral',
        amendment: null,
        restrictionType: null,
        riskClass: null,
        limits: { ...unrestrictedLimits(), cat1: 0.11, cat12: 2.5 },
      },
    ]);
  });

  it('turns bad rows into row errors and keeps the good ones', () => {
    const feed = [
      'Name,CAS,Cat1',
      'Eugenol,97-53-0,0.5',
      'Unknown,not-a-cas,1',
      ',100-51-6,1',
      'Coumarin,91-64-5,250',
      'Isoeugenol,97-54-1',
      'Benzyl alcohol,100-51-6,',
    ].join('\n');

    const { rows, errors } = parseStandardsFeed(feed);

    assert.deepStrictEqual(
      rows.map((r) => [r.name, r.limits.cat1]),
      [
        ['Eugenol', 0.5],
        ['Benzyl alcohol', 100],
      ],
    );
    assert.deepStrictEqual(errors, [
      { line: 3, reason: 'invalid CAS number: not-a-cas' },
      { line: 4, reason: 'missing name' },
      { line: 5, reason: 'cat1: limit out of range: 250' },
      { line: 6, reason: 'expected 3 columns, got 2' },
    ]);
  });

  it('skips a row with a stray quote and parses the rows around it', () => {
    const feed = [
      'Name,CAS,Cat1',
      'Eugenol,97-53-0,0.5',
      'Oakmoss "extract,90028-68-5,0.1',
      'Coumarin,91-64-5,1.6',
    ].join('\n');

    const { rows, errors } = parseStandardsFeed(feed);

    assert.deepStrictEqual(
      rows.map((r) => [r.name, r.line]),
      [
        ['Eugenol', 2],
        ['Coumarin', 4],
      ],
    );
    assert.strictEqual(errors.length, 1);
    assert.strictEqual(errors[0].line, 3);
    assert.match(errors[0].reason, /^Invalid Opening Quote/);
  });

  it('rejects a header without Name and CAS', () => {
    const { rows, errors } = parseStandardsFeed('Material,Cat1\nEugenol,0.5');
    assert.deepStrictEqual(rows, []);
    assert.deepStrictEqual(errors, [
      { line: 1, reason: 'header must name Name and CAS columns' },
    ]);
  });

  it('reports an empty feed', () => {
    assert.deepStrictEqual(parseStandardsFeed('# only a comment\n'), {
      rows: [],
      errors: [{ line: 0, reason: 'feed is empty' }],
    });
  });
});
