import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createLogger, parseLogLevel } from './logger';

function createRecorder() {
  const lines: Array<{ level: string; args: unknown[] }> = [];
  const record =
    (level: string) =>
    (...args: unknown[]) => {
      lines.push({ level, args });
    };
  return {
    lines,
    sink: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
    },
  };
}

describe('createLogger', () => {
  it('prefixes the tag and drops lines below the level', () => {
    const { lines, sink } = createRecorder();
    const log = createLogger('pubchem', { level: 'info', sink });

    log.debug('not shown');
    log.info('lookup done', { cid: 6549 });
    log.error('failed');

    assert.deepStrictEqual(lines, [
      { level: 'info', args: ['[pubchem] lookup done', { cid: 6549 }] },
      { level: 'error', args: ['[pubchem] failed'] },
    ]);
  });

  it('emits nothing when silent', () => {
    const { lines, sink } = createRecorder();
    const log = createLogger('x', { level: 'silent', sink });
    log.error('boom');
    assert.strictEqual(lines.length, 0);
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively and defaults to info', () => {
    assert.strictEqual(parseLogLevel(' DEBUG '), 'debug');
    assert.strictEqual(parseLogLevel('verbose'), 'info');
    assert.strictEqual(parseLogLevel(undefined), 'info');
  });
});
