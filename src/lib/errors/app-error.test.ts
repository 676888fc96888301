import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AppError, isAppError, toErrorSummary } from './app-error';

describe('AppError', () => {
  it('keeps an Error argument as cause', () => {
    const cause = new Error('connection refused');
    const err = new AppError('PERSISTENCE_FAILURE', 'Could not save ingredient', cause);
    assert.strictEqual(err.cause, cause);
    assert.strictEqual(err.details, undefined);
    assert.strictEqual(err.name, 'AppError');
  });

  it('keeps a plain object as details and serializes it', () => {
    const err = new AppError('MALFORMED_FEED_ROW', 'Bad row', { line: 4 });
    assert.deepStrictEqual(err.toJSON(), {
      code: 'MALFORMED_FEED_ROW',
      message: 'Bad row',
      details: { line: 4 },
    });
  });

  it('wraps primitive causes in an Error', () => {
    const err = new AppError('DB_ERROR', 'Query failed', 'timeout');
    assert(err.cause instanceof Error);
    assert.strictEqual(err.cause.message, 'timeout');
  });
});

describe('toErrorSummary', () => {
  it('uses the AppError code and safe message', () => {
    const summary = toErrorSummary(
      new AppError('CONFIG_INVALID', 'Invalid config'),
      'PERSISTENCE_FAILURE',
    );
    assert.deepStrictEqual(summary, {
      code: 'CONFIG_INVALID',
      message: 'Invalid config',
    });
  });

  it('falls back for foreign errors', () => {
    const summary = toErrorSummary(new TypeError('x is undefined'), 'DB_ERROR');
    assert.deepStrictEqual(summary, {
      code: 'DB_ERROR',
      message: 'x is undefined',
    });
    assert.strictEqual(isAppError(new Error('plain')), false);
  });
});
