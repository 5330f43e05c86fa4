import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createLogger, formatLogLine, getLogLevel, isLogLevel, setLogLevel } from './logger.js';

describe('formatLogLine', () => {
  const now = new Date('2024-07-07T09:30:00.000Z');

  it('prefixes timestamp, scope and level', () => {
    assert.equal(
      formatLogLine('collector', 'warn', 'Video failed', undefined, now),
      '[2024-07-07T09:30:00.000Z] [collector] [warn] Video failed'
    );
  });

  it('appends extra data as JSON', () => {
    assert.equal(
      formatLogLine('db', 'info', 'Saved', { inserted: 2 }, now),
      '[2024-07-07T09:30:00.000Z] [db] [info] Saved {"inserted":2}'
    );
  });
});

describe('createLogger', () => {
  afterEach(() => setLogLevel('info'));

  it('drops messages below the threshold', (t) => {
    const error = t.mock.method(console, 'error', () => {});
    setLogLevel('warn');
    const log = createLogger('test');

    log.info('hidden');
    log.warn('shown');

    assert.equal(error.mock.callCount(), 1);
    const [line] = error.mock.calls[0]?.arguments ?? [];
    assert.equal(typeof line === 'string' && line.endsWith('[test] [warn] shown'), true);
  });

  it('emits debug output once the level allows it', (t) => {
    const error = t.mock.method(console, 'error', () => {});
    setLogLevel('debug');
    createLogger('test').debug('details');

    assert.equal(getLogLevel(), 'debug');
    assert.equal(error.mock.callCount(), 1);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    assert.equal(isLogLevel('error'), true);
    assert.equal(isLogLevel('trace'), false);
    assert.equal(isLogLevel('toString'), false);
  });
});
