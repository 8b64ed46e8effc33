import assert from 'node:assert/strict';
import test from 'node:test';

import { loadConfig } from '../src/config.js';
import { createLogger } from '../src/logger.js';

test('loadConfig applies defaults', () => {
  const config = loadConfig({});
  assert.equal(config.LOG_LEVEL, 'info');
  assert.equal(config.DNS_RANGE_BOUND, 'legacy');
  assert.equal(config.DNS_MAX_COMPRESSION_JUMPS, 5);
});

test('loadConfig parses overrides', () => {
  const config = loadConfig({ LOG_LEVEL: 'debug', DNS_RANGE_BOUND: 'exclusive', DNS_MAX_COMPRESSION_JUMPS: '12' });
  assert.equal(config.LOG_LEVEL, 'debug');
  assert.equal(config.DNS_RANGE_BOUND, 'exclusive');
  assert.equal(config.DNS_MAX_COMPRESSION_JUMPS, 12);
});

test('loadConfig rejects unknown policies and levels', () => {
  assert.throws(() => loadConfig({ DNS_RANGE_BOUND: 'inclusive' }), /Invalid configuration/);
  assert.throws(() => loadConfig({ LOG_LEVEL: 'verbose' }), /Invalid configuration/);
});

test('loadConfig validates the jump limit range', () => {
  assert.throws(() => loadConfig({ DNS_MAX_COMPRESSION_JUMPS: '-1' }), /Invalid configuration/);
  assert.throws(() => loadConfig({ DNS_MAX_COMPRESSION_JUMPS: '65' }), /Invalid configuration/);
  assert.throws(() => loadConfig({ DNS_MAX_COMPRESSION_JUMPS: '2.5' }), /Invalid configuration/);
  assert.equal(loadConfig({ DNS_MAX_COMPRESSION_JUMPS: '0' }).DNS_MAX_COMPRESSION_JUMPS, 0);
});

test('createLogger uses the configured level', () => {
  assert.equal(createLogger({ LOG_LEVEL: 'warn' }).level, 'warn');
  assert.equal(createLogger({ LOG_LEVEL: 'silent' }).level, 'silent');
});
