import assert from 'node:assert/strict';
import test from 'node:test';

import { loadConfig } from '../src/config.js';
import { createDnsCodec } from '../src/dns/codec.js';
import { createMessage } from '../src/dns/message.js';
import { safeResult } from '../src/result.js';

function recordingLogger() {
  const entries: Array<{ level: string; obj: unknown; msg?: string }> = [];
  return {
    entries,
    debug: (obj: unknown, msg?: string) => entries.push({ level: 'debug', obj, msg }),
    warn: (obj: unknown, msg?: string) => entries.push({ level: 'warn', obj, msg }),
  };
}

test('createDnsCodec round-trips through the configured buffer', () => {
  const codec = createDnsCodec(loadConfig({}), recordingLogger());
  const message = createMessage();
  message.questions.push({ name: 'example.net', type: 'NS', class: 'IN' });
  message.answers.push({ kind: 'A', domain: 'example.net', address: '198.51.100.1', ttl: 3600 });

  const decoded = codec.decode(codec.encode(message));
  assert.deepEqual(decoded, { ...message, header: { ...message.header, questionCount: 1, answerCount: 1 } });
});

test('tryDecode reports failures as results and logs them', () => {
  const logger = recordingLogger();
  const codec = createDnsCodec(loadConfig({}), logger);

  const result = codec.tryDecode(Uint8Array.from([0, 1, 0x18, 0]));
  assert.deepEqual(result, { ok: false, code: 'UNRECOGNIZED_ENUM_VALUE', message: 'Unrecognized DNS opcode value: 3' });
  assert.deepEqual(logger.entries, [
    {
      level: 'warn',
      obj: { code: 'UNRECOGNIZED_ENUM_VALUE', err: 'Unrecognized DNS opcode value: 3', bytes: 4 },
      msg: 'dns_decode_error',
    },
  ]);
});

test('tryEncode reports unsupported records', () => {
  const logger = recordingLogger();
  const codec = createDnsCodec(loadConfig({}), logger);
  const message = createMessage();
  message.answers.push({ kind: 'Unknown', domain: 'x', type: 99, dataLength: 0, ttl: 0 });

  const result = codec.tryEncode(message);
  assert.equal(result.ok, false);
  assert.equal(result.ok ? undefined : result.code, 'UNSUPPORTED_RECORD');
  assert.equal(logger.entries.length, 1);
  assert.equal(logger.entries[0]!.msg, 'dns_encode_error');
});

test('tryDecode returns the message and logs skipped records at debug', () => {
  const logger = recordingLogger();
  const codec = createDnsCodec(loadConfig({}), logger);
  const bytes = Uint8Array.from([0, 2, 0x80, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 99, 0, 1, 0, 0, 0, 0, 0, 0]);

  const result = codec.tryDecode(bytes);
  assert.equal(result.ok, true);
  assert.deepEqual(result.ok ? result.value.answers : null, [
    { kind: 'Unknown', domain: '', type: 99, dataLength: 0, ttl: 0 },
  ]);
  assert.deepEqual(logger.entries, [
    { level: 'debug', obj: { domain: '', type: 99, dataLength: 0 }, msg: 'dns_record_skipped' },
  ]);
});

test('the configured jump limit reaches the buffer', () => {
  // Question name at 12 points to 18, which points to the root label at 20.
  const bytes = Uint8Array.from([0, 3, 0x80, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0xc0, 18, 0, 1, 0, 1, 0xc0, 20, 0]);

  const strict = createDnsCodec(loadConfig({ DNS_MAX_COMPRESSION_JUMPS: '1' }), recordingLogger());
  assert.equal(strict.tryDecode(bytes).ok, false);

  const lenient = createDnsCodec(loadConfig({}), recordingLogger());
  assert.deepEqual(lenient.decode(bytes).questions, [{ name: '', type: 'A', class: 'IN' }]);
});

test('safeResult maps foreign errors to INTERNAL_ERROR', () => {
  assert.deepEqual(
    safeResult(() => {
      throw new TypeError('boom');
    }),
    { ok: false, code: 'INTERNAL_ERROR', message: 'boom' },
  );
  assert.deepEqual(safeResult(() => 7), { ok: true, value: 7 });
});
