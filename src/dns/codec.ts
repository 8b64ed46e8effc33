import type { Config } from '../config.js';
import type { DnsLogger } from '../logger.js';
import { safeResult, type Result } from '../result.js';
import { decodeMessage, encodeMessage, type DnsCodecOptions, type DnsMessage } from './message.js';

export interface DnsCodec {
  decode(bytes: Uint8Array): DnsMessage;
  encode(message: DnsMessage): Uint8Array;
  /** Like `decode`, but failures come back as a `Result` and are logged. */
  tryDecode(bytes: Uint8Array): Result<DnsMessage>;
  tryEncode(message: DnsMessage): Result<Uint8Array>;
}

export type DnsCodecConfig = Pick<Config, 'DNS_RANGE_BOUND' | 'DNS_MAX_COMPRESSION_JUMPS'>;

export function createDnsCodec(config: DnsCodecConfig, logger: DnsLogger): DnsCodec {
  const options: DnsCodecOptions = {
    rangeBound: config.DNS_RANGE_BOUND,
    maxCompressionJumps: config.DNS_MAX_COMPRESSION_JUMPS,
    logger,
  };

  const decode = (bytes: Uint8Array): DnsMessage => decodeMessage(bytes, options);
  const encode = (message: DnsMessage): Uint8Array => encodeMessage(message, options);

  return {
    decode,
    encode,
    tryDecode(bytes) {
      const result = safeResult(() => decode(bytes));
      if (!result.ok) {
        logger.warn({ code: result.code, err: result.message, bytes: bytes.length }, 'dns_decode_error');
      }
      return result;
    },
    tryEncode(message) {
      const result = safeResult(() => encode(message));
      if (!result.ok) {
        logger.warn({ code: result.code, err: result.message, id: message.header.id }, 'dns_encode_error');
      }
      return result;
    },
  };
}
