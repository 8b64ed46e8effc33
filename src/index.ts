export { loadConfig, type Config, type LogLevel } from './config.js';
export { createLogger, type DnsLogger } from './logger.js';
export { err, ok, safeResult, type ErrorCode, type Result } from './result.js';

export { createDnsCodec, type DnsCodec, type DnsCodecConfig } from './dns/codec.js';
export { DnsCodecError, type DnsCodecErrorCode } from './dns/errors.js';
export {
  OPCODES,
  RESPONSE_CODES,
  createHeader,
  readHeader,
  writeHeader,
  type DnsHeader,
  type Opcode,
  type ResponseCode,
} from './dns/header.js';
export { formatIpv4, parseIpv4, type Ipv4Octets } from './dns/ipv4.js';
export {
  createMessage,
  decodeMessage,
  encodeMessage,
  readMessage,
  writeMessage,
  type DnsCodecOptions,
  type DnsMessage,
} from './dns/message.js';
export {
  DEFAULT_MAX_COMPRESSION_JUMPS,
  MAX_LABEL_BYTES,
  PACKET_BUFFER_CAPACITY,
  PacketBuffer,
  type PacketBufferOptions,
  type RangeBoundPolicy,
} from './dns/packetBuffer.js';
export { readQuestion, writeQuestion, type DnsQuestion } from './dns/question.js';
export { readRecord, writeRecord, type DnsARecord, type DnsRecord, type DnsUnknownRecord } from './dns/record.js';
export {
  QUERY_CLASSES,
  QUERY_CLASS_NAMES,
  QUERY_TYPES,
  QUERY_TYPE_NAMES,
  type QueryClass,
  type QueryType,
} from './dns/recordTypes.js';
export { createReply, type ReplyOptions } from './dns/reply.js';
