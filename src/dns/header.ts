import { indexByCode, nameForCode } from './enums.js';
import type { PacketBuffer } from './packetBuffer.js';

export const OPCODES = {
  QUERY: 0,
  IQUERY: 1,
  STATUS: 2,
} as const;

export const RESPONSE_CODES = {
  NoError: 0,
  FormatError: 1,
  ServerFailure: 2,
  NameError: 3,
  NotImplemented: 4,
  Refused: 5,
} as const;

export type Opcode = keyof typeof OPCODES;
export type ResponseCode = keyof typeof RESPONSE_CODES;

const OPCODE_BY_CODE = indexByCode(OPCODES);
const RESPONSE_CODE_BY_CODE = indexByCode(RESPONSE_CODES);

//                                 1  1  1  1  1  1
//   0  1  2  3  4  5  6  7  8  9  0  1  2  3  4  5
// +--+--+--+--+--+--+--+--+--+--+--+--+--+--+--+--+
// |QR|   Opcode  |AA|TC|RD|RA|   Z    |   RCODE   |
// +--+--+--+--+--+--+--+--+--+--+--+--+--+--+--+--+
export interface DnsHeader {
  id: number;
  response: boolean;
  opcode: Opcode;
  authoritative: boolean;
  truncated: boolean;
  recursionDesired: boolean;
  recursionAvailable: boolean;
  rcode: ResponseCode;
  questionCount: number;
  answerCount: number;
  authorityCount: number;
  additionalCount: number;
}

/** An empty reply: id 1234 with only the response flag set. */
export function createHeader(): DnsHeader {
  return {
    id: 1234,
    response: true,
    opcode: 'QUERY',
    authoritative: false,
    truncated: false,
    recursionDesired: false,
    recursionAvailable: false,
    rcode: 'NoError',
    questionCount: 0,
    answerCount: 0,
    authorityCount: 0,
    additionalCount: 0,
  };
}

export function readHeader(buffer: PacketBuffer): DnsHeader {
  const id = buffer.readU16();
  const flags = buffer.readU16();
  const high = flags >>> 8;
  const low = flags & 0xff;

  return {
    id,
    response: (high & 0x80) !== 0,
    opcode: nameForCode('opcode', OPCODE_BY_CODE, (high >>> 3) & 0x0f),
    authoritative: (high & 0x04) !== 0,
    truncated: (high & 0x02) !== 0,
    recursionDesired: (high & 0x01) !== 0,
    recursionAvailable: (low & 0x80) !== 0,
    rcode: nameForCode('rcode', RESPONSE_CODE_BY_CODE, low & 0x0f),
    questionCount: buffer.readU16(),
    answerCount: buffer.readU16(),
    authorityCount: buffer.readU16(),
    additionalCount: buffer.readU16(),
  };
}

export function writeHeader(buffer: PacketBuffer, header: DnsHeader): void {
  buffer.writeU16(header.id);
  buffer.writeByte(
    (header.recursionDesired ? 0x01 : 0) |
      (header.truncated ? 0x02 : 0) |
      (header.authoritative ? 0x04 : 0) |
      (OPCODES[header.opcode] << 3) |
      (header.response ? 0x80 : 0),
  );
  buffer.writeByte(RESPONSE_CODES[header.rcode] | (header.recursionAvailable ? 0x80 : 0));
  buffer.writeU16(header.questionCount);
  buffer.writeU16(header.answerCount);
  buffer.writeU16(header.authorityCount);
  buffer.writeU16(header.additionalCount);
}
