import type { DnsLogger } from '../logger.js';
import { DnsCodecError } from './errors.js';
import { formatIpv4, parseIpv4 } from './ipv4.js';
import type { PacketBuffer } from './packetBuffer.js';
import { QUERY_CLASSES, QUERY_TYPES } from './recordTypes.js';

export interface DnsARecord {
  kind: 'A';
  domain: string;
  address: string;
  ttl: number;
}

/** Any record type without first-class support. RDATA is skipped, not kept. */
export interface DnsUnknownRecord {
  kind: 'Unknown';
  domain: string;
  type: number;
  dataLength: number;
  ttl: number;
}

export type DnsRecord = DnsARecord | DnsUnknownRecord;

export function readRecord(buffer: PacketBuffer, logger?: DnsLogger): DnsRecord {
  const domain = buffer.readDomainName();
  const type = buffer.readU16();
  // Class is assumed to be IN.
  buffer.readU16();
  const ttl = buffer.readU32();
  const dataLength = buffer.readU16();

  switch (type) {
    case QUERY_TYPES.A:
      return { kind: 'A', domain, address: formatIpv4(buffer.readU32()), ttl };
    default:
      buffer.advance(dataLength);
      logger?.debug({ domain, type, dataLength }, 'dns_record_skipped');
      return { kind: 'Unknown', domain, type, dataLength, ttl };
  }
}

/** Returns the number of bytes written. */
export function writeRecord(buffer: PacketBuffer, record: DnsRecord): number {
  const start = buffer.position();

  switch (record.kind) {
    case 'A': {
      const octets = parseIpv4(record.address);
      buffer.writeDomainName(record.domain);
      buffer.writeU16(QUERY_TYPES.A);
      buffer.writeU16(QUERY_CLASSES.IN);
      buffer.writeU32(record.ttl);
      buffer.writeU16(octets.length);
      for (const octet of octets) buffer.writeByte(octet);
      break;
    }
    case 'Unknown':
      // answerCount comes from the list length: every record must reach the wire.
      throw new DnsCodecError(
        'UNSUPPORTED_RECORD',
        `Cannot encode DNS record of unsupported type ${record.type} for ${record.domain}`,
      );
  }

  return buffer.position() - start;
}
