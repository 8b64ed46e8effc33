import { nameForCode } from './enums.js';
import type { PacketBuffer } from './packetBuffer.js';
import {
  QUERY_CLASSES,
  QUERY_CLASS_BY_CODE,
  QUERY_TYPES,
  QUERY_TYPE_BY_CODE,
  type QueryClass,
  type QueryType,
} from './recordTypes.js';

export interface DnsQuestion {
  name: string;
  type: QueryType;
  class: QueryClass;
}

export function readQuestion(buffer: PacketBuffer): DnsQuestion {
  const name = buffer.readDomainName();
  const type = nameForCode('query type', QUERY_TYPE_BY_CODE, buffer.readU16());
  const cls = nameForCode('query class', QUERY_CLASS_BY_CODE, buffer.readU16());
  return { name, type, class: cls };
}

export function writeQuestion(buffer: PacketBuffer, question: DnsQuestion): void {
  buffer.writeDomainName(question.name);
  buffer.writeU16(QUERY_TYPES[question.type]);
  buffer.writeU16(QUERY_CLASSES[question.class]);
}
