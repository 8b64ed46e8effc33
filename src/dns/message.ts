import type { DnsLogger } from '../logger.js';
import { createHeader, readHeader, writeHeader, type DnsHeader } from './header.js';
import { PacketBuffer, type PacketBufferOptions } from './packetBuffer.js';
import { readQuestion, writeQuestion, type DnsQuestion } from './question.js';
import { readRecord, writeRecord, type DnsRecord } from './record.js';

export interface DnsMessage {
  header: DnsHeader;
  questions: DnsQuestion[];
  answers: DnsRecord[];
}

export interface DnsCodecOptions extends PacketBufferOptions {
  logger?: DnsLogger;
}

export function createMessage(): DnsMessage {
  return { header: createHeader(), questions: [], answers: [] };
}

export function readMessage(buffer: PacketBuffer, logger?: DnsLogger): DnsMessage {
  const message = createMessage();
  message.header = readHeader(buffer);

  for (let i = 0; i < message.header.questionCount; i++) {
    message.questions.push(readQuestion(buffer));
  }
  for (let i = 0; i < message.header.answerCount; i++) {
    message.answers.push(readRecord(buffer, logger));
  }

  return message;
}

/**
 * Writes `message` in wire order. The question and answer counts on the wire come
 * from the list lengths; authority and additional sections are not modelled and
 * always go out as zero. `message` itself is left as it was.
 */
export function writeMessage(buffer: PacketBuffer, message: DnsMessage): void {
  writeHeader(buffer, {
    ...message.header,
    questionCount: message.questions.length,
    answerCount: message.answers.length,
    authorityCount: 0,
    additionalCount: 0,
  });
  for (const question of message.questions) {
    writeQuestion(buffer, question);
  }
  for (const answer of message.answers) {
    writeRecord(buffer, answer);
  }
}

export function decodeMessage(bytes: Uint8Array, options: DnsCodecOptions = {}): DnsMessage {
  const buffer = PacketBuffer.from(bytes, options);
  return readMessage(buffer, options.logger);
}

export function encodeMessage(message: DnsMessage, options: DnsCodecOptions = {}): Uint8Array {
  const buffer = new PacketBuffer(options);
  writeMessage(buffer, message);
  return buffer.written();
}
