import type { ResponseCode } from './header.js';
import type { DnsMessage } from './message.js';
import type { DnsRecord } from './record.js';

export interface ReplyOptions {
  rcode?: ResponseCode;
  answers?: DnsRecord[];
  authoritative?: boolean;
  recursionAvailable?: boolean;
}

/**
 * Builds the response a server sends back for `query`. The id, opcode, RD bit and
 * question section are echoed; only standard queries are answered with NoError
 * unless `rcode` says otherwise.
 */
export function createReply(query: DnsMessage, options: ReplyOptions = {}): DnsMessage {
  const answers = options.answers ?? [];
  const questions = query.questions.map((question) => ({ ...question }));
  return {
    header: {
      id: query.header.id,
      response: true,
      opcode: query.header.opcode,
      authoritative: options.authoritative ?? false,
      truncated: false,
      recursionDesired: query.header.recursionDesired,
      recursionAvailable: options.recursionAvailable ?? false,
      rcode: options.rcode ?? (query.header.opcode === 'QUERY' ? 'NoError' : 'NotImplemented'),
      questionCount: questions.length,
      answerCount: answers.length,
      authorityCount: 0,
      additionalCount: 0,
    },
    questions,
    answers,
  };
}
