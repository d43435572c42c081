import { createDnsHeader, encodeDnsMessage, type DnsMessage } from './codec.js';
import { DNS_RCODES } from './recordTypes.js';

/**
 * Answers `request` with SERVFAIL: same id, opcode and RD bit, the question section
 * echoed back as decoded, and no answers.
 */
export function buildServfailResponse(request: DnsMessage): Buffer {
  const header = createDnsHeader({
    id: request.header.id,
    qr: true,
    opcode: request.header.opcode,
    rd: request.header.rd,
    rcode: DNS_RCODES.SERVFAIL,
    qdcount: request.questions.length,
  });
  return encodeDnsMessage({ header, questions: request.questions, answers: [] });
}
