export const DNS_HEADER_BYTES = 12;
export const MAX_POINTER_HOPS = 128;

export interface DnsHeader {
  id: number;
  qr: boolean;
  opcode: number;
  aa: boolean;
  tc: boolean;
  rd: boolean;
  ra: boolean;
  z: number;
  rcode: number;
  qdcount: number;
  ancount: number;
  nscount: number;
  arcount: number;
}

export interface DnsQuestion {
  name: string;
  type: number;
  class: number;
}

export interface DnsRecord {
  name: string;
  type: number;
  class: number;
  ttl: number;
  rdata: Buffer;
}

export interface DnsMessage {
  header: DnsHeader;
  questions: DnsQuestion[];
  answers: DnsRecord[];
}

export type DnsDecodeErrorCode = 'truncated' | 'invalid_label' | 'pointer_loop' | 'pointer_chain_too_long';

export class DnsDecodeError extends Error {
  override name = 'DnsDecodeError';
  readonly code: DnsDecodeErrorCode;

  constructor(code: DnsDecodeErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export type DnsEncodeErrorCode = 'invalid_label' | 'label_too_long' | 'rdata_too_long';

export class DnsEncodeError extends Error {
  override name = 'DnsEncodeError';
  readonly code: DnsEncodeErrorCode;

  constructor(code: DnsEncodeErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export function createDnsHeader(fields: Partial<DnsHeader> = {}): DnsHeader {
  return {
    id: 0,
    qr: false,
    opcode: 0,
    aa: false,
    tc: false,
    rd: false,
    ra: false,
    z: 0,
    rcode: 0,
    qdcount: 0,
    ancount: 0,
    nscount: 0,
    arcount: 0,
    ...fields,
  };
}

export function encodeDnsFlags(header: DnsHeader): number {
  return (
    ((header.qr ? 1 : 0) << 15) |
    ((header.opcode & 0x0f) << 11) |
    ((header.aa ? 1 : 0) << 10) |
    ((header.tc ? 1 : 0) << 9) |
    ((header.rd ? 1 : 0) << 8) |
    ((header.ra ? 1 : 0) << 7) |
    ((header.z & 0x07) << 4) |
    (header.rcode & 0x0f)
  );
}

export function encodeDnsHeader(header: DnsHeader): Buffer {
  const out = Buffer.alloc(DNS_HEADER_BYTES);
  out.writeUInt16BE(header.id & 0xffff, 0);
  out.writeUInt16BE(encodeDnsFlags(header), 2);
  out.writeUInt16BE(header.qdcount & 0xffff, 4);
  out.writeUInt16BE(header.ancount & 0xffff, 6);
  out.writeUInt16BE(header.nscount & 0xffff, 8);
  out.writeUInt16BE(header.arcount & 0xffff, 10);
  return out;
}

export function decodeDnsHeader(message: Buffer): DnsHeader {
  if (message.length < DNS_HEADER_BYTES) {
    throw new DnsDecodeError('truncated', `DNS message too short: ${message.length} < ${DNS_HEADER_BYTES}`);
  }
  const flags = message.readUInt16BE(2);
  return {
    id: message.readUInt16BE(0),
    qr: ((flags >> 15) & 0x1) === 1,
    opcode: (flags >> 11) & 0x0f,
    aa: ((flags >> 10) & 0x1) === 1,
    tc: ((flags >> 9) & 0x1) === 1,
    rd: ((flags >> 8) & 0x1) === 1,
    ra: ((flags >> 7) & 0x1) === 1,
    z: (flags >> 4) & 0x07,
    rcode: flags & 0x0f,
    qdcount: message.readUInt16BE(4),
    ancount: message.readUInt16BE(6),
    nscount: message.readUInt16BE(8),
    arcount: message.readUInt16BE(10),
  };
}

function isAscii(bytes: Buffer): boolean {
  for (let i = 0; i < bytes.length; i += 1) {
    if (bytes[i] >= 0x80) return false;
  }
  return true;
}

function isAsciiString(s: string): boolean {
  for (let i = 0; i < s.length; i += 1) {
    if (s.charCodeAt(i) >= 0x80) return false;
  }
  return true;
}

export function encodeDnsName(name: string): Buffer {
  const labels = name.split('.').filter(Boolean);
  const parts: Buffer[] = [];
  for (const label of labels) {
    if (!isAsciiString(label)) {
      throw new DnsEncodeError('invalid_label', `DNS label is not ASCII: ${JSON.stringify(label.slice(0, 64))}`);
    }
    const bytes = Buffer.from(label, 'latin1');
    // 0xc0 and above would be read back as a compression pointer.
    if (bytes.length >= 0xc0) {
      throw new DnsEncodeError('label_too_long', `DNS label too long: ${bytes.length} bytes`);
    }
    parts.push(Buffer.from([bytes.length]), bytes);
  }
  parts.push(Buffer.from([0x00]));
  return Buffer.concat(parts);
}

export function readDnsName(message: Buffer, offset: number): { name: string; offsetAfter: number } {
  const labels: string[] = [];
  let jumped = false;
  let offsetAfter = offset;
  // Allocate lazily: most queries carry uncompressed names.
  let seenPointers: Set<number> | null = null;

  while (true) {
    if (offset >= message.length) throw new DnsDecodeError('truncated', 'DNS name out of bounds');
    const length = message[offset];

    // Compression pointer (RFC 1035 4.1.4)
    if ((length & 0xc0) === 0xc0) {
      if (offset + 1 >= message.length) throw new DnsDecodeError('truncated', 'DNS name pointer out of bounds');
      const pointer = ((length & 0x3f) << 8) | message[offset + 1];
      if (!seenPointers) seenPointers = new Set<number>();
      if (seenPointers.has(pointer)) throw new DnsDecodeError('pointer_loop', 'DNS name pointer loop');
      if (seenPointers.size >= MAX_POINTER_HOPS) {
        throw new DnsDecodeError('pointer_chain_too_long', 'DNS name pointer chain too long');
      }
      seenPointers.add(pointer);

      if (!jumped) {
        offsetAfter = offset + 2;
        jumped = true;
      }
      offset = pointer;
      continue;
    }

    if (length === 0) {
      offset += 1;
      if (!jumped) offsetAfter = offset;
      break;
    }

    offset += 1;
    if (offset + length > message.length) throw new DnsDecodeError('truncated', 'DNS name label out of bounds');
    const label = message.subarray(offset, offset + length);
    if (!isAscii(label)) throw new DnsDecodeError('invalid_label', 'DNS name label is not ASCII');
    labels.push(label.toString('latin1'));
    offset += length;
    if (!jumped) offsetAfter = offset;
  }

  return { name: labels.join('.'), offsetAfter };
}

export function encodeDnsQuestion(question: DnsQuestion): Buffer {
  const name = encodeDnsName(question.name);
  const out = Buffer.alloc(name.length + 4);
  name.copy(out, 0);
  out.writeUInt16BE(question.type & 0xffff, name.length);
  out.writeUInt16BE(question.class & 0xffff, name.length + 2);
  return out;
}

export function readDnsQuestion(message: Buffer, offset: number): { question: DnsQuestion; offsetAfter: number } {
  const nameResult = readDnsName(message, offset);
  const current = nameResult.offsetAfter;
  if (current + 4 > message.length) throw new DnsDecodeError('truncated', 'DNS question out of bounds');
  return {
    question: {
      name: nameResult.name,
      type: message.readUInt16BE(current),
      class: message.readUInt16BE(current + 2),
    },
    offsetAfter: current + 4,
  };
}

export function encodeDnsRecord(record: DnsRecord): Buffer {
  if (record.rdata.length > 0xffff) {
    throw new DnsEncodeError('rdata_too_long', `DNS rdata too long: ${record.rdata.length} bytes`);
  }
  const name = encodeDnsName(record.name);
  const out = Buffer.alloc(name.length + 10 + record.rdata.length);
  name.copy(out, 0);
  let offset = name.length;
  out.writeUInt16BE(record.type & 0xffff, offset);
  out.writeUInt16BE(record.class & 0xffff, offset + 2);
  out.writeUInt32BE(record.ttl >>> 0, offset + 4);
  out.writeUInt16BE(record.rdata.length, offset + 8);
  offset += 10;
  record.rdata.copy(out, offset);
  return out;
}

export function readDnsRecord(message: Buffer, offset: number): { record: DnsRecord; offsetAfter: number } {
  const nameResult = readDnsName(message, offset);
  const current = nameResult.offsetAfter;
  if (current + 10 > message.length) throw new DnsDecodeError('truncated', 'DNS resource record out of bounds');
  const type = message.readUInt16BE(current);
  const cls = message.readUInt16BE(current + 2);
  const ttl = message.readUInt32BE(current + 4);
  const rdlength = message.readUInt16BE(current + 8);
  const rdataOffset = current + 10;
  const offsetAfter = rdataOffset + rdlength;
  if (offsetAfter > message.length) throw new DnsDecodeError('truncated', 'DNS resource record rdata out of bounds');
  return {
    // Copy so the record does not pin the (possibly much larger) datagram buffer.
    record: { name: nameResult.name, type, class: cls, ttl, rdata: Buffer.from(message.subarray(rdataOffset, offsetAfter)) },
    offsetAfter,
  };
}

export function encodeDnsMessage(message: DnsMessage): Buffer {
  const header = encodeDnsHeader({
    ...message.header,
    qdcount: message.questions.length,
    ancount: message.answers.length,
    nscount: 0,
    arcount: 0,
  });
  return Buffer.concat([header, ...message.questions.map(encodeDnsQuestion), ...message.answers.map(encodeDnsRecord)]);
}

export function decodeDnsMessage(data: Buffer): DnsMessage {
  const header = decodeDnsHeader(data);
  const message: DnsMessage = { header, questions: [], answers: [] };

  let offset = DNS_HEADER_BYTES;
  for (let i = 0; i < header.qdcount; i += 1) {
    const result = readDnsQuestion(data, offset);
    message.questions.push(result.question);
    offset = result.offsetAfter;
  }

  for (let i = 0; i < header.ancount; i += 1) {
    const result = readDnsRecord(data, offset);
    message.answers.push(result.record);
    offset = result.offsetAfter;
  }

  // Authority and additional sections are never consumed.
  return message;
}
