import assert from 'node:assert/strict';
import test from 'node:test';

import {
  DnsDecodeError,
  DnsEncodeError,
  createDnsHeader,
  decodeDnsHeader,
  decodeDnsMessage,
  encodeDnsHeader,
  encodeDnsMessage,
  encodeDnsName,
  encodeDnsQuestion,
  encodeDnsRecord,
  readDnsName,
  readDnsQuestion,
  readDnsRecord,
} from '../src/dns/codec.js';

function decodeErrorWithCode(code: string) {
  return (err: unknown) => {
    assert.ok(err instanceof DnsDecodeError);
    assert.equal(err.code, code);
    return true;
  };
}

function encodeErrorWithCode(code: string) {
  return (err: unknown) => {
    assert.ok(err instanceof DnsEncodeError);
    assert.equal(err.code, code);
    return true;
  };
}

test('encodeDnsHeader packs id, flags and counts in network order', () => {
  const header = createDnsHeader({ id: 1234, rd: true, qdcount: 1 });
  assert.deepEqual(
    encodeDnsHeader(header),
    Buffer.from([0x04, 0xd2, 0x01, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00]),
  );
});

test('encodeDnsHeader places every flag at its bit position', () => {
  const header = createDnsHeader({ qr: true, opcode: 0x0f, aa: true, tc: true, rd: true, ra: true, z: 7, rcode: 0x0f });
  const bytes = encodeDnsHeader(header);
  assert.equal(bytes.readUInt16BE(2), 0xffff);

  const opcodeOnly = encodeDnsHeader(createDnsHeader({ opcode: 2 }));
  assert.equal(opcodeOnly.readUInt16BE(2), 0x1000);

  const zOnly = encodeDnsHeader(createDnsHeader({ z: 5 }));
  assert.equal(zOnly.readUInt16BE(2), 0x0050);
});

test('encodeDnsHeader masks out-of-range values to their field width', () => {
  const bytes = encodeDnsHeader(createDnsHeader({ id: 0x1_0001, opcode: 0x11, rcode: 0x12, qdcount: 0x1_0002 }));
  assert.equal(bytes.readUInt16BE(0), 1);
  assert.equal(bytes.readUInt16BE(2), (1 << 11) | 2);
  assert.equal(bytes.readUInt16BE(4), 2);
});

test('decodeDnsHeader reads a standard response header', () => {
  const bytes = Buffer.from([0xab, 0xcd, 0x81, 0x83, 0x00, 0x01, 0x00, 0x02, 0x00, 0x03, 0x00, 0x04, 0xff]);
  assert.deepEqual(decodeDnsHeader(bytes), {
    id: 0xabcd,
    qr: true,
    opcode: 0,
    aa: false,
    tc: false,
    rd: true,
    ra: true,
    z: 0,
    rcode: 3,
    qdcount: 1,
    ancount: 2,
    nscount: 3,
    arcount: 4,
  });
});

test('decodeDnsHeader rejects fewer than 12 bytes', () => {
  assert.throws(() => decodeDnsHeader(Buffer.alloc(11)), decodeErrorWithCode('truncated'));
  assert.throws(() => decodeDnsHeader(Buffer.alloc(11)), /DNS message too short: 11 < 12/);
});

test('encodeDnsName writes length-prefixed labels and a terminating zero', () => {
  assert.deepEqual(encodeDnsName('example.com'), Buffer.from('076578616d706c6503636f6d00', 'hex'));
  assert.deepEqual(encodeDnsName('example.com.'), Buffer.from('076578616d706c6503636f6d00', 'hex'));
  assert.deepEqual(encodeDnsName(''), Buffer.from([0x00]));
  assert.deepEqual(encodeDnsName('.'), Buffer.from([0x00]));
});

test('encodeDnsName does not enforce the 63-byte label limit', () => {
  const label = 'a'.repeat(100);
  const bytes = encodeDnsName(label);
  assert.equal(bytes[0], 100);
  assert.equal(bytes.length, 102);
  assert.equal(encodeDnsName('b'.repeat(191))[0], 191);
});

test('encodeDnsName rejects labels that would collide with the pointer tag', () => {
  assert.throws(() => encodeDnsName('c'.repeat(192)), encodeErrorWithCode('label_too_long'));
});

test('encodeDnsName rejects non-ASCII labels', () => {
  assert.throws(() => encodeDnsName('café.example'), encodeErrorWithCode('invalid_label'));
  assert.throws(() => encodeDnsName('例え.jp'), encodeErrorWithCode('invalid_label'));
});

test('readDnsName returns the name and the offset after the terminator', () => {
  const bytes = Buffer.concat([Buffer.from([0xaa, 0xbb]), encodeDnsName('www.example.com'), Buffer.from([0x00, 0x01])]);
  assert.deepEqual(readDnsName(bytes, 2), { name: 'www.example.com', offsetAfter: 19 });
});

test('readDnsName follows a compression pointer to an earlier label', () => {
  const bytes = Buffer.concat([
    Buffer.alloc(12),
    encodeDnsName('example'), // offsets 12..20
    Buffer.from([0xc0, 0x0c]), // offset 21
    Buffer.from([0x03]),
    Buffer.from('www', 'ascii'),
    Buffer.from([0xc0, 0x0c]), // offset 23
  ]);

  assert.deepEqual(readDnsName(bytes, 21), { name: 'example', offsetAfter: 23 });
  assert.deepEqual(readDnsName(bytes, 23), { name: 'www.example', offsetAfter: 29 });
});

test('readDnsName stops at the first pointer when reporting offsetAfter', () => {
  // offset 12: "com" ; offset 17: "example" -> ptr(12) ; offset 27: "www" -> ptr(17)
  const bytes = Buffer.concat([
    Buffer.alloc(12),
    encodeDnsName('com'),
    Buffer.from([0x07]),
    Buffer.from('example', 'ascii'),
    Buffer.from([0xc0, 0x0c]),
    Buffer.from([0x03]),
    Buffer.from('www', 'ascii'),
    Buffer.from([0xc0, 0x11]),
  ]);

  assert.deepEqual(readDnsName(bytes, 27), { name: 'www.example.com', offsetAfter: 33 });
});

test('readDnsName follows forward pointers', () => {
  const bytes = Buffer.concat([Buffer.from([0xc0, 0x02]), encodeDnsName('later')]);
  assert.deepEqual(readDnsName(bytes, 0), { name: 'later', offsetAfter: 2 });
});

test('readDnsName rejects a pointer that targets itself', () => {
  const bytes = Buffer.concat([Buffer.alloc(12), Buffer.from([0xc0, 0x0c])]);
  assert.throws(() => readDnsName(bytes, 12), decodeErrorWithCode('pointer_loop'));
});

test('readDnsName rejects a pointer cycle through several names', () => {
  // offset 0: "a" -> ptr(4) ; offset 4: "b" -> ptr(0)
  const bytes = Buffer.from([0x01, 0x61, 0xc0, 0x04, 0x01, 0x62, 0xc0, 0x00]);
  assert.throws(() => readDnsName(bytes, 0), decodeErrorWithCode('pointer_loop'));
});

function pointerChain(hops: number, tail: Buffer): Buffer {
  const base = 12;
  const chain = Buffer.alloc(hops * 2);
  for (let i = 0; i < hops; i += 1) {
    const target = base + (i + 1) * 2;
    chain.writeUInt16BE(0xc000 | target, i * 2);
  }
  return Buffer.concat([Buffer.alloc(base), chain, tail]);
}

test('readDnsName accepts a chain of exactly 128 pointer hops', () => {
  const bytes = pointerChain(128, encodeDnsName('a'));
  assert.deepEqual(readDnsName(bytes, 12), { name: 'a', offsetAfter: 14 });
});

test('readDnsName rejects pointer chains longer than 128 hops', () => {
  const bytes = pointerChain(129, encodeDnsName('a'));
  assert.throws(() => readDnsName(bytes, 12), decodeErrorWithCode('pointer_chain_too_long'));
});

test('readDnsName rejects reads past the end of the buffer', () => {
  assert.throws(() => readDnsName(Buffer.from([0x05, 0x61, 0x62]), 0), decodeErrorWithCode('truncated'));
  assert.throws(() => readDnsName(Buffer.from([0x01, 0x61]), 0), decodeErrorWithCode('truncated'));
  assert.throws(() => readDnsName(Buffer.from([0xc0]), 0), decodeErrorWithCode('truncated'));
  assert.throws(() => readDnsName(Buffer.from([0xc0, 0x10]), 0), decodeErrorWithCode('truncated'));
});

test('readDnsName rejects labels containing bytes >= 0x80', () => {
  assert.throws(() => readDnsName(Buffer.from([0x02, 0x61, 0x80, 0x00]), 0), decodeErrorWithCode('invalid_label'));
});

test('question codec round trips and reports the offset after type/class', () => {
  const encoded = encodeDnsQuestion({ name: 'example.com', type: 28, class: 1 });
  assert.deepEqual(encoded, Buffer.from('076578616d706c6503636f6d00001c0001', 'hex'));

  const bytes = Buffer.concat([Buffer.alloc(12), encoded, Buffer.from([0xee])]);
  assert.deepEqual(readDnsQuestion(bytes, 12), {
    question: { name: 'example.com', type: 28, class: 1 },
    offsetAfter: 12 + encoded.length,
  });
});

test('readDnsQuestion rejects a missing type/class', () => {
  const bytes = Buffer.concat([encodeDnsName('example.com'), Buffer.from([0x00, 0x01, 0x00])]);
  assert.throws(() => readDnsQuestion(bytes, 0), decodeErrorWithCode('truncated'));
});

test('record codec round trips with opaque rdata', () => {
  const record = { name: 'example.com', type: 1, class: 1, ttl: 3600, rdata: Buffer.from([93, 184, 216, 34]) };
  const encoded = encodeDnsRecord(record);
  assert.deepEqual(encoded, Buffer.from('076578616d706c6503636f6d0000010001' + '00000e10' + '0004' + '5db8d822', 'hex'));
  assert.deepEqual(readDnsRecord(encoded, 0), { record, offsetAfter: encoded.length });
});

test('encodeDnsRecord writes the ttl as an unsigned 32-bit value', () => {
  const encoded = encodeDnsRecord({ name: '', type: 16, class: 1, ttl: 0xffff_ffff, rdata: Buffer.alloc(0) });
  assert.deepEqual(encoded, Buffer.from('00' + '0010' + '0001' + 'ffffffff' + '0000', 'hex'));
});

test('encodeDnsRecord rejects rdata longer than 65535 bytes', () => {
  const record = { name: 'big.example', type: 16, class: 1, ttl: 0, rdata: Buffer.alloc(0x1_0000) };
  assert.throws(() => encodeDnsRecord(record), encodeErrorWithCode('rdata_too_long'));
});

test('readDnsRecord rejects rdata that runs past the buffer', () => {
  const encoded = encodeDnsRecord({ name: 'a', type: 1, class: 1, ttl: 1, rdata: Buffer.from([1, 2, 3, 4]) });
  assert.throws(() => readDnsRecord(encoded.subarray(0, encoded.length - 1), 0), decodeErrorWithCode('truncated'));
  assert.throws(() => readDnsRecord(encoded.subarray(0, 10), 0), decodeErrorWithCode('truncated'));
});

test('encodeDnsMessage packs an example.com A query with RD set', () => {
  const bytes = encodeDnsMessage({
    header: createDnsHeader({ id: 1234, rd: true }),
    questions: [{ name: 'example.com', type: 1, class: 1 }],
    answers: [],
  });
  assert.deepEqual(
    bytes,
    Buffer.from('04d2' + '0100' + '0001' + '0000' + '0000' + '0000' + '076578616d706c6503636f6d00' + '0001' + '0001', 'hex'),
  );
});

test('encodeDnsMessage derives counts from the sections it writes', () => {
  const bytes = encodeDnsMessage({
    header: createDnsHeader({ id: 1, qdcount: 9, ancount: 9, nscount: 9, arcount: 9 }),
    questions: [],
    answers: [{ name: 'x', type: 1, class: 1, ttl: 0, rdata: Buffer.from([1, 1, 1, 1]) }],
  });
  const header = decodeDnsHeader(bytes);
  assert.equal(header.qdcount, 0);
  assert.equal(header.ancount, 1);
  assert.equal(header.nscount, 0);
  assert.equal(header.arcount, 0);
});

test('decodeDnsMessage round trips questions, answers and counts', () => {
  const message = {
    header: createDnsHeader({ id: 0x2468, qr: true, rd: true, ra: true, qdcount: 1, ancount: 2 }),
    questions: [{ name: 'example.com', type: 1, class: 1 }],
    answers: [
      { name: 'example.com', type: 5, class: 1, ttl: 300, rdata: encodeDnsName('alias.example.net') },
      { name: 'alias.example.net', type: 1, class: 1, ttl: 60, rdata: Buffer.from([192, 0, 2, 7]) },
    ],
  };
  assert.deepEqual(decodeDnsMessage(encodeDnsMessage(message)), message);
});

test('decodeDnsMessage ignores authority and additional sections', () => {
  const encoded = encodeDnsMessage({
    header: createDnsHeader({ id: 5 }),
    questions: [{ name: 'example.org', type: 1, class: 1 }],
    answers: [],
  });
  // Claim one authority record and append garbage where it would be.
  encoded.writeUInt16BE(1, 8);
  const bytes = Buffer.concat([encoded, Buffer.from([0xde, 0xad])]);

  const decoded = decodeDnsMessage(bytes);
  assert.equal(decoded.header.nscount, 1);
  assert.deepEqual(decoded.questions, [{ name: 'example.org', type: 1, class: 1 }]);
  assert.deepEqual(decoded.answers, []);
});

test('decodeDnsMessage resolves compressed answer names', () => {
  const question = encodeDnsQuestion({ name: 'example.com', type: 1, class: 1 });
  const answer = Buffer.from('c00c' + '0001' + '0001' + '0000003c' + '0004' + '7f000001', 'hex');
  const header = encodeDnsHeader(createDnsHeader({ id: 9, qr: true, qdcount: 1, ancount: 1 }));

  const decoded = decodeDnsMessage(Buffer.concat([header, question, answer]));
  assert.deepEqual(decoded.answers, [
    { name: 'example.com', type: 1, class: 1, ttl: 60, rdata: Buffer.from([127, 0, 0, 1]) },
  ]);
});

test('decodeDnsMessage rejects a header that announces a missing question', () => {
  const bytes = encodeDnsHeader(createDnsHeader({ id: 1, qdcount: 1 }));
  assert.equal(bytes.length, 12);
  assert.throws(() => decodeDnsMessage(bytes), decodeErrorWithCode('truncated'));
});
