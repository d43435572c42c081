export const DNS_RECORD_TYPES = {
  A: 1,
  NS: 2,
  CNAME: 5,
  SOA: 6,
  PTR: 12,
  MX: 15,
  TXT: 16,
  AAAA: 28,
  ANY: 255,
} as const;

export const DNS_CLASS_IN = 1;

export const DNS_RCODES = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
  NOTIMP: 4,
  REFUSED: 5,
} as const;

const RECORD_TYPE_NAMES = Object.keys(DNS_RECORD_TYPES);

const RECORD_TYPE_BY_NAME = new Map<string, number>(Object.entries(DNS_RECORD_TYPES));
const RECORD_NAME_BY_TYPE = new Map<number, string>(
  Object.entries(DNS_RECORD_TYPES).map(([name, value]): [number, string] => [value, name]),
);

const RCODE_NAME_BY_VALUE = new Map<number, string>(
  Object.entries(DNS_RCODES).map(([name, value]): [number, string] => [value, name]),
);

/**
 * Accepts a mnemonic (`A`, `aaaa`) or a decimal type number (`28`, `65`).
 *
 * Unlike mnemonics, numeric types are not restricted to the table above since the
 * forwarder treats rdata as opaque.
 */
export function parseDnsRecordType(value: string): number {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error('DNS record type cannot be empty');
  }

  let isNumeric = true;
  for (let i = 0; i < trimmed.length; i += 1) {
    const c = trimmed.charCodeAt(i);
    if (c < 0x30 /* '0' */ || c > 0x39 /* '9' */) {
      isNumeric = false;
      break;
    }
  }
  if (isNumeric) {
    const parsed = Number.parseInt(trimmed, 10);
    if (!Number.isFinite(parsed) || parsed <= 0 || parsed > 0xffff) {
      throw new Error('Invalid DNS record type number');
    }
    return parsed;
  }

  const mapped = RECORD_TYPE_BY_NAME.get(trimmed.toUpperCase());
  if (mapped === undefined) {
    throw new Error(`Unsupported DNS record type (supported: ${RECORD_TYPE_NAMES.join(', ')})`);
  }
  return mapped;
}

export function qtypeToString(qtype: number): string {
  return RECORD_NAME_BY_TYPE.get(qtype) ?? String(qtype);
}

export function rcodeToString(rcode: number): string {
  return RCODE_NAME_BY_VALUE.get(rcode) ?? String(rcode);
}
