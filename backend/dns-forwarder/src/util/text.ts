const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');

function coerceString(input: unknown): string {
  try {
    return String(input ?? '');
  } catch {
    return '';
  }
}

function isForbiddenCodePoint(code: number): boolean {
  return code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029;
}

/**
 * Collapses whitespace/control characters into single spaces and caps the UTF-8 size,
 * never splitting a code point.
 */
export function formatOneLineUtf8(input: unknown, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return '';

  const buf = new Uint8Array(maxBytes);
  let written = 0;
  let pendingSpace = false;
  for (const ch of coerceString(input)) {
    const code = ch.codePointAt(0) ?? 0;
    if (isForbiddenCodePoint(code) || /\s/u.test(ch)) {
      pendingSpace = written > 0;
      continue;
    }

    if (pendingSpace) {
      const spaceRes = textEncoder.encodeInto(' ', buf.subarray(written));
      if (spaceRes.written === 0) break;
      written += spaceRes.written;
      pendingSpace = false;
      if (written >= maxBytes) break;
    }

    const res = textEncoder.encodeInto(ch, buf.subarray(written));
    if (res.written === 0) break;
    written += res.written;
    if (written >= maxBytes) break;
  }
  return written === 0 ? '' : textDecoder.decode(buf.subarray(0, written));
}

function errorMessageOf(err: unknown): string {
  if (err === null) return 'null';
  if (typeof err === 'string') return err;
  if (err instanceof Error) return err.message;
  if (typeof err === 'object') return 'Error';
  return String(err);
}

export function formatOneLineError(err: unknown, maxBytes: number, fallback = 'Error'): string {
  return formatOneLineUtf8(errorMessageOf(err), maxBytes) || fallback || 'Error';
}
