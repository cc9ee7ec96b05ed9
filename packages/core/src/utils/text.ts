// Byte-level text helpers. Lines are handled as Latin-1: one char per byte.

const SPACE = 0x20;
const DEL = 0x7f;

export function isSpace(code: number): boolean {
  return code === SPACE || (code >= 0x09 && code <= 0x0d);
}

export function isControl(byte: number): boolean {
  return byte < SPACE || byte === DEL;
}

/** Strip leading and trailing whitespace. A missing string trims to ''. */
export function trim(text: string | null | undefined): string {
  if (text == null) return '';
  let start = 0;
  let end = text.length;
  while (start < end && isSpace(text.charCodeAt(start))) start++;
  while (end > start && isSpace(text.charCodeAt(end - 1))) end--;
  return text.slice(start, end);
}

export function bytesToString(bytes: Uint8Array, start = 0, end = bytes.length): string {
  let out = '';
  for (let i = start; i < end; i++) {
    out += String.fromCharCode(bytes[i]);
  }
  return out;
}

/** Write `text` into `target` at `offset`, one byte per char. Returns the count written. */
export function writeString(target: Uint8Array, offset: number, text: string, limit = text.length): number {
  const n = Math.min(limit, text.length, target.length - offset);
  for (let i = 0; i < n; i++) {
    target[offset + i] = text.charCodeAt(i) & 0xff;
  }
  return n;
}
