const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export type OneOrMany<T> = T | T[];

export function toList<T>(value: OneOrMany<T>): T[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Decodes raw bytes as UTF-8. Strings pass through untouched.
 * Throws a TypeError when the bytes are not valid UTF-8.
 */
export function decodeUtf8(value: string | Uint8Array): string {
  if (typeof value === 'string') {
    return value;
  }
  return decoder.decode(value);
}

export function utf8ByteLength(text: string): number {
  return encoder.encode(text).length;
}

/**
 * Cuts `text` down to at most `maxBytes` UTF-8 bytes without splitting a
 * character. Returns the input unchanged when it already fits.
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  const bytes = encoder.encode(text);
  if (bytes.length <= maxBytes) {
    return text;
  }

  let end = Math.max(0, maxBytes);
  // step back over continuation bytes (10xxxxxx)
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }

  return decoder.decode(bytes.subarray(0, end));
}
