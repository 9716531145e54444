const encoder = new TextEncoder();

export function utf8StringByteLength(text: string): number {
  return encoder.encode(text).length;
}

export function byteIndexToCharIndex(text: string, byteIndex: number): number {
  let totalBytes = 0;
  let charIndex = 0;
  const target = Math.max(0, Number(byteIndex) || 0);
  while (totalBytes < target) {
    if (charIndex >= text.length) {
      return charIndex + (target - totalBytes);
    }
    const code = text.codePointAt(charIndex) ?? 0;
    const bytes = utf8ByteLength(code);
    if (totalBytes + bytes > target) return charIndex;
    totalBytes += bytes;
    charIndex += code > 0xffff ? 2 : 1;
  }
  return charIndex;
}

export function utf8ByteLength(point: number): number {
  if (point <= 0x7f) return 1;
  if (point <= 0x7ff) return 2;
  // Unpaired surrogates are encoded as U+FFFD by TextEncoder (3 bytes).
  if (point >= 0xd800 && point <= 0xdfff) return 3;
  if (point <= 0xffff) return 3;
  return 4;
}

/**
 * Slice `text` by UTF-8 byte columns. `endByte` is inclusive and, like a
 * Neovim `]` mark, may point at the first byte of a multibyte character, in
 * which case the whole character is kept. Omit it to slice to the end.
 */
export function sliceByByteColumns(text: string, startByte: number, endByte?: number): string {
  const start = byteIndexToCharIndex(text, startByte);
  if (endByte == null) return text.slice(start);
  if (endByte < 0) return "";
  const last = byteIndexToCharIndex(text, endByte);
  const code = text.codePointAt(last);
  const end = last + (code != null && code > 0xffff ? 2 : 1);
  return text.slice(start, end);
}
