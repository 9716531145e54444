import type { TextEncoding } from "../types";

// Undecodable bytes round-trip as lone surrogates U+DC00 + byte.
const ESCAPE_BASE = 0xdc00;
const REPLACEMENT = [0xef, 0xbf, 0xbd];

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

function escapeByte(byte: number): string {
  return String.fromCharCode(ESCAPE_BASE + byte);
}

export function encode(text: string, encoding: TextEncoding = "UTF-8"): Uint8Array {
  switch (encoding) {
    case "UTF-8":
      return encodeUtf8(text, false);
    case "UTF-16-LE":
      return encodeUtf16le(text);
  }
}

export function decode(bytes: Uint8Array, encoding: TextEncoding = "UTF-8"): string {
  switch (encoding) {
    case "UTF-8":
      return decodeUtf8(bytes);
    case "UTF-16-LE":
      return decodeUtf16le(bytes);
  }
}

/** Strips anything UTF-8 cannot carry (lone surrogates, escaped bytes included). */
export function recode(text: string): string {
  return decodeUtf8(encodeUtf8(text, true));
}

function encodeUtf8(text: string, dropInvalid: boolean): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < text.length; i += 1) {
    const unit = text.charCodeAt(i);
    if (isHighSurrogate(unit) && i + 1 < text.length && isLowSurrogate(text.charCodeAt(i + 1))) {
      const point = 0x10000 + ((unit - 0xd800) << 10) + (text.charCodeAt(i + 1) - 0xdc00);
      out.push(
        0xf0 | (point >> 18),
        0x80 | ((point >> 12) & 0x3f),
        0x80 | ((point >> 6) & 0x3f),
        0x80 | (point & 0x3f),
      );
      i += 1;
    } else if (isHighSurrogate(unit) || isLowSurrogate(unit)) {
      if (dropInvalid) continue;
      if (isEscape(unit)) out.push(unit - ESCAPE_BASE);
      else out.push(...REPLACEMENT);
    } else if (unit <= 0x7f) {
      out.push(unit);
    } else if (unit <= 0x7ff) {
      out.push(0xc0 | (unit >> 6), 0x80 | (unit & 0x3f));
    } else {
      out.push(0xe0 | (unit >> 12), 0x80 | ((unit >> 6) & 0x3f), 0x80 | (unit & 0x3f));
    }
  }
  return Uint8Array.from(out);
}

function utf8SequenceLength(bytes: Uint8Array, i: number): number {
  const b0 = bytes[i];
  let len: number;
  let lo = 0x80;
  let hi = 0xbf;
  if (b0 >= 0xc2 && b0 <= 0xdf) {
    len = 2;
  } else if (b0 >= 0xe0 && b0 <= 0xef) {
    len = 3;
    if (b0 === 0xe0) lo = 0xa0;
    if (b0 === 0xed) hi = 0x9f;
  } else if (b0 >= 0xf0 && b0 <= 0xf4) {
    len = 4;
    if (b0 === 0xf0) lo = 0x90;
    if (b0 === 0xf4) hi = 0x8f;
  } else {
    return 0;
  }
  if (i + len > bytes.length) return 0;
  const b1 = bytes[i + 1];
  if (b1 < lo || b1 > hi) return 0;
  for (let k = 2; k < len; k += 1) {
    const b = bytes[i + k];
    if (b < 0x80 || b > 0xbf) return 0;
  }
  return len;
}

function decodeUtf8(bytes: Uint8Array): string {
  const parts: string[] = [];
  let i = 0;
  while (i < bytes.length) {
    const b0 = bytes[i];
    if (b0 <= 0x7f) {
      parts.push(String.fromCharCode(b0));
      i += 1;
      continue;
    }
    const len = utf8SequenceLength(bytes, i);
    if (!len) {
      parts.push(escapeByte(b0));
      i += 1;
      continue;
    }
    let point = b0 & (0xff >> (len + 1));
    for (let k = 1; k < len; k += 1) point = (point << 6) | (bytes[i + k] & 0x3f);
    parts.push(String.fromCodePoint(point));
    i += len;
  }
  return parts.join("");
}

function isEscape(unit: number): boolean {
  return unit >= ESCAPE_BASE + 0x80 && unit <= ESCAPE_BASE + 0xff;
}

// Only U+DC80..U+DCFF are escapes under UTF-16-LE, as under UTF-8. A lone
// surrogate unit outside that range is text and is written as a unit.
function encodeUtf16le(text: string): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < text.length; i += 1) {
    const unit = text.charCodeAt(i);
    if (isHighSurrogate(unit) && i + 1 < text.length && isLowSurrogate(text.charCodeAt(i + 1))) {
      const low = text.charCodeAt(i + 1);
      out.push(unit & 0xff, unit >> 8, low & 0xff, low >> 8);
      i += 1;
    } else if (isEscape(unit)) {
      out.push(unit - ESCAPE_BASE);
    } else {
      out.push(unit & 0xff, unit >> 8);
    }
  }
  return Uint8Array.from(out);
}

// A lone unit in U+DC80..U+DCFF would read back as an escape, so its two
// bytes (both >= 0x80) are escaped instead. A trailing odd byte below 0x80
// has no escape and becomes U+FFFD.
function decodeUtf16le(bytes: Uint8Array): string {
  const parts: string[] = [];
  let i = 0;
  while (i + 1 < bytes.length) {
    const unit = bytes[i] | (bytes[i + 1] << 8);
    if (isHighSurrogate(unit) && i + 3 < bytes.length) {
      const next = bytes[i + 2] | (bytes[i + 3] << 8);
      if (isLowSurrogate(next)) {
        parts.push(String.fromCharCode(unit, next));
        i += 4;
        continue;
      }
    }
    if (isEscape(unit)) parts.push(escapeByte(bytes[i]), escapeByte(bytes[i + 1]));
    else parts.push(String.fromCharCode(unit));
    i += 2;
  }
  if (i < bytes.length) parts.push(bytes[i] >= 0x80 ? escapeByte(bytes[i]) : "\ufffd");
  return parts.join("");
}
