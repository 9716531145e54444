import { describe, expect, test } from "vitest";

import {
  byteIndexToCharIndex,
  sliceByByteColumns,
  utf8ByteLength,
  utf8StringByteLength,
} from "../src/utils/utf8";

describe("utf8 column helpers", () => {
  test("byte length per code point", () => {
    expect(utf8ByteLength(0x41)).toBe(1);
    expect(utf8ByteLength(0xe9)).toBe(2);
    expect(utf8ByteLength(0x6f22)).toBe(3);
    expect(utf8ByteLength(0x1f600)).toBe(4);
    expect(utf8ByteLength(0xd800)).toBe(3);
  });

  test("string byte length", () => {
    expect(utf8StringByteLength("aé漢")).toBe(6);
  });

  test("byte to char index lands on the containing character", () => {
    expect(byteIndexToCharIndex("aé漢", 1)).toBe(1);
    expect(byteIndexToCharIndex("aé漢", 2)).toBe(1);
    expect(byteIndexToCharIndex("aé漢", 3)).toBe(2);
    expect(byteIndexToCharIndex("😀x", 4)).toBe(2);
  });

  test("slices by inclusive byte columns", () => {
    expect(sliceByByteColumns("abcd", 0, 2)).toBe("abc");
    expect(sliceByByteColumns("abcd", 1)).toBe("bcd");
  });

  test("keeps a whole multibyte character at the end column", () => {
    expect(sliceByByteColumns("a漢b", 0, 1)).toBe("a漢");
    expect(sliceByByteColumns("x😀y", 1, 1)).toBe("😀");
  });

  test("an end column past the line keeps the rest of it", () => {
    expect(sliceByByteColumns("abc", 1, 2147483647)).toBe("bc");
  });

  test("a negative end column selects nothing", () => {
    expect(sliceByByteColumns("abc", 0, -1)).toBe("");
  });
});
