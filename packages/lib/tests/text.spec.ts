import { describe, expect, test } from "vitest";

import { escape, expandTabs, pIndent } from "../src/utils/text";

describe("escape", () => {
  test("replaces mapped elements and keeps the rest in order", () => {
    expect([...escape([1, 2, 3], new Map([[2, 9]]))]).toEqual([1, 9, 3]);
  });

  test("works on strings character by character", () => {
    const mapping = new Map([["\\", "\\\\"], ['"', '\\"']]);
    expect([...escape('a"b\\', mapping)].join("")).toBe('a\\"b\\\\');
  });

  test("is lazy", () => {
    const seen: number[] = [];
    function* source() {
      for (const n of [1, 2, 3]) {
        seen.push(n);
        yield n;
      }
    }
    const it = escape(source(), new Map<number, number>());
    expect(seen).toEqual([]);
    expect(it.next().value).toBe(1);
    expect(seen).toEqual([1]);
  });

  test("a mapping to null or undefined still replaces the element", () => {
    expect([...escape<string | null>(["a", "b"], new Map<string | null, string | null>([["a", null]]))]).toEqual([null, "b"]);
    expect([...escape<number | undefined>([1, 2], new Map<number | undefined, number | undefined>([[2, undefined]]))]).toEqual([1, undefined]);
  });
});

describe("expandTabs", () => {
  test("pads to the next tab stop", () => {
    expect(expandTabs("a\tb", 4)).toBe("a   b");
    expect(expandTabs("\t\tx", 2)).toBe("    x");
  });

  test("restarts columns after a line break", () => {
    expect(expandTabs("ab\n\tc", 4)).toBe("ab\n    c");
  });

  test("drops tabs for a zero tab size", () => {
    expect(expandTabs("a\tb", 0)).toBe("ab");
  });
});

describe("pIndent", () => {
  test("counts leading spaces", () => {
    expect(pIndent("    foo", 4)).toBe(4);
  });

  test("expands leading tabs", () => {
    expect(pIndent("\t foo", 4)).toBe(5);
  });

  test("no indent", () => {
    expect(pIndent("foo", 4)).toBe(0);
  });

  test("blank and empty lines report zero", () => {
    expect(pIndent("   ", 4)).toBe(0);
    expect(pIndent("", 4)).toBe(0);
  });
});
