import { describe, expect, test } from "vitest";

import { decode, displayWidth, encode, escape, NvimHostClient, threadsafeCall } from "../src/index";

describe("package entry", () => {
  test("re-exports the library", () => {
    expect(displayWidth("漢A", 4)).toBe(3);
    expect(decode(encode("round"))).toBe("round");
    expect([...escape("ab", new Map([["a", "A"]]))].join("")).toBe("Ab");
    expect(threadsafeCall({ asyncCall: (fn) => fn() }, () => "inline")).toBe("inline");
    expect(typeof NvimHostClient).toBe("function");
  });
});
