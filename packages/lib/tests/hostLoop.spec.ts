import { describe, expect, test } from "vitest";

import { SerialHostLoop } from "../src/client/hostLoop";

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("SerialHostLoop", () => {
  test("runs callbacks on a later turn in submission order", async () => {
    const host = new SerialHostLoop();
    const order: string[] = [];
    host.asyncCall(() => order.push("a"));
    host.asyncCall(() => order.push("b"));
    expect(order).toEqual([]);
    expect(host.pending()).toBe(2);
    await nextTurn();
    expect(order).toEqual(["a", "b"]);
    expect(host.pending()).toBe(0);
  });

  test("work queued by a callback runs in the same drain, after it", () => {
    const host = new SerialHostLoop();
    const order: string[] = [];
    host.asyncCall(() => {
      order.push("outer");
      host.asyncCall(() => order.push("inner"));
    });
    host.asyncCall(() => order.push("second"));
    host.flush();
    expect(order).toEqual(["outer", "second", "inner"]);
  });

  test("a throwing callback is logged and does not stop the queue", () => {
    const lines: string[] = [];
    const host = new SerialHostLoop({ debugLog: (line) => lines.push(line) });
    const order: string[] = [];
    host.asyncCall(() => {
      throw new Error("bad callback");
    });
    host.asyncCall(() => order.push("after"));
    host.flush();
    expect(order).toEqual(["after"]);
    expect(lines).toEqual(["[nvim-host-kit] host callback failed: bad callback"]);
  });

  test("flush with an empty queue is a no-op", () => {
    const host = new SerialHostLoop();
    host.flush();
    expect(host.pending()).toBe(0);
  });

  test("reports draining only while callbacks run", () => {
    const host = new SerialHostLoop();
    const seen: boolean[] = [];
    host.asyncCall(() => seen.push(host.isDraining()));
    expect(host.isDraining()).toBe(false);
    host.flush();
    expect(seen).toEqual([true]);
    expect(host.isDraining()).toBe(false);
  });
});
