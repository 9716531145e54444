import type { BufferRef, HostLoop, Mark, NvimHostOptions, NvimRpc, VisualType } from "../types";
import { displayWidth } from "../utils/displayWidth";
import { utf8StringByteLength } from "../utils/utf8";
import { asyncCall, go, threadsafeCall } from "./callBridge";
import { createDebugLog, type DebugLog } from "./debugLog";
import { SerialHostLoop } from "./hostLoop";
import { awrite, bench, write, type BenchOptions, type WriteOptions } from "./messages";
import { getSelected, operatorMarks, setVisualSelection, writable } from "./operators";
import { resolveOptions, type NvimHostResolvedOptions } from "./options";

export type NvimHostClientInit = NvimHostOptions & {
  nvim: NvimRpc;
  host?: HostLoop;
};

export class NvimHostClient {
  readonly nvim: NvimRpc;
  readonly host: HostLoop;
  private readonly opts: NvimHostResolvedOptions;
  private readonly debugLog: DebugLog;

  constructor(init: NvimHostClientInit) {
    const { nvim, host, ...options } = init;
    this.opts = resolveOptions(options);
    this.debugLog = createDebugLog(this.opts);
    this.nvim = nvim;
    this.host = host ?? new SerialHostLoop({ debugLog: this.opts.debugLog });
    this.debugLog(`client ready host=${host ? "custom" : "serial"} tabsize=${this.opts.tabsize}`);
  }

  get options(): Readonly<NvimHostResolvedOptions> {
    return this.opts;
  }

  call<A extends unknown[], T>(fn: (...args: A) => T, ...args: A): T {
    return threadsafeCall(this.host, fn, ...args);
  }

  callAsync<A extends unknown[], T>(fn: (...args: A) => T | PromiseLike<T>, ...args: A): Promise<T> {
    return asyncCall(this.host, fn, ...args);
  }

  go<T>(task: PromiseLike<T>, suppress = true): Promise<T | undefined> {
    return go(task, { suppress, debugLog: this.opts.debugLog });
  }

  write(values: readonly unknown[], options: WriteOptions = {}): Promise<void> {
    return write(this.nvim, values, { sep: this.opts.messageSeparator, ...options });
  }

  awrite(values: readonly unknown[], options: WriteOptions = {}): Promise<void> {
    return awrite(this.nvim, this.host, values, {
      sep: this.opts.messageSeparator,
      ...options,
      debugLog: this.opts.debugLog,
    });
  }

  bench<T>(label: readonly unknown[], body: () => T | PromiseLike<T>, options: BenchOptions = {}): Promise<T> {
    return bench(this.nvim, label, body, {
      threshold: this.opts.benchThreshold,
      precision: this.opts.benchPrecision,
      sep: this.opts.messageSeparator,
      ...options,
    });
  }

  writable(buf: BufferRef): Promise<boolean> {
    return writable(this.nvim, buf);
  }

  operatorMarks(buf: BufferRef, visualType: VisualType): Promise<[Mark, Mark]> {
    return operatorMarks(this.nvim, buf, visualType);
  }

  setVisualSelection(buf: BufferRef, mark1: Mark, mark2: Mark): Promise<void> {
    this.debugLog(`set visual selection ${mark1.join(",")} -> ${mark2.join(",")}`);
    return setVisualSelection(this.nvim, buf, mark1, mark2);
  }

  async getSelected(buf: BufferRef, visualType: VisualType): Promise<string> {
    const text = await getSelected(this.nvim, buf, visualType);
    this.debugLog(`selected visual=${JSON.stringify(visualType)} bytes=${utf8StringByteLength(text)}`);
    return text;
  }

  /** Width of `text`, using the buffer's `tabstop` when `buf` is given. */
  async displayWidth(text: string, buf?: BufferRef): Promise<number> {
    return displayWidth(text, buf == null ? this.opts.tabsize : await this.tabstop(buf));
  }

  private async tabstop(buf: BufferRef): Promise<number> {
    const res = await this.nvim.call<unknown>("nvim_buf_get_option", [buf, "tabstop"]);
    const ts = Number(res);
    return Number.isInteger(ts) && ts > 0 ? ts : this.opts.tabsize;
  }
}
