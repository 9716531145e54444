import type { HostLoop, NvimRpc } from "../types";
import { asyncCall, go } from "./callBridge";
import type { DebugLog } from "./debugLog";

export type WriteOptions = {
  sep?: string;
  error?: boolean;
};

const echoSupport = new WeakMap<NvimRpc, boolean>();

async function hasEcho(nvim: NvimRpc): Promise<boolean> {
  const known = echoSupport.get(nvim);
  if (known != null) return known;
  const res = await nvim.call<unknown>("nvim_call_function", ["has", ["nvim-0.5"]]);
  const supported = Number(res) === 1;
  echoSupport.set(nvim, supported);
  return supported;
}

export function formatMessage(values: readonly unknown[], sep = " "): string {
  return values.map((v) => String(v)).join(sep).trimEnd();
}

/** Shows `values` in the message area, highlighted as an error when asked. */
export async function write(nvim: NvimRpc, values: readonly unknown[], options: WriteOptions = {}): Promise<void> {
  const msg = formatMessage(values, options.sep ?? " ");
  if (await hasEcho(nvim)) {
    const chunk = options.error ? [msg, "ErrorMsg"] : [msg];
    await nvim.call("nvim_echo", [[chunk], true, {}]);
    return;
  }
  await nvim.call(options.error ? "nvim_err_write" : "nvim_out_write", [`${msg}\n`]);
}

/**
 * Fire-and-forget `write` routed through the host loop. Failures are
 * logged, never thrown.
 */
export function awrite(
  nvim: NvimRpc,
  host: HostLoop,
  values: readonly unknown[],
  options: WriteOptions & { debugLog?: DebugLog } = {},
): Promise<void> {
  const { debugLog, ...writeOptions } = options;
  return go(asyncCall(host, () => write(nvim, values, writeOptions)), { debugLog }).then(() => undefined);
}

export type BenchOptions = {
  threshold?: number;
  precision?: number;
  sep?: string;
  now?: () => number;
};

function roundTo(value: number, precision: number): number {
  const scale = 10 ** precision;
  return Math.round(value * scale) / scale;
}

/**
 * Runs `body` and, when it took at least `threshold` seconds, writes `label`
 * followed by the elapsed seconds.
 */
export async function bench<T>(
  nvim: NvimRpc,
  label: readonly unknown[],
  body: () => T | PromiseLike<T>,
  options: BenchOptions = {},
): Promise<T> {
  const now = options.now ?? (() => performance.now());
  const threshold = options.threshold ?? 0.01;
  const precision = options.precision ?? 3;
  const t1 = now();
  const result = await body();
  const elapsed = (now() - t1) / 1000;
  if (elapsed >= threshold) {
    await write(nvim, [...label, roundTo(elapsed, precision)], { sep: options.sep });
  }
  return result;
}
