export type RpcCall = <T = unknown>(method: string, params?: unknown[]) => Promise<T>;

/** Anything that can issue Neovim API requests, e.g. a msgpack-RPC session. */
export type NvimRpc = {
  call: RpcCall;
};

/** Buffer handle as received over RPC: a number or a msgpack ext value. */
export type BufferRef = number | { type: number; data: unknown };

/** `(row, col)`; rows are 1-indexed, columns are byte offsets. */
export type Mark = readonly [row: number, col: number];

export type VisualType = "char" | "line" | "block" | null;

export type TextEncoding = "UTF-8" | "UTF-16-LE";

/**
 * The host's serialized callback queue. Work handed to `asyncCall` runs on
 * the host's own turn, one callback at a time, in submission order.
 */
export type HostLoop = {
  asyncCall: (fn: () => void) => void;
  /** Runs queued work now, if the loop supports being pumped. */
  flush?: () => void;
  /** True while the loop is running callbacks on the current stack. */
  isDraining?: () => boolean;
};

export type NvimHostOptions = {
  debug?: boolean;
  debugLog?: (line: string) => void;
  messageSeparator?: string;
  benchThreshold?: number;
  benchPrecision?: number;
  tabsize?: number;
};
