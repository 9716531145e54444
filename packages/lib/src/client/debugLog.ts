export const LOG_PREFIX = "[nvim-host-kit]";

export type DebugLog = (line: string) => void;

export function createDebugLog(opts: { debug: boolean; debugLog?: DebugLog }): DebugLog {
  return (line: string) => {
    if (!opts.debug) return;
    const msg = `${LOG_PREFIX} ${line}`;
    if (opts.debugLog) opts.debugLog(msg);
    else console.log(msg);
  };
}

/** For failures that would otherwise go unseen; logged whether or not debugging is on. */
export function createErrorLog(opts: { debugLog?: DebugLog }): DebugLog {
  return (line: string) => {
    const msg = `${LOG_PREFIX} ${line}`;
    if (opts.debugLog) opts.debugLog(msg);
    else console.error(msg);
  };
}
